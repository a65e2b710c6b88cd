import { CancelledError } from './errors';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export function throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new CancelledError();
    }
}

export const sleep: Sleep = (ms, signal) => new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
        reject(new CancelledError());
        return;
    }
    const onAbort = () => {
        clearTimeout(timer);
        reject(new CancelledError());
    };
    const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
});

export type TimedSignal = {
    signal: AbortSignal;
    timedOut: () => boolean;
    dispose: () => void;
};

/**
 * Signal that aborts after `timeoutMs` or when `parent` aborts, whichever comes first.
 * Callers must `dispose()` it once the guarded work has settled.
 */
export function timedSignal(timeoutMs: number, parent?: AbortSignal): TimedSignal {
    const controller = new AbortController();
    let expired = false;

    const onAbort = () => controller.abort();
    const timer = setTimeout(() => {
        expired = true;
        controller.abort();
    }, timeoutMs);

    if (parent?.aborted) {
        controller.abort();
    } else {
        parent?.addEventListener('abort', onAbort, { once: true });
    }

    return {
        signal: controller.signal,
        timedOut: () => expired,
        dispose: () => {
            clearTimeout(timer);
            parent?.removeEventListener('abort', onAbort);
        }
    };
}
