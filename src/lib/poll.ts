import { sleep as defaultSleep, throwIfCancelled, type Sleep } from './abort';

export type PollOptions<T> = {
    action: (attempt: number) => Promise<T>;
    isDone: (value: T) => boolean;
    /** Wait between attempts. Nothing is awaited after the last one. */
    delayMs: number;
    /** `Infinity` polls until done or cancelled. */
    maxAttempts: number;
    signal?: AbortSignal;
    sleep?: Sleep;
    onRetry?: (value: T, attempt: number) => void;
};

export type PollOutcome<T> =
    | { done: true; value: T; attempts: number }
    | { done: false; last: T; attempts: number };

export async function poll<T>(options: PollOptions<T>): Promise<PollOutcome<T>> {
    const { action, isDone, delayMs, maxAttempts, signal, onRetry } = options;
    const wait = options.sleep ?? defaultSleep;

    if (!(maxAttempts >= 1)) {
        throw new RangeError(`maxAttempts must be at least 1, got ${maxAttempts}`);
    }

    let attempt = 0;
    while (true) {
        throwIfCancelled(signal);
        attempt++;

        const value = await action(attempt);
        if (isDone(value)) {
            return { done: true, value, attempts: attempt };
        }
        if (attempt >= maxAttempts) {
            return { done: false, last: value, attempts: attempt };
        }

        onRetry?.(value, attempt);
        await wait(delayMs, signal);
    }
}
