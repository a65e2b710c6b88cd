import { describe, it, expect } from '@jest/globals';
import { type Sleep } from './abort';
import { CancelledError } from './errors';
import { poll } from './poll';

function recordingSleep() {
    const sleeps: number[] = [];
    const sleep: Sleep = async (ms) => {
        sleeps.push(ms);
    };
    return { sleeps, sleep };
}

describe('poll', () => {
    it('should return the first successful value without sleeping', async () => {
        const { sleeps, sleep } = recordingSleep();

        const outcome = await poll({
            action: async () => 'ready',
            isDone: (value) => value === 'ready',
            delayMs: 1000,
            maxAttempts: 5,
            sleep
        });

        expect(outcome).toEqual({ done: true, value: 'ready', attempts: 1 });
        expect(sleeps).toEqual([]);
    });

    it('should sleep only between attempts', async () => {
        const { sleeps, sleep } = recordingSleep();

        const outcome = await poll({
            action: async (attempt) => attempt,
            isDone: (value) => value >= 3,
            delayMs: 50,
            maxAttempts: 10,
            sleep
        });

        expect(outcome).toEqual({ done: true, value: 3, attempts: 3 });
        expect(sleeps).toEqual([50, 50]);
    });

    it('should stop exactly at the attempt ceiling', async () => {
        const { sleeps, sleep } = recordingSleep();
        let calls = 0;

        const outcome = await poll({
            action: async () => ++calls,
            isDone: () => false,
            delayMs: 1000,
            maxAttempts: 4,
            sleep
        });

        expect(outcome).toEqual({ done: false, last: 4, attempts: 4 });
        expect(calls).toBe(4);
        expect(sleeps).toEqual([1000, 1000, 1000]);
    });

    it('should report each retry', async () => {
        const { sleep } = recordingSleep();
        const retries: Array<[string, number]> = [];

        await poll({
            action: async (attempt) => (attempt < 3 ? 'busy' : 'idle'),
            isDone: (value) => value === 'idle',
            delayMs: 0,
            maxAttempts: 5,
            sleep,
            onRetry: (value, attempt) => retries.push([value, attempt])
        });

        expect(retries).toEqual([['busy', 1], ['busy', 2]]);
    });

    it('should not run the action when already cancelled', async () => {
        const controller = new AbortController();
        controller.abort();
        let calls = 0;

        await expect(poll({
            action: async () => ++calls,
            isDone: () => false,
            delayMs: 10,
            maxAttempts: 3,
            signal: controller.signal
        })).rejects.toBeInstanceOf(CancelledError);
        expect(calls).toBe(0);
    });

    it('should abort the wait between attempts when cancelled', async () => {
        const controller = new AbortController();
        let calls = 0;

        await expect(poll({
            action: async () => {
                calls++;
                controller.abort();
                return calls;
            },
            isDone: () => false,
            delayMs: 60000,
            maxAttempts: 3,
            signal: controller.signal
        })).rejects.toBeInstanceOf(CancelledError);
        expect(calls).toBe(1);
    });

    it('should reject a ceiling below one attempt', async () => {
        await expect(poll({
            action: async () => true,
            isDone: (value) => value,
            delayMs: 0,
            maxAttempts: 0
        })).rejects.toBeInstanceOf(RangeError);
    });
});
