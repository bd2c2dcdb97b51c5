import { setTimeout as delay } from 'node:timers/promises';

/**
 * Time source used by the clients and the correlation loop.
 * Injected so retry schedules can be exercised without real waits.
 */
export interface Clock {
    /** Epoch milliseconds */
    now(): number;
    /** Resolves after `ms`; rejects with the signal's reason when aborted */
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep: async (ms: number, signal?: AbortSignal) => {
        if (ms <= 0) {
            signal?.throwIfAborted();
            return;
        }
        await delay(ms, undefined, { signal });
    }
};

/**
 * Combine an optional caller signal with a timeout of its own.
 */
export function withTimeout(timeoutMs: number, signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
}
