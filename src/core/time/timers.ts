export const toIsoUtc = (ts: number): string => new Date(ts).toISOString();

export class SleepAbortedError extends Error {
    constructor() {
        super('sleep aborted');
        this.name = 'AbortError';
    }
}

/**
 * setTimeout wrapped in a promise. Rejects with an AbortError as soon as the
 * signal fires, so a worker parked in a reconnect/backoff wait stops promptly.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        if (signal?.aborted) {
            reject(new SleepAbortedError());
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(new SleepAbortedError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, Math.max(0, ms));
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Same as sleep() but resolves to false instead of rejecting when aborted.
 */
export async function sleepUnlessAborted(ms: number, signal?: AbortSignal): Promise<boolean> {
    try {
        await sleep(ms, signal);
        return true;
    } catch (err) {
        if (err instanceof SleepAbortedError) return false;
        throw err;
    }
}

export type SettleResult = { settled: true } | { settled: false };

/**
 * Waits for `task` at most `timeoutMs`. Never rejects: a rejected task counts
 * as settled. The task itself is not cancelled when the timeout wins.
 */
export function settleWithin(task: Promise<unknown>, timeoutMs: number): Promise<SettleResult> {
    return new Promise<SettleResult>((resolve) => {
        const timer = setTimeout(() => resolve({ settled: false }), Math.max(0, timeoutMs));
        task.then(
            () => {
                clearTimeout(timer);
                resolve({ settled: true });
            },
            () => {
                clearTimeout(timer);
                resolve({ settled: true });
            }
        );
    });
}
