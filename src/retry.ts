// src/retry.ts

export function sleep(ms: number): Promise<void> {
    return new Promise((r) => setTimeout(r, ms));
}

/**
 * Exponential backoff: minMs, 2*minMs, 4*minMs, ... capped at maxMs.
 * `attempt` is the number of attempts already made (1 for the first retry).
 */
export function backoff(attempt: number, minMs: number, maxMs: number): number {
    const v = minMs * Math.pow(2, Math.max(0, attempt - 1));
    return Math.min(v, maxMs);
}

export interface RetryPolicy {
    maxAttempts: number;
    minMs: number;
    maxMs: number;
    /** Return false to stop retrying on this error. Default: retry everything. */
    retryable?: (err: unknown) => boolean;
    /** Called before each wait. */
    onRetry?: (attempt: number, waitMs: number, err: unknown) => void;
    /** Injected for tests. */
    sleepFn?: (ms: number) => Promise<void>;
}

export class RetryExhaustedError extends Error {
    constructor(public readonly attempts: number, public readonly lastError: unknown) {
        super(`Gave up after ${attempts} attempt(s): ${lastError instanceof Error ? lastError.message : String(lastError)}`);
        this.name = 'RetryExhaustedError';
    }
}

/** Run `fn` until it resolves or the policy is exhausted. */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, policy: RetryPolicy): Promise<T> {
    const wait = policy.sleepFn ?? sleep;
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
        try {
            return await fn(attempt);
        } catch (e) {
            lastError = e;
            const canRetry = policy.retryable ? policy.retryable(e) : true;
            if (!canRetry || attempt >= policy.maxAttempts) {
                throw new RetryExhaustedError(attempt, e);
            }
            const ms = backoff(attempt, policy.minMs, policy.maxMs);
            policy.onRetry?.(attempt, ms, e);
            await wait(ms);
        }
    }

    throw new RetryExhaustedError(policy.maxAttempts, lastError);
}

/** Resolves after `ms` or as soon as `signal` aborts, whichever is first. */
export function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
    if (signal.aborted) return Promise.resolve();
    return new Promise((resolve) => {
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal.addEventListener('abort', onAbort, { once: true });
    });
}
