/**
 * RETRY POLICY
 *
 * Max attempts, backoff function and retryable-error predicate in one
 * value. withRetry() is the only retry loop around model calls.
 */

import { TransientUnavailableError } from '../lib/errors.js';
import { ProviderHttpError, ProviderNetworkError, ProviderResponseError, ProviderTimeoutError } from './provider.js';

export type RetryPolicy = {
    maxAttempts: number;
    /** Delay before attempt `attempt + 1`, given the error of attempt `attempt` (1-based). */
    backoffMs(attempt: number, err: unknown): number;
    isRetryable(err: unknown): boolean;
};

const RETRYABLE_STATUSES = new Set([408, 409, 425, 429]);

export function isTransientError(err: unknown): boolean {
    if (err instanceof ProviderTimeoutError || err instanceof ProviderNetworkError || err instanceof ProviderResponseError) return true;
    if (err instanceof ProviderHttpError) return RETRYABLE_STATUSES.has(err.status) || err.status >= 500;
    return false;
}

export function exponentialBackoff(baseMs: number, maxMs: number): (attempt: number) => number {
    return (attempt) => Math.min(maxMs, baseMs * Math.pow(2, Math.max(0, attempt - 1)));
}

export function createRetryPolicy(opts: { maxAttempts: number; baseMs: number; maxMs?: number }): RetryPolicy {
    const maxMs = opts.maxMs ?? 30_000;
    const backoff = exponentialBackoff(opts.baseMs, maxMs);
    return {
        maxAttempts: Math.max(1, Math.floor(opts.maxAttempts)),
        backoffMs(attempt, err) {
            // Respect Retry-After when the provider sends one
            if (err instanceof ProviderHttpError && err.retryAfterMs !== undefined) return Math.min(maxMs, err.retryAfterMs);
            return backoff(attempt);
        },
        isRetryable: isTransientError
    };
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = (ms, signal) => new Promise((resolve, reject) => {
    if (signal?.aborted) {
        reject(signal.reason);
        return;
    }
    const onAbort = () => {
        clearTimeout(timer);
        reject(signal?.reason);
    };
    const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
});

export type RetryHooks = {
    sleep?: Sleep;
    signal?: AbortSignal;
    onRetry?: (attempt: number, err: unknown, delayMs: number) => void;
};

/**
 * Runs fn until it succeeds, fails with a non-retryable error (rethrown as
 * is) or runs out of attempts (TransientUnavailableError).
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, policy: RetryPolicy, hooks: RetryHooks = {}): Promise<T> {
    const wait = hooks.sleep ?? sleep;
    let lastErr: unknown;
    for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
        try {
            return await fn(attempt);
        } catch (e) {
            if (hooks.signal?.aborted || !policy.isRetryable(e)) throw e;
            lastErr = e;
            if (attempt < policy.maxAttempts) {
                const delay = policy.backoffMs(attempt, e);
                hooks.onRetry?.(attempt, e, delay);
                await wait(delay, hooks.signal);
            }
        }
    }
    throw new TransientUnavailableError(policy.maxAttempts, lastErr);
}
