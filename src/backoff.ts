/**
 * Retry with exponential backoff, shared by webhook delivery and the
 * transcription stream reconnect loop.
 */

export interface BackoffPolicy {
    /** Total attempts, including the first one */
    maxAttempts: number;
    baseDelayMs: number;
    factor: number;
    maxDelayMs: number;
}

export interface RetryOptions extends Partial<BackoffPolicy> {
    isRetryable?: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
    signal?: AbortSignal;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
    maxAttempts: 3,
    baseDelayMs: 500,
    factor: 2,
    maxDelayMs: 10000,
};

export class AbortError extends Error {
    constructor(message = 'Operation aborted') {
        super(message);
        this.name = 'AbortError';
    }
}

/**
 * Delay before the retry that follows `attempt` (1-based).
 */
export function backoffDelay(policy: BackoffPolicy, attempt: number): number {
    const delay = policy.baseDelayMs * Math.pow(policy.factor, attempt - 1);
    return Math.min(delay, policy.maxDelayMs);
}

/**
 * Sleep that rejects with AbortError as soon as the signal fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new AbortError());
            return;
        }

        const onAbort = () => {
            clearTimeout(timer);
            reject(new AbortError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Run `fn` until it succeeds, the error is not retryable, or attempts run out.
 * The last error is rethrown; an abort during a backoff wait throws AbortError.
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const policy: BackoffPolicy = {
        maxAttempts: options.maxAttempts ?? DEFAULT_BACKOFF.maxAttempts,
        baseDelayMs: options.baseDelayMs ?? DEFAULT_BACKOFF.baseDelayMs,
        factor: options.factor ?? DEFAULT_BACKOFF.factor,
        maxDelayMs: options.maxDelayMs ?? DEFAULT_BACKOFF.maxDelayMs,
    };
    const attempts = Math.max(1, policy.maxAttempts);
    const isRetryable = options.isRetryable ?? (() => true);

    for (let attempt = 1; ; attempt++) {
        if (options.signal?.aborted) {
            throw new AbortError();
        }

        try {
            return await fn(attempt);
        } catch (error) {
            if (attempt >= attempts || !isRetryable(error)) {
                throw error;
            }

            const delay = backoffDelay(policy, attempt);
            options.onRetry?.(error, attempt, delay);
            await sleep(delay, options.signal);
        }
    }
}
