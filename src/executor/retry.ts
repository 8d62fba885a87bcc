import { TransientAPIError, warn } from '@stackplan/core';

export interface RetryOptions {
    /**
     * Total number of calls, the first one included.
     */
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;

    /**
     * Fraction of the delay that is randomized in either direction.
     */
    jitterFactor?: number;
}

export const DEFAULT_RETRY_OPTIONS: Required<RetryOptions> = {
    maxAttempts: 3,
    baseDelayMs: 200,
    maxDelayMs: 5_000,
    jitterFactor: 0.2,
};

export interface RetryResult<T> {
    value: T;
    attempts: number;
}

export class RetryExhaustedError extends Error {
    constructor(
        readonly lastError: unknown,
        readonly attempts: number,
    ) {
        super(lastError instanceof Error ? lastError.message : String(lastError));
        this.name = 'RetryExhaustedError';
    }
}

/**
 * Calls `fn` until it succeeds, retrying with exponential backoff and jitter while it throws `TransientAPIError`.
 * Any other error ends the loop right away.
 *
 * @param description - Used in log messages
 * @throws RetryExhaustedError wrapping the last error, with the number of attempts made
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    description: string,
    options: RetryOptions = DEFAULT_RETRY_OPTIONS,
): Promise<RetryResult<T>> {
    const maxAttempts = Math.max(1, options.maxAttempts);
    const jitterFactor = options.jitterFactor ?? DEFAULT_RETRY_OPTIONS.jitterFactor;

    for (let attempt = 1; ; attempt++) {
        try {
            return { value: await fn(), attempts: attempt };
        } catch (e) {
            if (attempt >= maxAttempts || !(e instanceof TransientAPIError)) {
                throw new RetryExhaustedError(e, attempt);
            }

            const delayMs = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs, jitterFactor);
            warn(`${description} failed (attempt ${attempt}/${maxAttempts}): ${e.message}; retrying in ${delayMs}ms`);
            await sleep(delayMs);
        }
    }
}

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number, jitterFactor: number): number {
    const capped = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
    const jitter = capped * jitterFactor * (Math.random() * 2 - 1);
    return Math.round(Math.max(0, Math.min(maxDelayMs, capped + jitter)));
}

function sleep(ms: number): Promise<void> {
    if (ms <= 0) {
        return Promise.resolve();
    }
    return new Promise((resolve) => setTimeout(resolve, ms));
}
