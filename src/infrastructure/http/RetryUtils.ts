/**
 * Retry Utilities
 *
 * Exponential backoff for transient failures of external API calls.
 */

import axios from 'axios';

export interface RetryOptions {
    /** Maximum number of attempts (default: 2) */
    maxAttempts?: number;
    /** Initial backoff delay in milliseconds (default: 1000) */
    initialBackoffMs?: number;
    /** Maximum backoff delay in milliseconds (default: 30000) */
    maxBackoffMs?: number;
    /** Backoff multiplier (default: 2) */
    backoffMultiplier?: number;
    /** Optional jitter to add randomness (0-1, default: 0) */
    jitter?: number;
    /** Function to determine if error is retryable (default: all errors) */
    isRetryable?: (error: unknown) => boolean;
    /** Callback for each retry attempt */
    onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
    maxAttempts: 2,
    initialBackoffMs: 1000,
    maxBackoffMs: 30000,
    backoffMultiplier: 2,
    jitter: 0,
    isRetryable: () => true,
    onRetry: () => { }
};

/**
 * Execute a function with exponential backoff retry logic.
 * Rethrows the last error once attempts run out or the error is not retryable.
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options?: RetryOptions
): Promise<T> {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));
    let currentBackoff = opts.initialBackoffMs;

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn();
        } catch (error) {
            if (attempt >= maxAttempts || !opts.isRetryable(error)) {
                throw error;
            }

            const jitterAmount = currentBackoff * opts.jitter * (Math.random() * 2 - 1);
            const delay = Math.max(0, Math.min(currentBackoff + jitterAmount, opts.maxBackoffMs));

            opts.onRetry(attempt, error, delay);
            await sleep(delay);

            currentBackoff = Math.min(currentBackoff * opts.backoffMultiplier, opts.maxBackoffMs);
        }
    }
}

/**
 * HTTP status of a failed request, if it got a response.
 */
export function httpStatusOf(error: unknown): number | undefined {
    if (axios.isAxiosError(error)) {
        return error.response?.status;
    }
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return undefined;
}

/**
 * Rate limits (429), server errors (5xx) and network errors are retryable.
 * Other client errors are not.
 */
export function isRetryableHttpError(error: unknown): boolean {
    if (!axios.isAxiosError(error) && httpStatusOf(error) === undefined) {
        // Not an HTTP failure at all (e.g. a local write error)
        return false;
    }

    const status = httpStatusOf(error);
    if (status === undefined) {
        // Network error (no response)
        return true;
    }

    return status === 429 || (status >= 500 && status < 600);
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
