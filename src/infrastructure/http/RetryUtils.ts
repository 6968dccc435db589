/**
 * Retry Utilities
 *
 * Exponential backoff for transient failures. Wraps single provider calls;
 * the orchestrator itself never retries.
 */

export interface RetryOptions {
    /** Maximum number of attempts, including the first (default: 3) */
    maxAttempts?: number;
    /** Initial backoff delay in milliseconds (default: 1000) */
    initialBackoffMs?: number;
    /** Maximum backoff delay in milliseconds (default: 30000) */
    maxBackoffMs?: number;
    /** Backoff multiplier (default: 2) */
    backoffMultiplier?: number;
    /** Optional jitter to add randomness (0-1, default: 0.1) */
    jitter?: number;
    /** Decides whether an error is worth another attempt (default: all errors) */
    isRetryable?: (error: unknown) => boolean;
    /** Called before each retry */
    onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;
    /** Sleep implementation, replaceable in tests */
    sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
    maxAttempts: 3,
    initialBackoffMs: 1000,
    maxBackoffMs: 30000,
    backoffMultiplier: 2,
    jitter: 0.1,
    isRetryable: () => true,
    onRetry: () => { },
    sleep,
};

/**
 * Execute a function with exponential backoff retry logic.
 *
 * @throws The last error if all attempts fail or the error is not retryable
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options?: RetryOptions
): Promise<T> {
    const opts: Required<RetryOptions> = { ...DEFAULT_OPTIONS, ...options };
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
            await opts.sleep(delay);

            currentBackoff = Math.min(currentBackoff * opts.backoffMultiplier, opts.maxBackoffMs);
        }
    }
}

/**
 * Whether an HTTP status indicates a transient condition.
 * Network errors (no status), rate limits and 5xx are transient; other 4xx are not.
 */
export function isTransientStatus(status: number | undefined): boolean {
    if (status === undefined) {
        return true;
    }
    return status === 429 || (status >= 500 && status < 600);
}
