import { ProviderError, describeError } from './errors.js';
import { getLogger } from './logger.js';

const logger = getLogger();

/**
 * Options for a bounded retry policy.
 */
export interface RetryPolicyOptions {
    /** Total attempts, including the first one */
    maxAttempts?: number;
    /** Delay before the second attempt */
    delayMs?: number;
    /** `fixed` waits `delayMs` every time; `exponential` doubles it per attempt */
    backoff?: 'fixed' | 'exponential';
    /** Upper bound for exponential delays */
    maxDelayMs?: number;
    /** Decides whether a failure is worth another attempt */
    isRetryable?: (error: unknown) => boolean;
    /** Injected for tests */
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Thrown when every attempt failed with a retryable error.
 */
export class RetryExhaustedError extends Error {
    constructor(
        public readonly operation: string,
        public readonly attempts: number,
        cause: unknown
    ) {
        super(`${operation} failed after ${attempts} attempts: ${describeError(cause)}`, { cause });
        this.name = 'RetryExhaustedError';
    }
}

/**
 * Default predicate: only provider errors flagged as transient are retried.
 */
export function isTransientProviderError(error: unknown): boolean {
    return error instanceof ProviderError && error.retryable;
}

/**
 * Bounded retry policy applied at each provider call site.
 *
 * A non-retryable error is rethrown as-is on the attempt that raised it.
 * When attempts run out, a `RetryExhaustedError` wraps the last error.
 */
export class RetryPolicy {
    readonly maxAttempts: number;
    readonly delayMs: number;
    readonly backoff: 'fixed' | 'exponential';
    private readonly maxDelayMs: number;
    private readonly isRetryable: (error: unknown) => boolean;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(options: RetryPolicyOptions = {}) {
        this.maxAttempts = Math.max(1, options.maxAttempts ?? 10);
        this.delayMs = Math.max(0, options.delayMs ?? 1000);
        this.backoff = options.backoff ?? 'fixed';
        this.maxDelayMs = options.maxDelayMs ?? 30000;
        this.isRetryable = options.isRetryable ?? isTransientProviderError;
        this.sleep = options.sleep ?? sleep;
    }

    /**
     * Run `fn` until it succeeds, fails with a non-retryable error,
     * or `maxAttempts` is reached.
     */
    async execute<T>(operation: string, fn: (attempt: number) => Promise<T>): Promise<T> {
        let lastError: unknown;

        for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
            try {
                return await fn(attempt);
            } catch (error) {
                if (!this.isRetryable(error)) throw error;
                lastError = error;

                if (attempt < this.maxAttempts) {
                    const delay = this.delayFor(attempt);
                    logger.warn(
                        { operation, attempt, maxAttempts: this.maxAttempts, delayMs: delay, error: describeError(error) },
                        'Transient provider error, retrying'
                    );
                    await this.sleep(delay);
                }
            }
        }

        throw new RetryExhaustedError(operation, this.maxAttempts, lastError);
    }

    /**
     * Delay after the given (1-based) failed attempt.
     */
    delayFor(attempt: number): number {
        if (this.backoff === 'fixed') return this.delayMs;
        return Math.min(this.maxDelayMs, this.delayMs * Math.pow(2, attempt - 1));
    }
}

/**
 * Sleep for the specified number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise((resolve) => setTimeout(resolve, ms));
}
