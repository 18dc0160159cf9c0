import { describe, it, expect, vi } from 'vitest';
import { RetryExhaustedError, RetryPolicy, isTransientProviderError } from '../utils/retry.js';
import { ProviderError } from '../utils/errors.js';
import { transientError } from './helpers.js';

describe('RetryPolicy', () => {
    it('should return the first successful result without sleeping', async () => {
        const sleep = vi.fn(async () => {});
        const policy = new RetryPolicy({ sleep });

        await expect(policy.execute('op', async () => 'ok')).resolves.toBe('ok');
        expect(sleep).not.toHaveBeenCalled();
    });

    it('should succeed after fewer than maxAttempts transient failures', async () => {
        const sleep = vi.fn(async (_ms: number) => {});
        const policy = new RetryPolicy({ sleep });
        let calls = 0;

        const result = await policy.execute('op', async (attempt) => {
            calls++;
            if (attempt <= 9) throw transientError();
            return attempt;
        });

        expect(result).toBe(10);
        expect(calls).toBe(10);
        expect(sleep).toHaveBeenCalledTimes(9);
        expect(sleep).toHaveBeenCalledWith(1000);
    });

    it('should stop after exactly maxAttempts and wrap the last error', async () => {
        const sleep = vi.fn(async () => {});
        const policy = new RetryPolicy({ sleep });
        let calls = 0;

        const error = await policy
            .execute('embed text', async () => {
                calls++;
                throw transientError();
            })
            .catch((e: unknown) => e);

        expect(calls).toBe(10);
        expect(sleep).toHaveBeenCalledTimes(9);
        expect(error).toBeInstanceOf(RetryExhaustedError);
        if (error instanceof RetryExhaustedError) {
            expect(error.attempts).toBe(10);
            expect(error.operation).toBe('embed text');
            expect(error.cause).toBeInstanceOf(ProviderError);
        }
    });

    it('should rethrow a non-retryable error on the first attempt', async () => {
        const sleep = vi.fn(async () => {});
        const policy = new RetryPolicy({ sleep });
        const permanent = new ProviderError('bad request', 'fake', false, 400);
        let calls = 0;

        await expect(
            policy.execute('op', async () => {
                calls++;
                throw permanent;
            })
        ).rejects.toBe(permanent);
        expect(calls).toBe(1);
        expect(sleep).not.toHaveBeenCalled();
    });

    it('should honour a custom predicate', async () => {
        const policy = new RetryPolicy({ maxAttempts: 3, isRetryable: () => true, sleep: async () => {} });
        let calls = 0;

        await expect(
            policy.execute('op', async () => {
                calls++;
                throw new Error('anything');
            })
        ).rejects.toBeInstanceOf(RetryExhaustedError);
        expect(calls).toBe(3);
    });

    it('should compute fixed and capped exponential delays', () => {
        const fixed = new RetryPolicy({ delayMs: 1000 });
        expect([1, 2, 3].map((a) => fixed.delayFor(a))).toEqual([1000, 1000, 1000]);

        const exponential = new RetryPolicy({ delayMs: 1000, backoff: 'exponential' });
        expect([1, 2, 3, 5, 6].map((a) => exponential.delayFor(a))).toEqual([1000, 2000, 4000, 16000, 30000]);
    });

    it('should classify only retryable provider errors as transient', () => {
        expect(isTransientProviderError(transientError())).toBe(true);
        expect(isTransientProviderError(new ProviderError('no', 'fake', false, 401))).toBe(false);
        expect(isTransientProviderError(new Error('plain'))).toBe(false);
    });
});
