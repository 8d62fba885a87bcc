import { PermanentAPIError, TransientAPIError } from '@stackplan/core';
import { RetryExhaustedError, backoffDelay, withRetry } from '../../src/executor/retry';
import { mockLogger } from '../utils';

const NO_DELAY = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 };

beforeAll(() => {
    mockLogger();
});

describe('withRetry', () => {
    test('returns the first success with the attempt count', async () => {
        const fn = jest
            .fn<Promise<string>, []>()
            .mockRejectedValueOnce(new TransientAPIError('throttled', 'Throttling'))
            .mockResolvedValueOnce('done');
        await expect(withRetry(fn, 'create Bucket', NO_DELAY)).resolves.toEqual({ value: 'done', attempts: 2 });
        expect(fn).toHaveBeenCalledTimes(2);
    });

    test('gives up after the maximum number of attempts', async () => {
        const fn = jest.fn<Promise<string>, []>().mockRejectedValue(new TransientAPIError('throttled'));
        const result = withRetry(fn, 'create Bucket', NO_DELAY);
        await expect(result).rejects.toBeInstanceOf(RetryExhaustedError);
        await expect(result).rejects.toMatchObject({ attempts: 3, message: 'throttled' });
        expect(fn).toHaveBeenCalledTimes(3);
    });

    test('does not retry permanent errors', async () => {
        const permanent = new PermanentAPIError('invalid property', 'ValidationError');
        const fn = jest.fn<Promise<string>, []>().mockRejectedValue(permanent);
        await expect(withRetry(fn, 'create Bucket', NO_DELAY)).rejects.toMatchObject({
            attempts: 1,
            lastError: permanent,
        });
        expect(fn).toHaveBeenCalledTimes(1);
    });

    test('logs each retry', async () => {
        const logger = mockLogger();
        const fn = jest
            .fn<Promise<number>, []>()
            .mockRejectedValueOnce(new TransientAPIError('connection reset'))
            .mockResolvedValueOnce(1);
        await withRetry(fn, 'update Distribution', NO_DELAY);
        expect(logger.warn).toHaveBeenCalledWith(
            'update Distribution failed (attempt 1/3): connection reset; retrying in 0ms',
        );
    });
});

describe('backoffDelay', () => {
    test('doubles up to the cap without jitter', () => {
        expect([1, 2, 3, 4, 5, 6].map((attempt) => backoffDelay(attempt, 100, 1000, 0))).toEqual([
            100, 200, 400, 800, 1000, 1000,
        ]);
    });

    test('jitter stays within bounds', () => {
        for (let i = 0; i < 50; i++) {
            const delay = backoffDelay(3, 100, 10_000, 0.5);
            expect(delay).toBeGreaterThanOrEqual(200);
            expect(delay).toBeLessThanOrEqual(600);
        }
    });
});
