import { Logger } from '@nestjs/common';
import {
  RetryOptions,
  TRANSACTION_RETRY_OPTIONS,
  calculateBackoffDelay,
  isRetryableError,
  withRetry,
} from '@common/utils/retry.util';

describe('retry.util', () => {
  describe('calculateBackoffDelay', () => {
    const options: RetryOptions = {
      maxRetries: 5,
      baseDelayMs: 100,
      maxDelayMs: 1000,
      backoffMultiplier: 2,
      jitterFactor: 0,
    };

    it('should double the delay on each attempt', () => {
      expect([0, 1, 2, 3].map((attempt) => calculateBackoffDelay(attempt, options))).toEqual([
        100, 200, 400, 800,
      ]);
    });

    it('should cap the delay at maxDelayMs', () => {
      expect(calculateBackoffDelay(10, options)).toBe(1000);
    });

    it('should add at most jitterFactor of the delay as jitter', () => {
      const delays = Array.from({ length: 20 }, () =>
        calculateBackoffDelay(0, { ...options, jitterFactor: 0.5 }),
      );

      expect(Math.min(...delays)).toBeGreaterThanOrEqual(100);
      expect(Math.max(...delays)).toBeLessThanOrEqual(150);
    });
  });

  describe('isRetryableError', () => {
    it.each(['40001', '40P01', '08006', '08001', '57P01', 'ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED'])(
      'should retry error code %s',
      (code) => {
        expect(isRetryableError({ code })).toBe(true);
      },
    );

    it('should retry on transient messages', () => {
      expect(isRetryableError(new Error('Connection terminated unexpectedly'))).toBe(true);
      expect(isRetryableError(new Error('Query read timeout'))).toBe(true);
      expect(isRetryableError(new Error('sorry, too many connections'))).toBe(true);
    });

    it('should not retry a unique violation', () => {
      expect(
        isRetryableError({ code: '23505', message: 'duplicate key value violates unique constraint' }),
      ).toBe(false);
    });

    it('should not retry non-objects', () => {
      expect(isRetryableError(null)).toBe(false);
      expect(isRetryableError(undefined)).toBe(false);
      expect(isRetryableError('connection lost')).toBe(false);
    });
  });

  describe('withRetry', () => {
    it('should return the first successful result', async () => {
      const fn = jest.fn().mockResolvedValue('committed');

      await expect(withRetry(fn)).resolves.toBe('committed');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should retry a serialization failure and then succeed', async () => {
      const fn = jest
        .fn()
        .mockRejectedValueOnce({ code: '40001' })
        .mockResolvedValueOnce('committed');

      await expect(withRetry(fn, { ...TRANSACTION_RETRY_OPTIONS, baseDelayMs: 1 })).resolves.toBe(
        'committed',
      );
      expect(fn).toHaveBeenCalledTimes(2);
    });

    it('should give up after maxRetries and rethrow the last error', async () => {
      const fn = jest.fn().mockRejectedValue({ code: 'ECONNRESET', message: 'Connection reset' });

      await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 1 })).rejects.toEqual({
        code: 'ECONNRESET',
        message: 'Connection reset',
      });
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should rethrow a non-retryable error at once', async () => {
      const fn = jest.fn().mockRejectedValue({ code: '23505' });

      await expect(withRetry(fn, { maxRetries: 3 })).rejects.toEqual({ code: '23505' });
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should log each retry and the final failure', async () => {
      const logger = new Logger('RetryTest');
      const warn = jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
      const error = jest.spyOn(logger, 'error').mockImplementation(() => undefined);
      const fn = jest.fn().mockRejectedValue(new Error('deadlock detected'));

      await expect(
        withRetry(fn, { maxRetries: 1, baseDelayMs: 1 }, logger, 'Booking transaction'),
      ).rejects.toThrow('deadlock detected');

      expect(warn).toHaveBeenCalledTimes(1);
      expect(error).toHaveBeenCalledWith(
        'Booking transaction failed after 2 attempts: deadlock detected',
      );
    });
  });
});
