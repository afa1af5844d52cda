import { describe, expect, it } from 'vitest';
import {
  CancelledError,
  ClientError,
  ServerError,
  TimeoutError,
  UnknownError,
} from '@/errors/error-types';
import { RetryController } from '@/errors/retry-strategy';
import { DEFAULT_RETRY_POLICY } from '@/models/config';

describe('RetryController', () => {
  describe('delayFor', () => {
    it('grows exponentially from the base delay and is capped', () => {
      const controller = new RetryController();

      expect(controller.delayFor(0)).toBe(1000);
      expect(controller.delayFor(1)).toBe(2000);
      expect(controller.delayFor(2)).toBe(3000);
      expect(controller.delayFor(10)).toBe(3000);
    });

    it('uses the configured base and unit', () => {
      const controller = new RetryController({ exponentialBase: 3, baseDelayMs: 10, maxDelayMs: 1000 });

      expect(controller.delayFor(0)).toBe(10);
      expect(controller.delayFor(2)).toBe(90);
      expect(controller.delayFor(5)).toBe(1000);
    });
  });

  describe('shouldRetry', () => {
    const controller = new RetryController({ maxRetries: 3 });

    it('retries server errors, timeouts and unknown errors while attempts remain', () => {
      expect(controller.shouldRetry(0, new ServerError(503, ''))).toEqual({ retry: true, delayMs: 1000 });
      expect(controller.shouldRetry(1, new TimeoutError('request timeout', 'request'))).toEqual({
        retry: true,
        delayMs: 2000,
      });
      expect(controller.shouldRetry(2, new UnknownError('socket hang up'))).toEqual({ retry: true, delayMs: 3000 });
    });

    it('stops once maxRetries attempts have been retried', () => {
      expect(controller.shouldRetry(3, new ServerError(500, ''))).toEqual({ retry: false, delayMs: 0 });
    });

    it('never retries client errors or cancellations', () => {
      expect(controller.shouldRetry(0, new ClientError(404, ''))).toEqual({ retry: false, delayMs: 0 });
      expect(controller.shouldRetry(0, new ClientError(429, ''))).toEqual({ retry: false, delayMs: 0 });
      expect(controller.shouldRetry(0, new CancelledError())).toEqual({ retry: false, delayMs: 0 });
    });

    it('does not retry at all with the default policy', () => {
      expect(new RetryController().shouldRetry(0, new ServerError(500, '')).retry).toBe(false);
    });
  });

  it('fills unspecified fields from the defaults', () => {
    expect(new RetryController({ maxRetries: 2 }).getPolicy()).toEqual({ ...DEFAULT_RETRY_POLICY, maxRetries: 2 });
  });
});
