/**
 * Retry decisions with exponential backoff for failed request attempts.
 */

import { DEFAULT_RETRY_POLICY, type RetryPolicy } from '@/models/config';
import { Logger } from '@/utils/logger';
import type { NetworkError } from './error-types';

/**
 * Outcome of asking whether a failed attempt should be repeated
 */
export interface RetryDecision {
  retry: boolean;
  delayMs: number;
}

const NO_RETRY: RetryDecision = { retry: false, delayMs: 0 };

/**
 * Decides whether a failed attempt is retried and how long to wait first.
 *
 * Server errors, timeouts and unclassified transport failures are retried.
 * Client errors signal a defect in the request and cancellations are the
 * caller's decision, so neither is ever retried. Attempts are numbered from 0
 * and retried while the number is below `maxRetries`.
 */
export class RetryController {
  private policy: RetryPolicy;
  private logger?: Logger;

  constructor(policy: Partial<RetryPolicy> = {}, logger?: Logger) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...policy };
    this.logger = logger;
  }

  shouldRetry(attemptNumber: number, error: NetworkError): RetryDecision {
    if (!this.isRetryable(error)) {
      return NO_RETRY;
    }

    if (attemptNumber >= this.policy.maxRetries) {
      this.logger?.debug(`Max retries (${this.policy.maxRetries}) reached`);
      return NO_RETRY;
    }

    return { retry: true, delayMs: this.delayFor(attemptNumber) };
  }

  /**
   * min(maxDelayMs, exponentialBase^attemptNumber * baseDelayMs)
   */
  delayFor(attemptNumber: number): number {
    const exponentialDelay = this.policy.baseDelayMs * Math.pow(this.policy.exponentialBase, attemptNumber);
    return Math.min(exponentialDelay, this.policy.maxDelayMs);
  }

  isRetryable(error: NetworkError): boolean {
    switch (error.kind) {
      case 'server':
      case 'timeout':
      case 'unknown':
        return true;
      case 'client':
      case 'cancelled':
        return false;
    }
  }

  getPolicy(): Readonly<RetryPolicy> {
    return this.policy;
  }
}
