/**
 * Retry, backoff and circuit-breaker decisions
 */

import type { SyncLogEntry, Timestamp } from './types';

export interface RetryPolicyConfig {
  /** Attempts an entry gets before it is held for recovery */
  maxAttempts: number;
  /** Milliseconds */
  baseDelay: number;
  /** Milliseconds */
  maxDelay: number;
  /** Consecutive failed cycles that trip the circuit breaker */
  maxAbsoluteFailures: number;
  /** Milliseconds an exhausted entry waits after its last attempt before it is tried again */
  recheckInterval: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicyConfig = {
  maxAttempts: 3,
  baseDelay: 30_000,
  maxDelay: 480_000,
  maxAbsoluteFailures: 10,
  recheckInterval: 3_600_000,
};

export class RetryPolicy {
  readonly config: RetryPolicyConfig;

  constructor(config: Partial<RetryPolicyConfig> = {}) {
    this.config = { ...DEFAULT_RETRY_POLICY, ...config };
  }

  shouldRetry(attemptCount: number): boolean {
    return attemptCount < this.config.maxAttempts;
  }

  /**
   * Exponential backoff: base * 2^(n-1), capped at maxDelay
   */
  delayFor(attemptNumber: number): number {
    const { baseDelay, maxDelay } = this.config;
    if (attemptNumber <= 0) return baseDelay;
    const exponent = Math.floor(attemptNumber) - 1;
    return Math.min(baseDelay * Math.pow(2, exponent), maxDelay);
  }

  enterRecovery(consecutiveFailures: number): boolean {
    return consecutiveFailures >= this.config.maxAbsoluteFailures;
  }

  isExhausted(entry: Pick<SyncLogEntry, 'retryCount'>): boolean {
    return !this.shouldRetry(entry.retryCount);
  }

  /**
   * Entries with attempts left are always due; exhausted ones once
   * `recheckInterval` has passed since their last attempt
   */
  isDue(entry: Pick<SyncLogEntry, 'retryCount' | 'lastAttemptAt'>, at: Timestamp): boolean {
    if (this.shouldRetry(entry.retryCount)) return true;
    if (entry.lastAttemptAt === undefined) return true;
    return at - entry.lastAttemptAt >= this.config.recheckInterval;
  }
}
