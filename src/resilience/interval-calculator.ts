/**
 * Retry interval calculators.
 */

import { Jitter, RandomJitter } from './jitter';

/**
 * Computes how long to wait before the next attempt
 */
export interface RetryIntervalCalculator {
  /**
   * @param currentAttempt - zero-origin number of retries already done
   * @returns sleep duration in ms
   */
  calculateSleepDuration(currentAttempt: number): number;
}

/**
 * Always waits the same amount of time
 */
export class FixedValueRetryIntervalCalculator implements RetryIntervalCalculator {
  constructor(readonly fixedIntervalMs = 500) {}

  calculateSleepDuration(_currentAttempt?: number): number {
    return this.fixedIntervalMs;
  }
}

/**
 * Backoff calculator options
 */
export interface BackoffOptions {
  /** Base interval in ms, doubled on every attempt */
  backoffFactorMs?: number;
  /** Upper bound for the interval before jitter, in ms */
  maxDelayMs?: number;
  /** Jitter applied to the capped interval */
  jitter?: Jitter;
}

/**
 * Exponential backoff and jitter: `jitter(min(backoffFactor * 2^attempt, maxDelay))`.
 *
 * The jittered value is kept between this attempt's interval and the next
 * one's, so delays never decrease across attempts. Once the interval reaches
 * `maxDelayMs` the delay is exactly `maxDelayMs`.
 */
export class BackoffRetryIntervalCalculator implements RetryIntervalCalculator {
  readonly backoffFactorMs: number;
  readonly maxDelayMs: number;
  readonly jitter: Jitter;

  constructor(options: BackoffOptions = {}) {
    this.backoffFactorMs = options.backoffFactorMs ?? 500;
    this.maxDelayMs = options.maxDelayMs ?? 60000;
    this.jitter = options.jitter ?? new RandomJitter();
  }

  calculateSleepDuration(currentAttempt: number): number {
    const attempt = Math.max(0, currentAttempt);
    const interval = this.interval(attempt);
    const ceiling = this.interval(attempt + 1);
    return Math.min(Math.max(this.jitter.recalculate(interval), interval), ceiling);
  }

  private interval(attempt: number): number {
    return Math.min(this.backoffFactorMs * Math.pow(2, attempt), this.maxDelayMs);
  }
}

export const defaultIntervalCalculator: RetryIntervalCalculator = new BackoffRetryIntervalCalculator();
