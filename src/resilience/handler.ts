/**
 * RetryHandler interface.
 *
 * Clients take an ordered list of handlers. After a failed attempt the first
 * handler whose `canRetry` holds prepares the next attempt; when none does,
 * the failure goes back to the caller.
 */

import { HttpRequest, HttpResponse } from '../transport';
import { RetryState } from './state';
import { RetryIntervalCalculator, defaultIntervalCalculator } from './interval-calculator';

/**
 * What a handler gets to look at after a failed attempt
 */
export interface RetryContext {
  state: RetryState;
  request: HttpRequest;
  /** Present when the server answered (non-2xx) */
  response?: HttpResponse;
  /** Present when the request threw */
  error?: unknown;
}

export type Sleep = (ms: number) => Promise<void>;

/**
 * Sleep for a duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Options shared by all handlers
 */
export interface RetryHandlerOptions {
  /** Maximum number of retries this handler grants (default 1) */
  maxRetryCount?: number;
  intervalCalculator?: RetryIntervalCalculator;
  sleep?: Sleep;
}

export abstract class RetryHandler {
  readonly maxRetryCount: number;
  readonly intervalCalculator: RetryIntervalCalculator;
  protected readonly sleep: Sleep;

  constructor(options: RetryHandlerOptions = {}) {
    this.maxRetryCount = Math.max(0, options.maxRetryCount ?? 1);
    this.intervalCalculator = options.intervalCalculator ?? defaultIntervalCalculator;
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Whether this handler takes responsibility for another attempt
   */
  canRetry(context: RetryContext): boolean {
    if (context.state.currentAttempt >= this.maxRetryCount) {
      return false;
    }
    return this.canRetryCustom(context);
  }

  /**
   * Handler-specific predicate, only consulted while retries remain
   */
  protected abstract canRetryCustom(context: RetryContext): boolean;

  /**
   * Wait for the computed delay and bump the attempt counter.
   *
   * @returns the delay that was waited, in ms
   */
  async prepareForNextAttempt(context: RetryContext): Promise<number> {
    context.state.nextAttemptRequested = true;
    const delay = this.computeDelay(context);
    await this.sleep(delay);
    context.state.incrementCurrentAttempt();
    return delay;
  }

  /**
   * Delay before the next attempt, in ms
   */
  computeDelay(context: RetryContext): number {
    return this.intervalCalculator.calculateSleepDuration(context.state.currentAttempt);
  }
}
