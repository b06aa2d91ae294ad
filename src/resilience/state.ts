/**
 * Mutable retry bookkeeping shared by every handler for one logical request.
 */
export class RetryState {
  /** Zero-origin count of retries already performed */
  currentAttempt: number;
  /** Set by a handler that wants another attempt; reset before each try */
  nextAttemptRequested = false;
  /** Free-form values custom handlers can keep between attempts */
  customValues: Record<string, unknown>;

  constructor(options: { currentAttempt?: number; customValues?: Record<string, unknown> } = {}) {
    this.currentAttempt = Math.max(0, options.currentAttempt ?? 0);
    this.customValues = options.customValues ?? {};
  }

  incrementCurrentAttempt(): number {
    this.currentAttempt += 1;
    return this.currentAttempt;
  }
}
