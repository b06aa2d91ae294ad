/**
 * Jitter strategies applied on top of a computed retry interval.
 */

/**
 * Jitter interface
 */
export interface Jitter {
  /**
   * Return a new duration (ms) with the jitter amount applied
   */
  recalculate(durationMs: number): number;
}

/**
 * Adds a uniformly random amount in [0, maxJitterMs)
 */
export class RandomJitter implements Jitter {
  constructor(private readonly maxJitterMs = 1000) {}

  recalculate(durationMs: number): number {
    return durationMs + Math.random() * this.maxJitterMs;
  }
}

/**
 * Moves the duration by up to ±factor of itself, never below zero
 */
export class ProportionalJitter implements Jitter {
  constructor(private readonly factor = 0.1) {}

  recalculate(durationMs: number): number {
    const jitter = durationMs * this.factor * (Math.random() * 2 - 1);
    return Math.max(0, durationMs + jitter);
  }
}

/**
 * Leaves the duration untouched
 */
export const noJitter: Jitter = {
  recalculate: (durationMs: number) => durationMs,
};
