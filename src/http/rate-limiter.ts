/**
 * Request spacing for upstream services
 *
 * One limiter is shared by every request of a query, so the spacing holds
 * across the locator and each pagination step. It blocks in-process; it
 * does not coordinate with other processes.
 */

import { setTimeout as delay } from "node:timers/promises";
import { ValidationError } from "../errors";
import type { Clock } from "../types";

export interface RateLimiterOptions {
  /** Minimum spacing between two acquisitions */
  minIntervalSeconds: number;
}

/**
 * Wall clock backed by `Date.now` and timers
 */
export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms: number) => {
    await delay(ms);
  },
};

/**
 * Enforces a minimum interval between consecutive requests
 *
 * @example
 * ```typescript
 * const limiter = new RateLimiter({ minIntervalSeconds: 1 });
 * await limiter.acquire(); // immediate
 * await limiter.acquire(); // waits until one second after the first
 * ```
 */
export class RateLimiter {
  private readonly minIntervalMs: number;
  /** Time reserved by the most recent acquisition */
  private lastSlotAt: number | undefined;

  constructor(
    options: RateLimiterOptions,
    private readonly clock: Clock = systemClock
  ) {
    if (!Number.isFinite(options.minIntervalSeconds) || options.minIntervalSeconds < 0) {
      throw new ValidationError(
        `minIntervalSeconds must be a non-negative number (was ${options.minIntervalSeconds})`
      );
    }
    this.minIntervalMs = options.minIntervalSeconds * 1000;
  }

  /**
   * Wait until a request may be issued
   *
   * The slot is reserved before sleeping, so concurrent callers queue up
   * one interval apart instead of waking together.
   *
   * @returns Milliseconds spent waiting
   */
  async acquire(): Promise<number> {
    const now = this.clock.now();
    const slot =
      this.lastSlotAt === undefined ? now : Math.max(now, this.lastSlotAt + this.minIntervalMs);
    this.lastSlotAt = slot;

    const waitMs = slot - now;
    if (waitMs > 0) {
      await this.clock.sleep(waitMs);
    }
    return waitMs;
  }
}
