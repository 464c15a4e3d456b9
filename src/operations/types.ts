/**
 * Shared option types for the locator and the paginator
 */

import type { RateLimiter } from "../http/rate-limiter";
import type { Logger } from "../logger";
import type { Clock, HttpTransport } from "../types";

/**
 * Collaborators every upstream-facing operation needs
 *
 * The same rate limiter must be handed to every operation of one query so
 * the spacing holds across them.
 */
export interface UpstreamContext {
  transport: HttpTransport;
  rateLimiter: RateLimiter;
  logger?: Logger;
}

export interface GeneLocatorOptions extends UpstreamContext {
  /** Gene summary endpoint */
  summaryUrl: string;
}

export interface IntervalPaginatorOptions extends UpstreamContext {
  /** Base of the frequency service */
  frequencyUrl: string;
  /** Time source for the duration guard; should match the rate limiter's */
  clock?: Clock;
  /** Upper bound on requests per run */
  maxIterations: number;
  /** Upper bound on wall time per run; unbounded when absent */
  maxDurationMs?: number;
}
