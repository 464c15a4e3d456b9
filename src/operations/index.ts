/**
 * GeneFrequencyClient - gene lookup followed by interval pagination
 *
 * Wires one configuration, one transport and one rate limiter into a
 * locator and a paginator, so every request of a query observes the same
 * spacing.
 */

import { type ClientConfig, type ClientConfigOverrides, resolveConfig } from "../config";
import { RateLimiter, systemClock } from "../http/rate-limiter";
import { fetchTransport } from "../http/transport";
import { createLogger, type Logger, logError } from "../logger";
import type { Clock, FrequencyResultSet, GeneLocation, HttpTransport } from "../types";
import { GeneLocator } from "./locate";
import { IntervalPaginator } from "./paginate";

export interface GeneFrequencyOptions extends ClientConfigOverrides {
  /** Defaults to the fetch-based transport */
  transport?: HttpTransport;
  /** Defaults to the wall clock */
  clock?: Clock;
  /** Parent logger; components log through children of it */
  logger?: Logger;
  /** Environment to read configuration from, `process.env` by default */
  env?: Readonly<Record<string, string | undefined>>;
}

export interface GeneFrequencyResult {
  readonly geneId: string;
  readonly location: GeneLocation;
  readonly records: FrequencyResultSet;
}

/**
 * Client for gene-scoped frequency queries
 *
 * @example
 * ```typescript
 * const client = new GeneFrequencyClient({ minIntervalSeconds: 1 });
 * const { location, records } = await client.fetchGene("672");
 * console.log(`${location.accession}:${location.start}-${location.stop}: ${records.size}`);
 * ```
 */
export class GeneFrequencyClient {
  readonly config: ClientConfig;
  readonly locator: GeneLocator;
  readonly paginator: IntervalPaginator;
  private readonly log: Logger;

  constructor(options: GeneFrequencyOptions = {}) {
    const { transport = fetchTransport, clock = systemClock, logger, env, ...overrides } = options;

    this.config = resolveConfig(overrides, env);
    this.log = logger?.child({ component: "client" }) ?? createLogger("client");

    const rateLimiter = new RateLimiter(
      { minIntervalSeconds: this.config.minIntervalSeconds },
      clock
    );

    this.locator = new GeneLocator({
      summaryUrl: this.config.summaryUrl,
      transport,
      rateLimiter,
      logger: logger?.child({ component: "locator" }) ?? createLogger("locator"),
    });

    this.paginator = new IntervalPaginator({
      frequencyUrl: this.config.frequencyUrl,
      transport,
      rateLimiter,
      clock,
      logger: logger?.child({ component: "paginator" }) ?? createLogger("paginator"),
      maxIterations: this.config.maxIterations,
      maxDurationMs: this.config.maxDurationMs,
    });
  }

  /**
   * Resolve a gene and fetch every frequency record overlapping it
   *
   * @throws {GeneFreqError} Any locator or paginator failure, unchanged
   */
  async fetchGene(geneId: string): Promise<GeneFrequencyResult> {
    try {
      const location = await this.locator.resolve(geneId);
      const records = await this.paginator.fetchAll(
        location.accession,
        location.start,
        location.stop
      );
      return { geneId, location, records };
    } catch (error) {
      logError(this.log, error, { geneId });
      throw error;
    }
  }
}

/**
 * One-shot gene frequency query with a fresh client
 */
export async function fetchGeneFrequencies(
  geneId: string,
  options?: GeneFrequencyOptions
): Promise<GeneFrequencyResult> {
  return new GeneFrequencyClient(options).fetchGene(geneId);
}
