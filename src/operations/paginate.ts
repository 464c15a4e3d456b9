/**
 * IntervalPaginator - Retrieve every frequency record overlapping an interval
 *
 * The frequency service caps each response at a fixed page size and signals
 * a truncated page with HTTP 206. It supplies no cursor: the next query
 * starts one past the highest position covered by the records received so
 * far, and runs to the original stop.
 *
 * Runs as an explicit loop over {@link PaginationState}; each run owns its
 * own accumulator, so concurrent runs on one paginator do not share state.
 */

import { type } from "arktype";
import {
  type GeneFreqError,
  PaginationLimitError,
  ProtocolError,
  TransportError,
  ValidationError,
} from "../errors";
import { systemClock } from "../http/rate-limiter";
import { createLogger, type Logger } from "../logger";
import type { Clock, FrequencyResultSet, HttpResponse } from "../types";
import { parseFrequencyBody } from "../types";
import { FrequencyAccumulator } from "./core/accumulator";
import type { IntervalPaginatorOptions } from "./types";

/** Full result set returned */
export const STATUS_COMPLETE = 200;
/** Page truncated at the service's page size */
export const STATUS_PARTIAL = 206;

/**
 * Pagination state machine
 *
 * `failed` carries the error the run terminates with.
 */
export type PaginationState =
  | { readonly kind: "query"; readonly start: number; readonly stop: number }
  | { readonly kind: "done" }
  | { readonly kind: "failed"; readonly error: GeneFreqError };

/**
 * Paginator for the overlapping-frequency-records endpoint
 *
 * @example
 * ```typescript
 * const paginator = new IntervalPaginator({
 *   frequencyUrl: config.frequencyUrl,
 *   transport: fetchTransport,
 *   rateLimiter,
 *   maxIterations: 10_000,
 * });
 * const records = await paginator.fetchAll("NC_000017.11", 43044294, 43125482);
 * console.log(`${records.size} variants`);
 * ```
 */
export class IntervalPaginator {
  private readonly log: Logger;
  private readonly clock: Clock;

  constructor(private readonly options: IntervalPaginatorOptions) {
    if (!Number.isInteger(options.maxIterations) || options.maxIterations < 1) {
      throw new ValidationError(
        `maxIterations must be a positive integer (was ${options.maxIterations})`
      );
    }
    if (options.maxDurationMs !== undefined && !(options.maxDurationMs > 0)) {
      throw new ValidationError(`maxDurationMs must be positive (was ${options.maxDurationMs})`);
    }
    this.log = options.logger ?? createLogger("paginator");
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Fetch all records overlapping `[start, stop]` on `accession`
   *
   * @returns Every record keyed by composite key; nothing is returned on failure
   *
   * @throws {ValidationError} When the interval is invalid
   * @throws {TransportError} On a network failure or an HTTP error status
   * @throws {ProtocolError} On an unrecognized status or an unreadable page
   * @throws {PaginationLimitError} When a guard is exceeded
   */
  async fetchAll(accession: string, start: number, stop: number): Promise<FrequencyResultSet> {
    this.validateInterval(accession, start, stop);

    const accumulator = new FrequencyAccumulator();
    const startedAt = this.clock.now();
    let requests = 0;
    let state: PaginationState = { kind: "query", start, stop };

    while (state.kind === "query") {
      this.checkLimits(requests, startedAt, state.start);

      const url = this.buildIntervalUrl(accession, state.start, state.stop);
      await this.options.rateLimiter.acquire();
      const response = await this.options.transport.get(url);
      requests++;

      state = this.transition(state, accumulator, url, response);
    }

    if (state.kind === "failed") {
      throw state.error;
    }

    this.log.info(
      { accession, start, stop, records: accumulator.size, requests },
      "frequency records retrieved"
    );
    return accumulator.toResultSet();
  }

  /**
   * Apply one response to the current state
   */
  private transition(
    state: Extract<PaginationState, { kind: "query" }>,
    accumulator: FrequencyAccumulator,
    url: string,
    response: HttpResponse
  ): PaginationState {
    const { status, body } = response;

    if (status >= 400) {
      return { kind: "failed", error: TransportError.forStatus(url, status, body) };
    }
    if (status !== STATUS_COMPLETE && status !== STATUS_PARTIAL) {
      return { kind: "failed", error: ProtocolError.forUnexpectedStatus(url, status, body) };
    }

    const page = parseFrequencyBody(body);
    if (page instanceof type.errors) {
      return {
        kind: "failed",
        error: new ProtocolError(`Malformed frequency response (${page.summary})`, url, status, body),
      };
    }

    let added: number;
    try {
      added = accumulator.merge(page.results);
    } catch (error) {
      if (error instanceof ValidationError) {
        return { kind: "failed", error: new ProtocolError(error.message, url, status, body) };
      }
      throw error;
    }

    this.log.debug(
      { url, status, pageRecords: Object.keys(page.results).length, added, total: accumulator.size },
      "frequency page received"
    );

    if (status === STATUS_COMPLETE) {
      return { kind: "done" };
    }

    const nextStart = accumulator.nextStart();
    if (nextStart === undefined) {
      return {
        kind: "failed",
        error: new ProtocolError("Partial response carried no records", url, status, body),
      };
    }
    if (nextStart <= state.start) {
      return {
        kind: "failed",
        error: new ProtocolError(
          `Pagination did not advance past position ${state.start} (next start ${nextStart})`,
          url,
          status,
          body
        ),
      };
    }
    if (nextStart > state.stop) {
      return { kind: "done" };
    }
    return { kind: "query", start: nextStart, stop: state.stop };
  }

  private checkLimits(requests: number, startedAt: number, nextStart: number): void {
    if (requests >= this.options.maxIterations) {
      throw PaginationLimitError.forIterations(requests, this.options.maxIterations, nextStart);
    }

    const { maxDurationMs } = this.options;
    if (maxDurationMs !== undefined) {
      const elapsed = this.clock.now() - startedAt;
      if (elapsed >= maxDurationMs) {
        throw PaginationLimitError.forDuration(elapsed, maxDurationMs, nextStart);
      }
    }
  }

  /**
   * The service takes a position and a length, not a stop
   */
  private buildIntervalUrl(accession: string, start: number, stop: number): string {
    const length = stop - start + 1;
    return `${this.options.frequencyUrl}/interval/${encodeURIComponent(accession)}:${start}:${length}/overlapping_frequency_records`;
  }

  private validateInterval(accession: string, start: number, stop: number): void {
    if (accession.trim() === "") {
      throw new ValidationError("Accession must not be empty");
    }
    if (!Number.isSafeInteger(start) || start < 0) {
      throw new ValidationError(`start must be a non-negative integer (was ${start})`);
    }
    if (!Number.isSafeInteger(stop) || stop < 0) {
      throw new ValidationError(`stop must be a non-negative integer (was ${stop})`);
    }
    if (start > stop) {
      throw new ValidationError(`start must not exceed stop (${start} > ${stop})`, `Accession: ${accession}`);
    }
  }
}
