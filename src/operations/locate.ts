/**
 * GeneLocator - Resolve a gene identifier to its genomic interval
 *
 * Issues one summary request per lookup and returns the first
 * `genomicinfo` entry with coordinates normalized so that
 * `start <= stop`.
 */

import { type } from "arktype";
import { LookupError, TransportError, ValidationError } from "../errors";
import { createLogger, type Logger } from "../logger";
import type { GeneLocation } from "../types";
import { GeneDocumentSchema, parseSummaryBody } from "../types";
import type { GeneLocatorOptions } from "./types";

const COORDINATE_PATTERN = /^\d+$/;

/**
 * Locator for gene coordinates
 *
 * @example
 * ```typescript
 * const locator = new GeneLocator({
 *   summaryUrl: config.summaryUrl,
 *   transport: fetchTransport,
 *   rateLimiter: new RateLimiter({ minIntervalSeconds: 1 }),
 * });
 * const { accession, start, stop } = await locator.resolve("672");
 * ```
 */
export class GeneLocator {
  private readonly log: Logger;

  constructor(private readonly options: GeneLocatorOptions) {
    this.log = options.logger ?? createLogger("locator");
  }

  /**
   * Resolve a gene identifier
   *
   * @param geneId - Gene identifier, e.g. "672"
   * @returns Accession and normalized interval
   *
   * @throws {ValidationError} When the identifier is empty
   * @throws {TransportError} When the summary request does not succeed
   * @throws {LookupError} When the response lacks the gene or its coordinates
   */
  async resolve(geneId: string): Promise<GeneLocation> {
    const id = geneId.trim();
    if (id === "") {
      throw new ValidationError("Gene identifier must not be empty");
    }

    const url = this.buildSummaryUrl(id);

    await this.options.rateLimiter.acquire();
    const response = await this.options.transport.get(url);
    this.log.debug({ url, status: response.status }, "summary response received");

    if (response.status < 200 || response.status >= 300) {
      throw TransportError.forStatus(url, response.status, response.body);
    }

    const summary = parseSummaryBody(response.body);
    if (summary instanceof type.errors) {
      throw new LookupError(`unreadable summary response (${summary.summary})`, id, url, response.body);
    }

    const document = summary.result[id];
    if (document === undefined) {
      throw new LookupError("not present in summary result", id, url, response.body);
    }

    const gene = GeneDocumentSchema(document);
    if (gene instanceof type.errors) {
      throw new LookupError(`malformed gene summary (${gene.summary})`, id, url, response.body);
    }

    const info = gene.genomicinfo?.[0];
    if (info === undefined) {
      throw new LookupError("no genomic coordinates in summary", id, url, response.body);
    }

    const chrStart = this.toCoordinate(info.chrstart, "chrstart", id, url);
    const chrStop = this.toCoordinate(info.chrstop, "chrstop", id, url);

    // Minus-strand genes report start > stop
    const location: GeneLocation =
      chrStart <= chrStop
        ? { accession: info.chraccver, start: chrStart, stop: chrStop }
        : { accession: info.chraccver, start: chrStop, stop: chrStart };

    this.log.debug({ geneId: id, ...location, swapped: chrStart > chrStop }, "gene resolved");
    return location;
  }

  private buildSummaryUrl(geneId: string): string {
    const url = new URL(this.options.summaryUrl);
    url.searchParams.set("db", "gene");
    url.searchParams.set("id", geneId);
    url.searchParams.set("format", "json");
    return url.toString();
  }

  private toCoordinate(
    value: string | number,
    field: string,
    geneId: string,
    url: string
  ): number {
    const coordinate =
      typeof value === "number"
        ? value
        : COORDINATE_PATTERN.test(value.trim())
          ? Number(value.trim())
          : Number.NaN;

    if (!Number.isSafeInteger(coordinate) || coordinate < 0) {
      throw new LookupError(`${field} is not a non-negative integer (${String(value)})`, geneId, url);
    }
    return coordinate;
  }
}
