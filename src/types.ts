/**
 * Core type definitions for gene locations and frequency records
 *
 * Wire bodies from both upstream services are validated with ArkType
 * before anything reads them; everything past these schemas is typed.
 */

import { type } from "arktype";

// =============================================================================
// DOMAIN TYPES
// =============================================================================

/**
 * Genomic interval of a gene on a reference sequence
 *
 * Invariant: `0 <= start <= stop`. Minus-strand genes arrive reversed
 * from the summary service and are normalized by the locator.
 */
export interface GeneLocation {
  /** Versioned accession of the reference sequence (e.g. "NC_000001.11") */
  readonly accession: string;
  readonly start: number;
  readonly stop: number;
}

/**
 * Key of a frequency record: `"<length>@<start>"`
 */
export type CompositeKey = `${number}@${number}`;

/**
 * Allele-frequency payload for one variant
 *
 * Opaque: passed through exactly as the service returned it.
 */
export type FrequencyRecord = unknown;

/**
 * Complete, read-only result of one pagination run
 */
export type FrequencyResultSet = ReadonlyMap<CompositeKey, FrequencyRecord>;

/**
 * Span covered by a frequency record, decoded from its composite key
 */
export interface KeySpan {
  readonly length: number;
  readonly start: number;
  /** First position past the variant (`start + length`) */
  readonly end: number;
}

/**
 * Display summary of a result set
 */
export interface FrequencySummary {
  readonly count: number;
  /** Lowest variant start, undefined for an empty set */
  readonly firstStart?: number;
  /** Highest `start + length`, undefined for an empty set */
  readonly lastEnd?: number;
}

// =============================================================================
// HTTP
// =============================================================================

/**
 * Raw HTTP response as seen by the locator and paginator
 */
export interface HttpResponse {
  readonly status: number;
  readonly body: string;
}

/**
 * Minimal GET-only transport
 *
 * Implementations resolve with any HTTP status and reject with
 * TransportError only when no response was received.
 */
export interface HttpTransport {
  get(url: string): Promise<HttpResponse>;
}

/**
 * Time source used for rate limiting and pagination guards
 */
export interface Clock {
  /** Milliseconds since an arbitrary fixed origin */
  now(): number;
  sleep(ms: number): Promise<void>;
}

// =============================================================================
// WIRE SCHEMAS
// =============================================================================

/**
 * One `genomicinfo` entry of a gene summary
 *
 * Coordinates are numbers in current responses but strings in older ones.
 */
export const GenomicInfoSchema = type({
  chraccver: "string>0",
  chrstart: "string|number",
  chrstop: "string|number",
});

export type GenomicInfo = typeof GenomicInfoSchema.infer;

/**
 * Per-gene document inside the summary `result` mapping
 */
export const GeneDocumentSchema = type({
  "genomicinfo?": GenomicInfoSchema.array(),
});

/**
 * Top level of the summary response
 */
export const SummaryResponseSchema = type({
  result: { "[string]": "unknown" },
});

/**
 * Body of a 200 or 206 frequency response
 */
export const FrequencyPageSchema = type({
  results: { "[string]": "unknown" },
});

export type FrequencyPage = typeof FrequencyPageSchema.infer;

export const parseSummaryBody = type("string.json.parse").pipe(SummaryResponseSchema);

export const parseFrequencyBody = type("string.json.parse").pipe(FrequencyPageSchema);
