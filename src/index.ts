/**
 * genefreq - Page through variant allele frequencies by gene
 *
 * Resolves a gene identifier to its interval on a reference sequence, then
 * retrieves every frequency record overlapping that interval from a
 * page-capped interval service.
 */

// Configuration
export {
  type ClientConfig,
  type ClientConfigOverrides,
  CONFIG_ENV,
  ClientConfigSchema,
  DEFAULT_CONFIG,
  resolveConfig,
} from "./config";
// Error types
export {
  GeneFreqError,
  LookupError,
  PaginationLimitError,
  ProtocolError,
  TransportError,
  ValidationError,
} from "./errors";
// HTTP infrastructure
export { RateLimiter, type RateLimiterOptions, systemClock } from "./http/rate-limiter";
export { fetchTransport, httpGet } from "./http/transport";
// Logging
export { createLogger, type Logger, logger } from "./logger";
// Operations
export { FrequencyAccumulator, summarizeRecords } from "./operations/core/accumulator";
export {
  formatCompositeKey,
  isCompositeKey,
  parseCompositeKey,
} from "./operations/core/composite-key";
export {
  fetchGeneFrequencies,
  GeneFrequencyClient,
  type GeneFrequencyOptions,
  type GeneFrequencyResult,
} from "./operations";
export { GeneLocator } from "./operations/locate";
export {
  IntervalPaginator,
  type PaginationState,
  STATUS_COMPLETE,
  STATUS_PARTIAL,
} from "./operations/paginate";
export type {
  GeneLocatorOptions,
  IntervalPaginatorOptions,
  UpstreamContext,
} from "./operations/types";
// Core types
export type {
  Clock,
  CompositeKey,
  FrequencyPage,
  FrequencyRecord,
  FrequencyResultSet,
  FrequencySummary,
  GeneLocation,
  GenomicInfo,
  HttpResponse,
  HttpTransport,
  KeySpan,
} from "./types";
export {
  FrequencyPageSchema,
  GeneDocumentSchema,
  GenomicInfoSchema,
  SummaryResponseSchema,
} from "./types";
