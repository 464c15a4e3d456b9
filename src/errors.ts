/**
 * Error handling for gene lookups and frequency pagination
 *
 * Every failure carries the request URL and, where the service sent one,
 * the response body, so a failed query can be diagnosed and resubmitted.
 */

/**
 * Base error class for all genefreq errors
 */
export class GeneFreqError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: string
  ) {
    super(message);
    this.name = "GeneFreqError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Invalid arguments or configuration
 */
export class ValidationError extends GeneFreqError {
  constructor(message: string, context?: string) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Network failures and non-success HTTP responses
 */
export class TransportError extends GeneFreqError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    public readonly body?: string,
    public readonly systemError?: unknown
  ) {
    super(message, "TRANSPORT_ERROR", `URL: ${url}`);
    this.name = "TransportError";
  }

  /**
   * Create transport error for an HTTP error status
   */
  static forStatus(url: string, status: number, body: string): TransportError {
    return new TransportError(`Request failed with HTTP ${status}`, url, status, body);
  }

  /**
   * Create transport error when no response was received at all
   */
  static fromSystemError(url: string, systemError: unknown): TransportError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    return new TransportError(
      `Request failed: ${errorMessage}`,
      url,
      undefined,
      undefined,
      systemError
    );
  }

  override toString(): string {
    let msg = super.toString();
    if (this.status !== undefined) {
      msg += `\nStatus: ${this.status}`;
    }
    if (this.body !== undefined && this.body !== "") {
      msg += `\nBody: ${this.body}`;
    }
    return msg;
  }
}

/**
 * Summary response was well-formed but did not locate the gene
 */
export class LookupError extends GeneFreqError {
  constructor(
    message: string,
    public readonly geneId: string,
    public readonly url: string,
    public readonly body?: string
  ) {
    super(`Gene '${geneId}': ${message}`, "LOOKUP_ERROR", `URL: ${url}`);
    this.name = "LookupError";
  }

  override toString(): string {
    let msg = super.toString();
    if (this.body !== undefined && this.body !== "") {
      msg += `\nBody: ${this.body}`;
    }
    msg += `\nSuggestion: Check that the gene identifier exists and has genomic coordinates`;
    return msg;
  }
}

/**
 * Frequency service answered in a way the paginator cannot interpret
 */
export class ProtocolError extends GeneFreqError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    public readonly body?: string
  ) {
    super(message, "PROTOCOL_ERROR", `URL: ${url}`);
    this.name = "ProtocolError";
  }

  /**
   * Create protocol error for a status that is neither complete, partial nor an error
   */
  static forUnexpectedStatus(url: string, status: number, body: string): ProtocolError {
    return new ProtocolError(`Unrecognized response status ${status}`, url, status, body);
  }

  override toString(): string {
    let msg = super.toString();
    if (this.status !== undefined) {
      msg += `\nStatus: ${this.status}`;
    }
    if (this.body !== undefined && this.body !== "") {
      msg += `\nBody: ${this.body}`;
    }
    return msg;
  }
}

/**
 * Pagination guard exceeded
 */
export class PaginationLimitError extends GeneFreqError {
  constructor(
    message: string,
    public readonly limitType: "iterations" | "duration",
    public readonly actualValue: number,
    public readonly maxAllowed: number,
    public readonly nextStart: number
  ) {
    super(
      message,
      "PAGINATION_LIMIT_ERROR",
      `Limit: ${limitType}, Actual: ${actualValue}, Max: ${maxAllowed}`
    );
    this.name = "PaginationLimitError";
  }

  static forIterations(iterations: number, maxIterations: number, nextStart: number): PaginationLimitError {
    return new PaginationLimitError(
      `Pagination stopped after ${iterations} requests (maximum ${maxIterations})`,
      "iterations",
      iterations,
      maxIterations,
      nextStart
    );
  }

  static forDuration(elapsedMs: number, maxDurationMs: number, nextStart: number): PaginationLimitError {
    return new PaginationLimitError(
      `Pagination stopped after ${elapsedMs}ms (maximum ${maxDurationMs}ms)`,
      "duration",
      elapsedMs,
      maxDurationMs,
      nextStart
    );
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\nResume from position: ${this.nextStart}`;
    return msg;
  }
}
