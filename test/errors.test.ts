/**
 * Tests for error types and their diagnostics
 */

import { describe, expect, test } from "vitest";
import {
  GeneFreqError,
  LookupError,
  PaginationLimitError,
  ProtocolError,
  TransportError,
} from "../src/errors";

describe("TransportError", () => {
  test("forStatus carries URL, status and body", () => {
    const error = TransportError.forStatus("https://freq.test/a", 500, "boom");

    expect(error).toBeInstanceOf(GeneFreqError);
    expect(error.code).toBe("TRANSPORT_ERROR");
    expect(error.toString()).toBe(
      "TransportError: Request failed with HTTP 500\nContext: URL: https://freq.test/a\nStatus: 500\nBody: boom"
    );
  });

  test("fromSystemError keeps the underlying error", () => {
    const cause = new Error("connect ECONNREFUSED");
    const error = TransportError.fromSystemError("https://freq.test/a", cause);

    expect(error.message).toBe("Request failed: connect ECONNREFUSED");
    expect(error.systemError).toBe(cause);
    expect(error.status).toBeUndefined();
  });
});

describe("LookupError", () => {
  test("names the gene and suggests a fix", () => {
    const error = new LookupError("no genomic coordinates in summary", "9", "https://summary.test/q");

    expect(error.toString()).toBe(
      "LookupError: Gene '9': no genomic coordinates in summary\n" +
        "Context: URL: https://summary.test/q\n" +
        "Suggestion: Check that the gene identifier exists and has genomic coordinates"
    );
  });
});

describe("ProtocolError", () => {
  test("forUnexpectedStatus reports the status", () => {
    const error = ProtocolError.forUnexpectedStatus("https://freq.test/a", 303, "");

    expect(error.message).toBe("Unrecognized response status 303");
    expect(error.toString()).toBe(
      "ProtocolError: Unrecognized response status 303\nContext: URL: https://freq.test/a\nStatus: 303"
    );
  });
});

describe("PaginationLimitError", () => {
  test("reports where to resume", () => {
    const error = PaginationLimitError.forIterations(3, 3, 120);

    expect(error.toString()).toBe(
      "PaginationLimitError: Pagination stopped after 3 requests (maximum 3)\n" +
        "Context: Limit: iterations, Actual: 3, Max: 3\n" +
        "Resume from position: 120"
    );
  });
});
