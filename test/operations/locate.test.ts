/**
 * Tests for GeneLocator - gene identifier to genomic interval
 */

import { describe, expect, test } from "vitest";
import { LookupError, TransportError, ValidationError } from "../../src/errors";
import { RateLimiter } from "../../src/http/rate-limiter";
import { GeneLocator } from "../../src/operations/locate";
import type { HttpResponse } from "../../src/types";
import { FakeClock, jsonResponse, ScriptedTransport } from "../utils/fake-upstream";

const SUMMARY_URL = "https://summary.test/esummary";

function summaryFor(geneId: string, document: unknown): HttpResponse {
  return jsonResponse(200, { header: { type: "esummary" }, result: { uids: [geneId], [geneId]: document } });
}

function createLocator(responses: HttpResponse[]) {
  const transport = new ScriptedTransport(responses);
  const clock = new FakeClock();
  const locator = new GeneLocator({
    summaryUrl: SUMMARY_URL,
    transport,
    rateLimiter: new RateLimiter({ minIntervalSeconds: 1 }, clock),
  });
  return { locator, transport, clock };
}

describe("GeneLocator", () => {
  describe("successful lookups", () => {
    test("returns accession and interval of the first genomic record", async () => {
      const { locator } = createLocator([
        summaryFor("1234", {
          uid: "1234",
          genomicinfo: [
            { chrloc: "7", chraccver: "NC_000099.1", chrstart: 1000, chrstop: 2500 },
            { chrloc: "7", chraccver: "NT_000001.1", chrstart: 5, chrstop: 10 },
          ],
        }),
      ]);

      expect(await locator.resolve("1234")).toEqual({
        accession: "NC_000099.1",
        start: 1000,
        stop: 2500,
      });
    });

    test("swaps reversed coordinates of minus-strand genes", async () => {
      const { locator } = createLocator([
        summaryFor("77", {
          genomicinfo: [{ chraccver: "NC_000098.2", chrstart: 90_500, chrstop: 88_000 }],
        }),
      ]);

      expect(await locator.resolve("77")).toEqual({
        accession: "NC_000098.2",
        start: 88_000,
        stop: 90_500,
      });
    });

    test("accepts coordinates given as strings", async () => {
      const { locator } = createLocator([
        summaryFor("5", { genomicinfo: [{ chraccver: "NC_000097.1", chrstart: "300", chrstop: "120" }] }),
      ]);

      expect(await locator.resolve("5")).toEqual({ accession: "NC_000097.1", start: 120, stop: 300 });
    });

    test("requests the gene summary as JSON", async () => {
      const { locator, transport } = createLocator([
        summaryFor("1234", { genomicinfo: [{ chraccver: "NC_000099.1", chrstart: 1, chrstop: 2 }] }),
      ]);

      await locator.resolve(" 1234 ");

      expect(transport.requests).toEqual([`${SUMMARY_URL}?db=gene&id=1234&format=json`]);
    });

    test("waits on the rate limiter between lookups", async () => {
      const document = { genomicinfo: [{ chraccver: "NC_000099.1", chrstart: 1, chrstop: 2 }] };
      const { locator, clock } = createLocator([summaryFor("1", document), summaryFor("1", document)]);

      await locator.resolve("1");
      await locator.resolve("1");

      expect(clock.sleeps).toEqual([1_000]);
    });
  });

  describe("lookup failures", () => {
    test("gene absent from the result", async () => {
      const { locator } = createLocator([jsonResponse(200, { result: { uids: [] } })]);

      await expect(locator.resolve("999")).rejects.toBeInstanceOf(LookupError);
    });

    test("gene without genomicinfo", async () => {
      const { locator } = createLocator([
        summaryFor("999", { uid: "999", error: "cannot get document summary" }),
      ]);

      await expect(locator.resolve("999")).rejects.toThrow(
        "Gene '999': no genomic coordinates in summary"
      );
    });

    test("empty genomicinfo", async () => {
      const { locator } = createLocator([summaryFor("8", { genomicinfo: [] })]);

      await expect(locator.resolve("8")).rejects.toBeInstanceOf(LookupError);
    });

    test("response without a result mapping", async () => {
      const { locator } = createLocator([jsonResponse(200, { esummaryresult: ["Invalid uid"] })]);

      await expect(locator.resolve("8")).rejects.toBeInstanceOf(LookupError);
    });

    test("body that is not JSON", async () => {
      const { locator } = createLocator([{ status: 200, body: "<html>maintenance</html>" }]);

      await expect(locator.resolve("8")).rejects.toBeInstanceOf(LookupError);
    });

    test("coordinate that is not an integer", async () => {
      const { locator } = createLocator([
        summaryFor("8", { genomicinfo: [{ chraccver: "NC_000099.1", chrstart: "12a", chrstop: 40 }] }),
      ]);

      await expect(locator.resolve("8")).rejects.toThrow("chrstart is not a non-negative integer (12a)");
    });

    test("lookup error carries the request URL", async () => {
      const { locator } = createLocator([summaryFor("8", { genomicinfo: [] })]);

      const error = await locator.resolve("8").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(LookupError);
      if (error instanceof LookupError) {
        expect(error.geneId).toBe("8");
        expect(error.url).toBe(`${SUMMARY_URL}?db=gene&id=8&format=json`);
        expect(error.code).toBe("LOOKUP_ERROR");
      }
    });
  });

  describe("transport failures", () => {
    test("non-success status raises TransportError with status and body", async () => {
      const { locator } = createLocator([{ status: 502, body: "bad gateway" }]);

      const error = await locator.resolve("8").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      if (error instanceof TransportError) {
        expect(error.status).toBe(502);
        expect(error.body).toBe("bad gateway");
        expect(error.url).toBe(`${SUMMARY_URL}?db=gene&id=8&format=json`);
      }
    });
  });

  describe("argument validation", () => {
    test("rejects an empty identifier without a request", async () => {
      const { locator, transport } = createLocator([]);

      await expect(locator.resolve("   ")).rejects.toBeInstanceOf(ValidationError);
      expect(transport.requests).toEqual([]);
    });
  });
});
