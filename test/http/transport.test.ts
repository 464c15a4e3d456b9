/**
 * Tests for the fetch-based transport against an in-process HTTP server
 */

import { createServer, type Server } from "node:http";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { TransportError } from "../../src/errors";
import { httpGet } from "../../src/http/transport";

function portOf(server: Server): number {
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("server is not listening on a TCP port");
  }
  return address.port;
}

describe("httpGet", () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    server = createServer((req, res) => {
      switch (req.url) {
        case "/complete":
          res.writeHead(200, { "content-type": "application/json" });
          res.end('{"results":{"1@5":{}}}');
          break;
        case "/partial":
          res.writeHead(206, { "content-type": "application/json" });
          res.end('{"results":{}}');
          break;
        case "/moved":
          res.writeHead(303, { location: "/complete" });
          res.end();
          break;
        default:
          res.writeHead(500, { "content-type": "text/plain" });
          res.end("boom");
      }
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    baseUrl = `http://127.0.0.1:${portOf(server)}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve()))
    );
  });

  test("returns status and body of a success response", async () => {
    expect(await httpGet(`${baseUrl}/complete`)).toEqual({
      status: 200,
      body: '{"results":{"1@5":{}}}',
    });
  });

  test("returns 206 as-is", async () => {
    const response = await httpGet(`${baseUrl}/partial`);

    expect(response.status).toBe(206);
  });

  test("returns error statuses instead of throwing", async () => {
    expect(await httpGet(`${baseUrl}/missing`)).toEqual({ status: 500, body: "boom" });
  });

  test("does not follow redirects", async () => {
    const response = await httpGet(`${baseUrl}/moved`);

    expect(response.status).toBe(303);
  });

  test("raises TransportError when nothing answers", async () => {
    const closed = createServer();
    await new Promise<void>((resolve) => closed.listen(0, "127.0.0.1", resolve));
    const port = portOf(closed);
    await new Promise<void>((resolve) => closed.close(() => resolve()));

    const url = `http://127.0.0.1:${port}/complete`;
    const error = await httpGet(url).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    if (error instanceof TransportError) {
      expect(error.url).toBe(url);
      expect(error.status).toBeUndefined();
    }
  });
});
