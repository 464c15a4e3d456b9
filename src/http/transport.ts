/**
 * HTTP transport backed by Effect Platform's fetch client
 *
 * Any status the server sends is returned to the caller. Redirects are not
 * followed, so a 3xx reaches the paginator as an unrecognized status.
 */

import { FetchHttpClient, HttpClient } from "@effect/platform";
import { Effect } from "effect";
import { TransportError } from "../errors";
import type { HttpResponse, HttpTransport } from "../types";

/**
 * Issue a single GET request and read the body as text
 *
 * @throws {TransportError} When no response is received
 */
export async function httpGet(url: string): Promise<HttpResponse> {
  const program = Effect.gen(function* () {
    const client = yield* HttpClient.HttpClient;
    const response = yield* client.get(url);
    const body = yield* response.text;
    return { status: response.status, body };
  });

  try {
    return await Effect.runPromise(
      program.pipe(
        Effect.scoped,
        Effect.provide(FetchHttpClient.layer),
        Effect.provideService(FetchHttpClient.RequestInit, { redirect: "manual" })
      )
    );
  } catch (error) {
    throw TransportError.fromSystemError(url, error);
  }
}

/**
 * Default transport used when none is injected
 */
export const fetchTransport: HttpTransport = {
  get: httpGet,
};
