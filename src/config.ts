/**
 * Client configuration
 *
 * Defaults, then `GENEFREQ_*` environment variables, then explicit
 * overrides. The merged result is validated once with ArkType.
 */

import { type } from "arktype";
import { ValidationError } from "./errors";

/**
 * Resolved configuration shared by the locator and the paginator
 */
export interface ClientConfig {
  /** Gene summary endpoint, queried with `db=gene&id=...&format=json` */
  readonly summaryUrl: string;
  /** Base of the frequency service; `/interval/...` is appended */
  readonly frequencyUrl: string;
  /** Minimum spacing between any two upstream requests */
  readonly minIntervalSeconds: number;
  /** Upper bound on frequency requests per pagination run */
  readonly maxIterations: number;
  /** Upper bound on wall time per pagination run; unbounded when absent */
  readonly maxDurationMs?: number;
}

export type ClientConfigOverrides = Partial<ClientConfig>;

export const DEFAULT_CONFIG = {
  summaryUrl: "https://eutils.ncbi.nlm.nih.gov/entrez/eutils/esummary.fcgi",
  frequencyUrl: "https://api.ncbi.nlm.nih.gov/variation/v0",
  minIntervalSeconds: 1,
  maxIterations: 10_000,
} as const satisfies ClientConfig;

/**
 * Environment variables read by {@link resolveConfig}
 */
export const CONFIG_ENV = {
  summaryUrl: "GENEFREQ_SUMMARY_URL",
  frequencyUrl: "GENEFREQ_FREQUENCY_URL",
  minIntervalSeconds: "GENEFREQ_MIN_INTERVAL_SECONDS",
  maxIterations: "GENEFREQ_MAX_ITERATIONS",
  maxDurationMs: "GENEFREQ_MAX_DURATION_MS",
} as const;

export const ClientConfigSchema = type({
  summaryUrl: "string.url",
  frequencyUrl: "string.url",
  minIntervalSeconds: "number >= 0",
  maxIterations: "number >= 1",
  "maxDurationMs?": "number > 0",
});

type Env = Readonly<Record<string, string | undefined>>;

function stringFromEnv(env: Env, name: string): string | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  return raw.trim();
}

function numberFromEnv(env: Env, name: string): number | undefined {
  const raw = stringFromEnv(env, name);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ValidationError(`${name} must be a number, got '${raw}'`);
  }
  return value;
}

function stripTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Resolve the client configuration
 *
 * @param overrides - Explicit values; take precedence over the environment
 * @param env - Environment to read, `process.env` by default
 * @throws {ValidationError} When any merged value is invalid
 *
 * @example
 * ```typescript
 * const config = resolveConfig({ minIntervalSeconds: 0.5 });
 * ```
 */
export function resolveConfig(
  overrides: ClientConfigOverrides = {},
  env: Env = process.env
): ClientConfig {
  const maxDurationMs =
    overrides.maxDurationMs ?? numberFromEnv(env, CONFIG_ENV.maxDurationMs);

  const merged = {
    summaryUrl:
      overrides.summaryUrl ?? stringFromEnv(env, CONFIG_ENV.summaryUrl) ?? DEFAULT_CONFIG.summaryUrl,
    frequencyUrl:
      overrides.frequencyUrl ??
      stringFromEnv(env, CONFIG_ENV.frequencyUrl) ??
      DEFAULT_CONFIG.frequencyUrl,
    minIntervalSeconds:
      overrides.minIntervalSeconds ??
      numberFromEnv(env, CONFIG_ENV.minIntervalSeconds) ??
      DEFAULT_CONFIG.minIntervalSeconds,
    maxIterations:
      overrides.maxIterations ??
      numberFromEnv(env, CONFIG_ENV.maxIterations) ??
      DEFAULT_CONFIG.maxIterations,
    ...(maxDurationMs !== undefined ? { maxDurationMs } : {}),
  };

  const result = ClientConfigSchema(merged);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid configuration: ${result.summary}`);
  }

  if (!Number.isInteger(result.maxIterations)) {
    throw new ValidationError(
      `Invalid configuration: maxIterations must be an integer (was ${result.maxIterations})`
    );
  }

  return {
    ...result,
    summaryUrl: stripTrailingSlashes(result.summaryUrl),
    frequencyUrl: stripTrailingSlashes(result.frequencyUrl),
  };
}
