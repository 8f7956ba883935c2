/**
 * Runtime configuration.
 *
 * Every setting can come from an explicit override or an environment variable;
 * explicit values always win.
 *
 * | Setting       | Environment variable          | Default                         |
 * |---------------|-------------------------------|---------------------------------|
 * | apiKey        | `NCBI_API_KEY`                | none                            |
 * | email         | `NCBI_EMAIL`                  | none                            |
 * | userAgent     | `PMC_HARVEST_USER_AGENT`      | `pmc-harvest/<version>`         |
 * | rateLimitMs   | `PMC_HARVEST_RATE_LIMIT_MS`   | 100 with API key, 340 without   |
 * | outputDir     | `PMC_HARVEST_OUTPUT_DIR`      | `publications`                  |
 */

import { z } from "zod";

export const VERSION = "0.1.0";

export const DEFAULT_USER_AGENT = `pmc-harvest/${VERSION}`;
export const DEFAULT_OUTPUT_DIR = "publications";

/** NCBI allows 10 requests/second with an API key */
export const RATE_LIMIT_WITH_API_KEY_MS = 100;
/** ...and 3 requests/second without one */
export const RATE_LIMIT_NO_API_KEY_MS = 340;

export const DEFAULT_RETRIES = 3;
export const DEFAULT_RETRY_DELAY_MS = 2000;
export const REQUEST_TIMEOUT_MS = 60_000;
export const DEFAULT_WORKERS = 5;

export interface ConfigOverrides {
  apiKey?: string;
  email?: string;
  userAgent?: string;
  rateLimitMs?: number;
  outputDir?: string;
}

export interface HarvestConfig {
  apiKey?: string;
  /** Complete User-Agent header value */
  userAgent: string;
  /** Minimum milliseconds between requests */
  rateLimitMs: number;
  outputDir: string;
}

const nonEmpty = z.string().trim().min(1);

const configSchema = z.object({
  apiKey: nonEmpty.optional(),
  email: nonEmpty.email().optional(),
  userAgent: nonEmpty.optional(),
  rateLimitMs: z.number().finite().nonnegative().optional(),
  outputDir: nonEmpty.optional(),
});

/** Treat unset and blank environment variables alike */
function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = envValue(env, name);
  return value === undefined ? undefined : Number(value);
}

/**
 * Build the User-Agent header. A custom agent is used verbatim; otherwise
 * a contact email is appended as NCBI asks.
 */
export function buildUserAgent(userAgent?: string, email?: string): string {
  if (userAgent) return userAgent;
  if (email) return `${DEFAULT_USER_AGENT} (mailto:${email})`;
  return DEFAULT_USER_AGENT;
}

/**
 * Merge overrides with the environment and validate the result.
 * @throws Error describing every invalid setting
 */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): HarvestConfig {
  const parsed = configSchema.safeParse({
    apiKey: overrides.apiKey ?? envValue(env, "NCBI_API_KEY"),
    email: overrides.email ?? envValue(env, "NCBI_EMAIL"),
    userAgent: overrides.userAgent ?? envValue(env, "PMC_HARVEST_USER_AGENT"),
    rateLimitMs: overrides.rateLimitMs ?? envNumber(env, "PMC_HARVEST_RATE_LIMIT_MS"),
    outputDir: overrides.outputDir ?? envValue(env, "PMC_HARVEST_OUTPUT_DIR"),
  });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  const config: HarvestConfig = {
    userAgent: buildUserAgent(values.userAgent, values.email),
    rateLimitMs:
      values.rateLimitMs ??
      (values.apiKey ? RATE_LIMIT_WITH_API_KEY_MS : RATE_LIMIT_NO_API_KEY_MS),
    outputDir: values.outputDir ?? DEFAULT_OUTPUT_DIR,
  };
  if (values.apiKey !== undefined) config.apiKey = values.apiKey;
  return config;
}
