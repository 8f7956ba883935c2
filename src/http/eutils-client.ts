/**
 * Shared NCBI E-utilities transport.
 *
 * One client is built per session and handed to every search and fetch call;
 * it owns the User-Agent, API key, request timeout and the rate limiter.
 */

import { REQUEST_TIMEOUT_MS } from "../config.js";
import type { RateLimiter } from "./rate-limiter.js";

export const EUTILS_BASE = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils";

export type EutilsEndpoint = "esearch" | "efetch";

export interface EutilsClientOptions {
  rateLimiter: RateLimiter;
  userAgent: string;
  apiKey?: string;
  /** Per-request timeout in ms (default: 60000) */
  timeoutMs?: number;
}

/** Build the request URL for an endpoint; the API key is appended when set. */
export function buildEutilsUrl(
  endpoint: EutilsEndpoint,
  params: Record<string, string | number>,
  apiKey?: string
): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    search.set(key, String(value));
  }
  if (apiKey) search.set("api_key", apiKey);
  return `${EUTILS_BASE}/${endpoint}.fcgi?${search.toString()}`;
}

export class EutilsClient {
  readonly rateLimiter: RateLimiter;
  readonly userAgent: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;

  constructor(options: EutilsClientOptions) {
    this.rateLimiter = options.rateLimiter;
    this.userAgent = options.userAgent;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  /**
   * Wait for the rate limiter, then GET an endpoint.
   * Network errors and timeouts reject; HTTP error statuses resolve.
   */
  async get(endpoint: EutilsEndpoint, params: Record<string, string | number>): Promise<Response> {
    await this.rateLimiter.wait();
    return fetch(buildEutilsUrl(endpoint, params, this.apiKey), {
      headers: { "User-Agent": this.userAgent },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }
}
