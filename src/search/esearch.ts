/**
 * PMC search via E-utilities esearch.
 *
 * Searches the pmc database directly, so every id returned has full text.
 */

import { z } from "zod";
import { DEFAULT_RETRIES, DEFAULT_RETRY_DELAY_MS } from "../config.js";
import type { EutilsClient } from "../http/eutils-client.js";
import { SEARCH_POLICY, decide } from "../http/retry-policy.js";
import { createChildLogger } from "../logger.js";
import type { SearchResult } from "../types.js";

export interface SearchOptions {
  client: EutilsClient;
  /** Number of attempts (default: 3) */
  retries?: number;
  /** Base delay for linear backoff in ms (default: 2000) */
  retryDelayMs?: number;
}

const esearchSchema = z.object({
  esearchresult: z.object({
    idlist: z.array(z.string()),
    count: z.coerce.number().int().nonnegative().optional(),
  }),
});

type SearchAttempt =
  | { kind: "success"; result: SearchResult }
  | { kind: "retry"; failure: "http-status" | "transport" | "malformed"; error: string };

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function attemptSearch(
  client: EutilsClient,
  params: Record<string, string | number>
): Promise<SearchAttempt> {
  let response: Response;
  try {
    response = await client.get("esearch", params);
  } catch (err) {
    return { kind: "retry", failure: "transport", error: err instanceof Error ? err.message : String(err) };
  }

  if (!response.ok) {
    return {
      kind: "retry",
      failure: "http-status",
      error: `HTTP ${response.status} ${response.statusText}`,
    };
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (err) {
    return { kind: "retry", failure: "malformed", error: err instanceof Error ? err.message : String(err) };
  }

  const parsed = esearchSchema.safeParse(body);
  if (!parsed.success) {
    return {
      kind: "retry",
      failure: "malformed",
      error: `Unexpected esearch response: ${parsed.error.issues[0]?.message ?? "invalid"}`,
    };
  }

  const { idlist, count } = parsed.data.esearchresult;
  return { kind: "success", result: { ids: idlist, total: count ?? idlist.length } };
}

/**
 * Search PMC for `term` and return up to `maxResults` ids plus the total count.
 * Never throws: once every attempt has failed the result is empty.
 */
export async function searchPmc(
  term: string,
  maxResults: number,
  options: SearchOptions
): Promise<SearchResult> {
  const retries = options.retries ?? DEFAULT_RETRIES;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const log = createChildLogger({ module: "esearch", term });

  const params = {
    db: "pmc",
    term,
    retmax: maxResults,
    retmode: "json",
    retstart: 0,
  };

  log.info({ maxResults }, "Searching PMC for full-text articles");

  for (let attempt = 1; attempt <= retries; attempt++) {
    const outcome = await attemptSearch(options.client, params);
    if (outcome.kind === "success") {
      log.info(
        { found: outcome.result.ids.length, total: outcome.result.total },
        "Search complete"
      );
      return outcome.result;
    }

    log.warn({ attempt, retries, error: outcome.error }, "Search attempt failed");
    const decision = decide(SEARCH_POLICY, outcome.failure, attempt, retries, retryDelayMs);
    if (decision.action === "stop") break;
    await sleep(decision.delayMs);
  }

  log.error("All search attempts failed");
  return { ids: [], total: 0 };
}
