/**
 * PMC full-text downloader via E-utilities efetch.
 *
 * Fetches one article, classifies the response, extracts metadata and writes
 * a single `PMC<id>.json` record. Re-running for an id whose record already
 * exists makes no request.
 */

import { DEFAULT_RETRIES, DEFAULT_RETRY_DELAY_MS } from "../config.js";
import { classifyEfetchBody } from "../extract/efetch-response.js";
import { extractMetadata } from "../extract/jats-metadata.js";
import type { OutputFormat } from "../format.js";
import type { EutilsClient } from "../http/eutils-client.js";
import { FETCH_POLICY, type FailureClass, decide } from "../http/retry-policy.js";
import { normalizePmcid, toDisplayPmcid } from "../ids.js";
import { createChildLogger } from "../logger.js";
import { getRecordPath } from "../paths.js";
import type { FetchOutcome } from "../types.js";
import { buildArticleRecord, recordExists, saveRecord } from "./record.js";

export interface FetchOptions {
  client: EutilsClient;
  /** Number of attempts (default: 3) */
  retries?: number;
  /** Base delay between attempts in ms (default: 2000) */
  retryDelayMs?: number;
  /** Include the derived plain text for text/both (default: true) */
  includeText?: boolean;
}

type AttemptResult =
  | { kind: "document"; xml: string }
  | { kind: "fail"; failure: FailureClass; error: string };

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function attemptFetch(client: EutilsClient, numericId: string): Promise<AttemptResult> {
  let response: Response;
  let body: string;
  try {
    response = await client.get("efetch", {
      db: "pmc",
      id: numericId,
      rettype: "full",
      retmode: "xml",
    });
    if (response.status !== 200) {
      return {
        kind: "fail",
        failure: "http-status",
        error: `HTTP ${response.status} ${response.statusText}`,
      };
    }
    body = await response.text();
  } catch (err) {
    return { kind: "fail", failure: "transport", error: errorMessage(err) };
  }

  const classified = classifyEfetchBody(body);
  switch (classified.kind) {
    case "document":
      return { kind: "document", xml: body };
    case "unavailable":
      return { kind: "fail", failure: "unavailable", error: classified.message };
    case "malformed":
      return { kind: "fail", failure: "malformed", error: `Malformed XML: ${classified.error}` };
  }
}

/**
 * Fetch a PMC article and save it to `<destDir>/PMC<id>.json`.
 *
 * Resolves to `exists` when the record is already present, `unavailable` when
 * PMC reports no full text for the id, `error` after exhausted retries or a
 * failed write, and `success` otherwise.
 */
export async function fetchArticle(
  pmcid: string,
  destDir: string,
  format: OutputFormat,
  options: FetchOptions
): Promise<FetchOutcome> {
  const retries = options.retries ?? DEFAULT_RETRIES;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const numericId = normalizePmcid(pmcid);
  const displayId = toDisplayPmcid(numericId);
  const recordPath = getRecordPath(destDir, numericId);
  const log = createChildLogger({ module: "efetch", pmcid: displayId });

  if (await recordExists(recordPath)) {
    log.debug("Record already exists, skipping");
    return { success: true, status: "exists" };
  }

  let lastError = "Download failed";

  for (let attempt = 1; attempt <= retries; attempt++) {
    log.debug({ attempt, retries }, "Downloading");
    const result = await attemptFetch(options.client, numericId);

    let failure: FailureClass;
    if (result.kind === "document") {
      const metadata = extractMetadata(result.xml);
      if (!metadata.title && !metadata.pmcid) {
        log.warn("Extracted metadata is empty or invalid");
      }
      const record = buildArticleRecord({
        pmcid: numericId,
        xml: result.xml,
        metadata,
        format,
        includeText: options.includeText ?? true,
      });
      try {
        await saveRecord(recordPath, record);
        log.info({ path: recordPath }, "Saved record");
        return { success: true, status: "success" };
      } catch (err) {
        failure = "local-io";
        lastError = `Failed to write ${recordPath}: ${errorMessage(err)}`;
      }
    } else {
      failure = result.failure;
      lastError = result.error;
    }

    const decision = decide(FETCH_POLICY, failure, attempt, retries, retryDelayMs);
    if (decision.action === "stop") {
      if (decision.outcome === "unavailable") {
        log.info({ reason: lastError }, "Not available in PMC");
      } else {
        log.error({ failure, attempt, error: lastError }, "Download failed");
      }
      return { success: false, status: decision.outcome, error: lastError };
    }

    log.warn({ failure, attempt, retries, error: lastError }, "Attempt failed, retrying");
    await sleep(decision.delayMs);
  }

  return { success: false, status: "error", error: lastError };
}
