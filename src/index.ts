/**
 * # pmc-harvest
 *
 * Search PubMed Central and save full-text articles as JSON records with
 * metadata extracted from their JATS front matter.
 *
 * ## Quick Example
 *
 * ```typescript
 * import { exitCodeFor, formatSummary, searchAndDownload } from "pmc-harvest";
 *
 * const stats = await searchAndDownload("frailty cytokines", 50, {
 *   format: "both",
 *   email: "you@example.org",
 * });
 * console.log(formatSummary(stats));
 * process.exitCode = exitCodeFor(stats);
 * ```
 *
 * Lower-level pieces share one rate-limited transport:
 *
 * ```typescript
 * const client = new EutilsClient({
 *   rateLimiter: new RateLimiter(340),
 *   userAgent: buildUserAgent(undefined, "you@example.org"),
 * });
 * const { ids } = await searchPmc("sarcopenia", 10, { client });
 * for (const id of ids) {
 *   await fetchArticle(id, "publications/sarcopenia", "text", { client });
 * }
 * ```
 *
 * ## Configuration
 *
 * `NCBI_API_KEY`, `NCBI_EMAIL`, `PMC_HARVEST_RATE_LIMIT_MS`, `PMC_HARVEST_USER_AGENT`,
 * `PMC_HARVEST_OUTPUT_DIR` and `LOG_LEVEL`; explicit options win. See {@link resolveConfig}.
 *
 * @module pmc-harvest
 */

// === Session ===
export { searchAndDownload } from "./download/coordinator.js";
export type { DownloadOptions, DownloadProgress } from "./download/coordinator.js";
export { buildStats, emptyStats, exitCodeFor, formatSummary, successRate } from "./stats.js";
export type { DownloadStats, StatusCounts } from "./stats.js";

// === Search & fetch ===
export { searchPmc } from "./search/esearch.js";
export type { SearchOptions } from "./search/esearch.js";
export { fetchArticle } from "./download/efetch.js";
export type { FetchOptions } from "./download/efetch.js";
export { buildArticleRecord, loadRecord, recordExists, saveRecord } from "./download/record.js";
export type { BuildRecordOptions, StoredRecord } from "./download/record.js";

// === Transport ===
export { RateLimiter } from "./http/rate-limiter.js";
export type { RateLimiterOptions } from "./http/rate-limiter.js";
export { EutilsClient, buildEutilsUrl } from "./http/eutils-client.js";
export type { EutilsClientOptions, EutilsEndpoint } from "./http/eutils-client.js";
export { FETCH_POLICY, SEARCH_POLICY, decide } from "./http/retry-policy.js";
export type { FailureClass, RetryDecision, RetryPolicy } from "./http/retry-policy.js";

// === Extraction ===
export { extractMetadata } from "./extract/jats-metadata.js";
export { stripMarkup } from "./extract/plain-text.js";
export { classifyEfetchBody } from "./extract/efetch-response.js";
export type { EfetchBody } from "./extract/efetch-response.js";

// === Maintenance ===
export {
  addTextField,
  applyToDirectory,
  checkTextField,
  removeTextField,
} from "./maintenance/text-field.js";
export type { DirectoryReport, TextFieldOperation, TextFieldResult } from "./maintenance/text-field.js";

// === Configuration & utilities ===
export { buildUserAgent, resolveConfig } from "./config.js";
export type { ConfigOverrides, HarvestConfig } from "./config.js";
export { logger, createChildLogger, setLogLevel } from "./logger.js";
export { parseOutputFormat, formatFields } from "./format.js";
export type { OutputFormat } from "./format.js";
export { normalizePmcid, toDisplayPmcid } from "./ids.js";
export { keywordSlug } from "./slug.js";
export { getKeywordDir, getRecordPath } from "./paths.js";

// === Types ===
export type {
  ArticleRecord,
  FetchOutcome,
  FetchStatus,
  MetadataRecord,
  PubDate,
  SearchResult,
} from "./types.js";
