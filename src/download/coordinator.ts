/**
 * Search-and-download session coordinator.
 * Runs one search, then fetches every id through a bounded pool of async
 * workers that share one rate-limited E-utilities client.
 */

import { type ConfigOverrides, DEFAULT_WORKERS, resolveConfig } from "../config.js";
import type { OutputFormat } from "../format.js";
import { EutilsClient } from "../http/eutils-client.js";
import { RateLimiter } from "../http/rate-limiter.js";
import { toDisplayPmcid } from "../ids.js";
import { createChildLogger } from "../logger.js";
import { getKeywordDir } from "../paths.js";
import { type SearchOptions, searchPmc } from "../search/esearch.js";
import {
  type DownloadStats,
  type StatusCounts,
  buildStats,
  emptyCounts,
  emptyStats,
} from "../stats.js";
import type { FetchStatus } from "../types.js";
import { type FetchOptions, fetchArticle } from "./efetch.js";

export interface DownloadProgress {
  completed: number;
  total: number;
  pmcid: string;
  status: FetchStatus;
  counts: StatusCounts;
}

export interface DownloadOptions extends ConfigOverrides {
  /** Record format (default: "text") */
  format?: OutputFormat;
  /** Fetch with a worker pool (default: true) */
  concurrent?: boolean;
  /** Pool size in concurrent mode (default: 5) */
  workers?: number;
  /** Include the derived plain text (default: true) */
  includeText?: boolean;
  retries?: number;
  retryDelayMs?: number;
  /** Ids not yet started when this aborts are counted as errors */
  signal?: AbortSignal;
  /** Prebuilt transport; built from the resolved config when absent */
  client?: EutilsClient;
  onProgress?: (progress: DownloadProgress) => void;
  /** Environment for config resolution (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

function elapsedSeconds(startedAt: number): number {
  return (performance.now() - startedAt) / 1000;
}

/**
 * Search PMC for `keyword` and save up to `maxResults` articles under
 * `<outputDir>/<keyword slug>/`.
 *
 * Per-article failures never reject; they are counted in the returned stats.
 * @throws Error on invalid configuration or worker count
 */
export async function searchAndDownload(
  keyword: string,
  maxResults: number,
  options: DownloadOptions = {}
): Promise<DownloadStats> {
  const startedAt = performance.now();
  const log = createChildLogger({ module: "coordinator", keyword });

  const config = resolveConfig(options, options.env);
  const workers = options.workers ?? DEFAULT_WORKERS;
  if (!Number.isInteger(workers) || workers < 1) {
    throw new Error(`Invalid worker count: ${workers}`);
  }

  const client =
    options.client ??
    new EutilsClient({
      rateLimiter: new RateLimiter(config.rateLimitMs),
      userAgent: config.userAgent,
      ...(config.apiKey !== undefined ? { apiKey: config.apiKey } : {}),
    });
  log.debug(
    { rateLimitMs: client.rateLimiter.minIntervalMs, userAgent: client.userAgent },
    "Session transport ready"
  );

  const searchOptions: SearchOptions = { client };
  if (options.retries !== undefined) searchOptions.retries = options.retries;
  if (options.retryDelayMs !== undefined) searchOptions.retryDelayMs = options.retryDelayMs;

  const { ids, total } = await searchPmc(keyword, maxResults, searchOptions);
  if (ids.length === 0) {
    log.warn("No PMC articles found");
    return emptyStats(keyword, config.outputDir, total, elapsedSeconds(startedAt));
  }

  const outDir = getKeywordDir(config.outputDir, keyword);
  const format = options.format ?? "text";
  const concurrent = (options.concurrent ?? true) && ids.length > 1;
  const progressEvery = concurrent ? 10 : 5;
  log.info({ found: ids.length, total, outDir }, "Starting downloads");

  const fetchOptions: FetchOptions = { client, includeText: options.includeText ?? true };
  if (options.retries !== undefined) fetchOptions.retries = options.retries;
  if (options.retryDelayMs !== undefined) fetchOptions.retryDelayMs = options.retryDelayMs;

  const counts = emptyCounts();
  let completed = 0;

  // The only place counters change
  function tally(pmcid: string, status: FetchStatus): void {
    counts[status]++;
    completed++;
    options.onProgress?.({ completed, total: ids.length, pmcid, status, counts: { ...counts } });
    if (completed % progressEvery === 0 || completed === ids.length) {
      log.info(
        {
          completed,
          total: ids.length,
          ok: counts.success,
          fail: counts.unavailable + counts.error,
          skip: counts.exists,
        },
        "Progress"
      );
    }
  }

  async function downloadOne(pmcid: string): Promise<void> {
    if (options.signal?.aborted) {
      log.warn({ pmcid: toDisplayPmcid(pmcid) }, "Session aborted before download started");
      tally(pmcid, "error");
      return;
    }
    try {
      const outcome = await fetchArticle(pmcid, outDir, format, fetchOptions);
      tally(pmcid, outcome.status);
    } catch (err) {
      log.error(
        { pmcid: toDisplayPmcid(pmcid), err: err instanceof Error ? err.message : String(err) },
        "Unexpected error downloading"
      );
      tally(pmcid, "error");
    }
  }

  if (concurrent) {
    log.info({ workers }, "Using concurrent downloads");
    let nextIndex = 0;

    async function worker(): Promise<void> {
      while (nextIndex < ids.length) {
        const pmcid = ids[nextIndex++];
        if (pmcid === undefined) continue;
        await downloadOne(pmcid);
      }
    }

    const pool = Array.from({ length: Math.min(workers, ids.length) }, () => worker());
    await Promise.all(pool);
  } else {
    log.info("Using sequential downloads");
    for (const pmcid of ids) {
      await downloadOne(pmcid);
    }
  }

  const stats = buildStats({
    keyword,
    outputDir: outDir,
    totalFound: total,
    durationSeconds: elapsedSeconds(startedAt),
    counts,
  });

  if (stats.successful > 0) {
    log.info({ successful: stats.successful, outDir }, "Downloaded articles");
  }
  if (stats.unavailable > 0) {
    log.warn({ unavailable: stats.unavailable }, "Articles not available in PMC full text");
  }
  if (stats.errors > 0) {
    log.error({ errors: stats.errors }, "Articles failed due to errors");
  }
  return stats;
}
