/**
 * Download session statistics.
 */

import type { FetchStatus } from "./types.js";

export interface DownloadStats {
  keyword: string;
  /** Total match count reported by the search */
  totalFound: number;
  /** Ids the session attempted */
  requested: number;
  /** Newly saved records */
  successful: number;
  /** Records already on disk */
  skipped: number;
  unavailable: number;
  errors: number;
  /** unavailable + errors */
  failed: number;
  durationSeconds: number;
  outputDir: string;
}

/** Per-status counters, in the order a session reports them */
export type StatusCounts = Record<FetchStatus, number>;

export function emptyCounts(): StatusCounts {
  return { success: 0, exists: 0, unavailable: 0, error: 0 };
}

/** Stats for a session that attempted nothing. */
export function emptyStats(
  keyword: string,
  outputDir: string,
  totalFound = 0,
  durationSeconds = 0
): DownloadStats {
  return buildStats({ keyword, outputDir, totalFound, durationSeconds, counts: emptyCounts() });
}

export function buildStats(input: {
  keyword: string;
  outputDir: string;
  totalFound: number;
  durationSeconds: number;
  counts: StatusCounts;
}): DownloadStats {
  const { counts } = input;
  return {
    keyword: input.keyword,
    totalFound: input.totalFound,
    requested: counts.success + counts.exists + counts.unavailable + counts.error,
    successful: counts.success,
    skipped: counts.exists,
    unavailable: counts.unavailable,
    errors: counts.error,
    failed: counts.unavailable + counts.error,
    durationSeconds: input.durationSeconds,
    outputDir: input.outputDir,
  };
}

/**
 * Percentage of requested ids that ended with a record on disk
 * (newly saved or already present). 0 when nothing was requested.
 */
export function successRate(stats: DownloadStats): number {
  if (stats.requested === 0) return 0;
  return ((stats.successful + stats.skipped) / stats.requested) * 100;
}

/**
 * Process exit code for a finished session:
 * 0 when any record was saved or already present; 1 when nothing was
 * requested; 2 otherwise.
 */
export function exitCodeFor(stats: DownloadStats): number {
  if (stats.successful + stats.skipped > 0) return 0;
  if (stats.requested === 0) return 1;
  return 2;
}

const RULE = "=".repeat(60);

/** Human-readable session summary. */
export function formatSummary(stats: DownloadStats): string {
  return [
    RULE,
    "Download Summary",
    RULE,
    `Keyword:           ${stats.keyword}`,
    `Total found:       ${stats.totalFound}`,
    `Requested:         ${stats.requested}`,
    `[OK] Successful:   ${stats.successful}`,
    `[FAIL] Failed:     ${stats.failed}`,
    `  - Unavailable:   ${stats.unavailable}`,
    `  - Errors:        ${stats.errors}`,
    `[SKIP] Skipped:    ${stats.skipped}`,
    `Success rate:      ${successRate(stats).toFixed(1)}%`,
    `Duration:          ${stats.durationSeconds.toFixed(1)}s`,
    `Output directory:  ${stats.outputDir}`,
    RULE,
  ].join("\n");
}
