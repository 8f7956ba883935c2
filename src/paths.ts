/**
 * Path resolution utilities for download directories.
 */

import { join } from "node:path";
import { toDisplayPmcid } from "./ids.js";
import { keywordSlug } from "./slug.js";

/** Get the directory that holds all records for one search term. */
export function getKeywordDir(outputDir: string, keyword: string): string {
  return join(outputDir, keywordSlug(keyword));
}

/** Get the record path (`PMC<id>.json`) for an article. */
export function getRecordPath(keywordDir: string, pmcid: string): string {
  return join(keywordDir, `${toDisplayPmcid(pmcid)}.json`);
}
