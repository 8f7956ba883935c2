/**
 * Article record construction and persistence (`PMC<id>.json`).
 */

import { access, mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { stripMarkup } from "../extract/plain-text.js";
import { type OutputFormat, formatFields } from "../format.js";
import { toDisplayPmcid } from "../ids.js";
import type { ArticleRecord, MetadataRecord } from "../types.js";

export const RECORD_SOURCE = "PMC";

export interface BuildRecordOptions {
  pmcid: string;
  /** Raw efetch XML */
  xml: string;
  metadata: MetadataRecord;
  format: OutputFormat;
  /** Include the derived plain text for text/both (default: true) */
  includeText?: boolean;
  /** Retrieval time (default: now) */
  downloadedAt?: Date;
}

/** Build the persisted record; optional payload fields follow the format. */
export function buildArticleRecord(options: BuildRecordOptions): ArticleRecord {
  const record: ArticleRecord = {
    pmcid: toDisplayPmcid(options.pmcid),
    source: RECORD_SOURCE,
    download_date: (options.downloadedAt ?? new Date()).toISOString(),
    metadata: options.metadata,
  };

  const fields = formatFields(options.format, options.includeText ?? true);
  if (fields.xml) record.xml = options.xml;
  if (fields.text) record.text = stripMarkup(options.xml);
  return record;
}

const storedRecordSchema = z
  .object({
    pmcid: z.string(),
    source: z.string(),
    download_date: z.string(),
    metadata: z.record(z.unknown()),
    xml: z.string().optional(),
    text: z.string().optional(),
  })
  .passthrough();

/** A record read back from disk; unknown keys are preserved. */
export type StoredRecord = z.infer<typeof storedRecordSchema>;

/** Check whether a record file is already present. */
export async function recordExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** Load and validate a record file. */
export async function loadRecord(path: string): Promise<StoredRecord> {
  const raw = await readFile(path, "utf-8");
  const parsed = storedRecordSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid record ${path}: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }
  return parsed.data;
}

/**
 * Save a record with 2-space indentation in a single write, creating the
 * parent directory when needed.
 */
export async function saveRecord(path: string, record: ArticleRecord | StoredRecord): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(record, null, 2)}\n`, "utf-8");
}
