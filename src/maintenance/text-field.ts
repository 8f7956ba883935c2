/**
 * Maintenance of the derived `text` field in saved records.
 *
 * `text` is the tag-stripped copy of `xml`, so it can be regenerated or
 * dropped at any time without another download.
 */

import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { loadRecord, saveRecord } from "../download/record.js";
import { stripMarkup } from "../extract/plain-text.js";

export type TextFieldOperation = "add" | "remove" | "check";

export const TEXT_FIELD_OPERATIONS: readonly TextFieldOperation[] = ["add", "remove", "check"];

export interface TextFieldResult {
  /** `done`: changed (add/remove) or present (check) */
  status: "done" | "skipped" | "error";
  message: string;
  /** UTF-8 size of the affected text, 0 when none */
  bytes: number;
}

export interface DirectoryReport {
  directory: string;
  files: Array<{ file: string; result: TextFieldResult }>;
  done: number;
  skipped: number;
  errors: number;
  /** Bytes of text removed (remove only) */
  bytesSaved: number;
}

function kb(bytes: number): string {
  return `${(bytes / 1024).toFixed(1)} KB`;
}

function failed(err: unknown): TextFieldResult {
  return {
    status: "error",
    message: `error: ${err instanceof Error ? err.message : String(err)}`,
    bytes: 0,
  };
}

/** Regenerate `text` from `xml` when it is missing or empty. */
export async function addTextField(path: string): Promise<TextFieldResult> {
  try {
    const record = await loadRecord(path);
    if (record.text) {
      return { status: "skipped", message: "already has text field", bytes: 0 };
    }
    if (record.xml === undefined) {
      return { status: "error", message: "no XML field to generate from", bytes: 0 };
    }
    const text = stripMarkup(record.xml);
    await saveRecord(path, { ...record, text });
    return { status: "done", message: "text field added", bytes: Buffer.byteLength(text, "utf-8") };
  } catch (err) {
    return failed(err);
  }
}

/** Drop `text` from a record. */
export async function removeTextField(path: string): Promise<TextFieldResult> {
  try {
    const { text, ...rest } = await loadRecord(path);
    if (text === undefined) {
      return { status: "skipped", message: "no text field to remove", bytes: 0 };
    }
    await saveRecord(path, rest);
    const bytes = Buffer.byteLength(text, "utf-8");
    return { status: "done", message: `removed (${kb(bytes)} saved)`, bytes };
  } catch (err) {
    return failed(err);
  }
}

/** Report whether a record carries a non-empty `text`. */
export async function checkTextField(path: string): Promise<TextFieldResult> {
  try {
    const record = await loadRecord(path);
    if (!record.text) {
      return { status: "skipped", message: "no text field", bytes: 0 };
    }
    const bytes = Buffer.byteLength(record.text, "utf-8");
    return { status: "done", message: `has text field (${kb(bytes)})`, bytes };
  } catch (err) {
    return failed(err);
  }
}

const OPERATIONS: Record<TextFieldOperation, (path: string) => Promise<TextFieldResult>> = {
  add: addTextField,
  remove: removeTextField,
  check: checkTextField,
};

/**
 * Apply an operation to every `PMC*.json` record in a directory, in name order.
 * @throws when the directory cannot be read
 */
export async function applyToDirectory(
  directory: string,
  operation: TextFieldOperation
): Promise<DirectoryReport> {
  const entries = await readdir(directory);
  const files = entries.filter((name) => /^PMC.*\.json$/.test(name)).sort();
  const report: DirectoryReport = {
    directory,
    files: [],
    done: 0,
    skipped: 0,
    errors: 0,
    bytesSaved: 0,
  };

  for (const file of files) {
    const result = await OPERATIONS[operation](join(directory, file));
    report.files.push({ file, result });
    if (result.status === "done") {
      report.done++;
      if (operation === "remove") report.bytesSaved += result.bytes;
    } else if (result.status === "skipped") {
      report.skipped++;
    } else {
      report.errors++;
    }
  }
  return report;
}

const STATUS_MARKS: Record<TextFieldResult["status"], string> = {
  done: "✓",
  skipped: "○",
  error: "✗",
};

/** Render a directory report as printable lines. */
export function formatDirectoryReport(report: DirectoryReport): string {
  if (report.files.length === 0) {
    return `No PMC JSON files found in ${report.directory}`;
  }
  const lines = [`Processing ${report.files.length} files in ${report.directory}`];
  for (const { file, result } of report.files) {
    lines.push(`${STATUS_MARKS[result.status]} ${file}: ${result.message}`);
  }
  lines.push("Summary:", `  ✓ Processed: ${report.done}`, `  ○ Skipped:   ${report.skipped}`);
  if (report.errors > 0) lines.push(`  ✗ Errors:    ${report.errors}`);
  if (report.bytesSaved > 0) lines.push(`Total space saved: ${kb(report.bytesSaved)}`);
  return lines.join("\n");
}
