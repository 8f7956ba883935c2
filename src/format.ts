/**
 * Output format selection for persisted records.
 */

/** Which optional payload fields a record carries */
export type OutputFormat = "xml" | "text" | "both";

/** Legacy names accepted on input and mapped to a canonical format */
const FORMAT_ALIASES: Record<string, OutputFormat> = {
  xml: "xml",
  text: "text",
  both: "both",
  json: "text",
  txt: "text",
};

/** All names accepted by {@link parseOutputFormat}, canonical ones first. */
export const FORMAT_NAMES = Object.keys(FORMAT_ALIASES);

/**
 * Resolve a user-supplied format name (including the legacy `json`/`txt`
 * aliases) to its canonical variant.
 * @throws Error when the name is not a known format
 */
export function parseOutputFormat(name: string): OutputFormat {
  const key = name.trim().toLowerCase();
  const format = Object.hasOwn(FORMAT_ALIASES, key) ? FORMAT_ALIASES[key] : undefined;
  if (!format) {
    throw new Error(`Unknown output format "${name}" (expected one of: ${FORMAT_NAMES.join(", ")})`);
  }
  return format;
}

/**
 * Fields a record includes for a format. `includeText: false` drops the
 * derived text, so a `text` record then carries metadata only.
 */
export function formatFields(
  format: OutputFormat,
  includeText = true
): { xml: boolean; text: boolean } {
  switch (format) {
    case "xml":
      return { xml: true, text: false };
    case "text":
      return { xml: false, text: includeText };
    case "both":
      return { xml: true, text: includeText };
  }
}
