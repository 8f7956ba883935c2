/**
 * Search-term slugs for keyword output directories.
 */

import anyAscii from "any-ascii";

/** Used when a term has no filesystem-safe characters at all */
const FALLBACK_SLUG = "keyword";

/**
 * Generate a filesystem-safe directory name from a search term.
 * Non-ASCII letters are transliterated ("Müller" → "Muller"), then every run of
 * characters outside `[A-Za-z0-9._-]` collapses to a single "_".
 * Leading and trailing underscores are dropped.
 */
export function keywordSlug(term: string): string {
  const slug = anyAscii(term.trim())
    .replace(/[^A-Za-z0-9._-]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return slug || FALLBACK_SLUG;
}
