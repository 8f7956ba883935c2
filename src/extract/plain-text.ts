/**
 * Plain-text derivation from markup.
 */

/**
 * Replace every tag with a space, collapse whitespace runs to one space and
 * trim. Entities are left as written.
 */
export function stripMarkup(markup: string): string {
  return markup
    .replace(/<[^>]+>/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}
