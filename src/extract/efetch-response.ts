/**
 * Classification of PMC efetch response bodies.
 */

import { findChild, findRootElement, parseXml, textContent } from "./ordered-xml.js";

export type EfetchBody =
  /** A well-formed article document */
  | { kind: "document" }
  /** `<pmc-articleset><error>…</error></pmc-articleset>`: no full text for this id */
  | { kind: "unavailable"; message: string }
  /** Not well-formed XML */
  | { kind: "malformed"; error: string };

/**
 * Decide whether an efetch body is an article, the service's "not available"
 * wrapper, or unparsable.
 */
export function classifyEfetchBody(body: string): EfetchBody {
  const parsed = parseXml(body);
  if (!parsed.ok) return { kind: "malformed", error: parsed.error };

  const root = findRootElement(parsed.nodes);
  if (!root) return { kind: "malformed", error: "No root element" };

  if (root.tag === "pmc-articleset") {
    const error = findChild(root.children, "error");
    if (error) return { kind: "unavailable", message: textContent(error.children) };
  }
  return { kind: "document" };
}
