/**
 * Navigation helpers over fast-xml-parser's `preserveOrder` output.
 *
 * A node is either a text node `{ "#text": string }` or an element node
 * `{ tagName: OrderedNode[], ":@"?: { "@_attr": value } }`.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";

export type OrderedNode = Record<string, unknown>;

export interface ElementRef {
  tag: string;
  children: OrderedNode[];
  attrs: Record<string, string>;
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  trimValues: false,
  preserveOrder: true,
  processEntities: true,
  htmlEntities: true,
  // Keep "03" as "03": dates and ids must stay strings
  parseTagValue: false,
  parseAttributeValue: false,
});

function isOrderedNode(value: unknown): value is OrderedNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toNodes(value: unknown): OrderedNode[] {
  return Array.isArray(value) ? value.filter(isOrderedNode) : [];
}

export type ParseResult = { ok: true; nodes: OrderedNode[] } | { ok: false; error: string };

/**
 * Validate and parse an XML string. Input that is not well-formed is reported,
 * never thrown.
 */
export function parseXml(xml: string): ParseResult {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    return { ok: false, error: `${msg} (line ${line})` };
  }
  try {
    return { ok: true, nodes: toNodes(parser.parse(xml)) };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

/** Get the tag name of an ordered node (the first key that isn't ":@" or "#text"). */
export function getTagName(node: OrderedNode): string | undefined {
  for (const key of Object.keys(node)) {
    if (key !== ":@" && key !== "#text") return key;
  }
  return undefined;
}

/** Get all attributes of an element node, without the "@_" prefix. */
function getAttrs(node: OrderedNode): Record<string, string> {
  const attrs = node[":@"];
  if (!isOrderedNode(attrs)) return {};
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(attrs)) {
    if (key.startsWith("@_")) {
      result[key.slice(2)] = String(value);
    }
  }
  return result;
}

function toElementRef(node: OrderedNode, tag: string): ElementRef {
  return { tag, children: toNodes(node[tag]), attrs: getAttrs(node) };
}

/** Find the first child element with the given tag name. */
export function findChild(children: OrderedNode[], tagName: string): ElementRef | undefined {
  for (const child of children) {
    if (tagName in child) return toElementRef(child, tagName);
  }
  return undefined;
}

/** Find all child elements with the given tag name. */
export function findChildren(children: OrderedNode[], tagName: string): ElementRef[] {
  return children.filter((child) => tagName in child).map((child) => toElementRef(child, tagName));
}

/** First real element at the top level, skipping the XML declaration and comments. */
export function findRootElement(nodes: OrderedNode[]): ElementRef | undefined {
  for (const node of nodes) {
    const tag = getTagName(node);
    if (tag && !tag.startsWith("?") && !tag.startsWith("!")) {
      return toElementRef(node, tag);
    }
  }
  return undefined;
}

/** Collect every text fragment under the given nodes, in document order. */
export function collectTexts(nodes: OrderedNode[], into: string[] = []): string[] {
  for (const node of nodes) {
    if ("#text" in node) {
      const value = node["#text"];
      if (value != null) into.push(String(value));
      continue;
    }
    const tag = getTagName(node);
    if (tag) collectTexts(toNodes(node[tag]), into);
  }
  return into;
}

/** All text content under the given nodes, concatenated and trimmed. */
export function textContent(nodes: OrderedNode[]): string {
  return collectTexts(nodes).join("").trim();
}
