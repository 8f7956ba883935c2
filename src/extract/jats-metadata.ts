/**
 * JATS front-matter metadata extraction for PMC efetch responses.
 *
 * Produces a flat {@link MetadataRecord}. Extraction never throws: markup that
 * is not well-formed yields `{}`, and documents missing parts of the front
 * matter yield whatever could be read before the gap.
 */

import type { MetadataRecord, PubDate } from "../types.js";
import {
  type ElementRef,
  type OrderedNode,
  collectTexts,
  findChild,
  findChildren,
  findRootElement,
  parseXml,
  textContent,
} from "./ordered-xml.js";

type JournalFields = Pick<
  MetadataRecord,
  "journal_title" | "journal_nlm_ta" | "journal_iso_abbrev" | "journal"
>;

type DateParts = Partial<PubDate>;

/** Article-id types we keep, mapped to their record key */
const ARTICLE_ID_KEYS: Record<string, "pmid" | "pmcid" | "doi"> = {
  pmid: "pmid",
  pmcid: "pmcid",
  pmc: "pmcid",
  doi: "doi",
};

/**
 * Find the <article> element, either as the document root or inside the
 * <pmc-articleset> wrapper that efetch returns.
 */
function findArticle(nodes: OrderedNode[]): ElementRef | undefined {
  const root = findRootElement(nodes);
  if (!root) return undefined;
  if (root.tag === "article") return root;
  return findChild(root.children, "article");
}

/** Trimmed text of a child element, or undefined when missing or blank. */
function childText(children: OrderedNode[], tagName: string): string | undefined {
  const child = findChild(children, tagName);
  if (!child) return undefined;
  return textContent(child.children) || undefined;
}

function parseJournal(frontChildren: OrderedNode[]): JournalFields {
  const journalMeta = findChild(frontChildren, "journal-meta");
  if (!journalMeta) return {};

  const fields: JournalFields = {};

  const titleGroup = findChild(journalMeta.children, "journal-title-group");
  const title = titleGroup ? childText(titleGroup.children, "journal-title") : undefined;
  if (title) fields.journal_title = title;

  for (const journalId of findChildren(journalMeta.children, "journal-id")) {
    const value = textContent(journalId.children);
    if (!value) continue;
    const idType = journalId.attrs["journal-id-type"];
    if (idType === "nlm-ta" && fields.journal_nlm_ta === undefined) {
      fields.journal_nlm_ta = value;
    } else if (idType === "iso-abbrev" && fields.journal_iso_abbrev === undefined) {
      fields.journal_iso_abbrev = value;
    }
  }

  const journal = fields.journal_title ?? fields.journal_iso_abbrev ?? fields.journal_nlm_ta;
  if (journal) fields.journal = journal;
  return fields;
}

/** pmid / pmcid / doi; the first id of each type wins. */
function parseArticleIds(metaChildren: OrderedNode[]): Pick<MetadataRecord, "pmid" | "pmcid" | "doi"> {
  const ids: Pick<MetadataRecord, "pmid" | "pmcid" | "doi"> = {};
  for (const articleId of findChildren(metaChildren, "article-id")) {
    const idType = articleId.attrs["pub-id-type"] ?? "";
    const key = Object.hasOwn(ARTICLE_ID_KEYS, idType) ? ARTICLE_ID_KEYS[idType] : undefined;
    const value = textContent(articleId.children);
    if (key && value && ids[key] === undefined) ids[key] = value;
  }
  return ids;
}

function parseTitle(metaChildren: OrderedNode[]): string | undefined {
  const titleGroup = findChild(metaChildren, "title-group");
  return titleGroup ? childText(titleGroup.children, "article-title") : undefined;
}

function isElectronicPubDate(attrs: Record<string, string>): boolean {
  return (
    attrs["pub-type"] === "epub" ||
    (attrs["date-type"] === "pub" && attrs["publication-format"] === "electronic")
  );
}

function isCollectionPubDate(attrs: Record<string, string>): boolean {
  return attrs["pub-type"] === "collection" || attrs["date-type"] === "collection";
}

/**
 * Electronic publication date (year/month/day), falling back to the
 * collection date (year only).
 */
function parsePublicationDate(metaChildren: OrderedNode[]): DateParts {
  const pubDates = findChildren(metaChildren, "pub-date");

  const epub = pubDates.find((pd) => isElectronicPubDate(pd.attrs));
  if (epub) {
    const date: DateParts = {};
    const year = childText(epub.children, "year");
    const month = childText(epub.children, "month");
    const day = childText(epub.children, "day");
    if (year) date.year = year;
    if (month) date.month = month;
    if (day) date.day = day;
    return date;
  }

  const collection = pubDates.find((pd) => isCollectionPubDate(pd.attrs));
  const year = collection ? childText(collection.children, "year") : undefined;
  return year ? { year } : {};
}

/** Flat year/month/day plus the nested pub_date mirror. */
function dateFields(date: DateParts): Pick<MetadataRecord, "year" | "month" | "day" | "pub_date"> {
  const fields: Pick<MetadataRecord, "year" | "month" | "day" | "pub_date"> = {};
  if (date.year) fields.year = date.year;
  if (date.month) fields.month = date.month;
  if (date.day) fields.day = date.day;

  if (date.year) {
    const pubDate: PubDate = { year: date.year };
    if (date.month) pubDate.month = date.month;
    if (date.day) pubDate.day = date.day;
    fields.pub_date = pubDate;
  }
  return fields;
}

/** "Surname Given", else "Surname Initials", else "Surname". */
function formatAuthorName(name: ElementRef): string {
  const surname = childText(name.children, "surname") ?? "";
  const givenNames = childText(name.children, "given-names");
  const initials =
    name.attrs["initials"]?.trim() ||
    findChild(name.children, "given-names")?.attrs["initials"]?.trim();

  const rest = givenNames ?? initials;
  return rest ? `${surname} ${rest}`.trim() : surname;
}

function parseAuthors(metaChildren: OrderedNode[]): string[] {
  const authors: string[] = [];
  for (const group of findChildren(metaChildren, "contrib-group")) {
    for (const contrib of findChildren(group.children, "contrib")) {
      if (contrib.attrs["contrib-type"] !== "author") continue;
      const name = findChild(contrib.children, "name");
      if (!name) continue;
      const display = formatAuthorName(name);
      if (display) authors.push(display);
    }
  }
  return authors;
}

/** Every text fragment of <abstract>, joined by single spaces. */
function parseAbstract(metaChildren: OrderedNode[]): string | undefined {
  const abstract = findChild(metaChildren, "abstract");
  if (!abstract) return undefined;
  const text = collectTexts(abstract.children).join(" ").trim();
  return text || undefined;
}

function parseKeywords(metaChildren: OrderedNode[]): string[] {
  const keywords: string[] = [];
  for (const group of findChildren(metaChildren, "kwd-group")) {
    for (const kwd of findChildren(group.children, "kwd")) {
      const text = textContent(kwd.children);
      if (text) keywords.push(text);
    }
  }
  return keywords;
}

function decode(markup: string | Uint8Array): string {
  return typeof markup === "string" ? markup : new TextDecoder().decode(markup);
}

/**
 * Extract metadata (title, journal, authors, ids, dates, abstract, keywords)
 * from a PMC JATS document.
 */
export function extractMetadata(markup: string | Uint8Array): MetadataRecord {
  try {
    const parsed = parseXml(decode(markup));
    if (!parsed.ok) return {};

    const article = findArticle(parsed.nodes);
    if (!article) return {};

    const front = findChild(article.children, "front");
    if (!front) return {};

    const metadata: MetadataRecord = { ...parseJournal(front.children) };

    const articleMeta = findChild(front.children, "article-meta");
    if (!articleMeta) return metadata;
    const metaChildren = articleMeta.children;

    Object.assign(metadata, parseArticleIds(metaChildren));

    const title = parseTitle(metaChildren);
    if (title) metadata.title = title;

    Object.assign(metadata, dateFields(parsePublicationDate(metaChildren)));

    const authors = parseAuthors(metaChildren);
    if (authors.length > 0) metadata.authors = authors;

    const abstract = parseAbstract(metaChildren);
    if (abstract) metadata.abstract = abstract;

    const keywords = parseKeywords(metaChildren);
    if (keywords.length > 0) metadata.keywords = keywords;

    return metadata;
  } catch {
    return {};
  }
}
