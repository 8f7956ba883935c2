/**
 * Record and outcome type definitions.
 * Defines the persisted article record, its metadata, and per-article fetch outcomes.
 */

/**
 * Publication date as stored under `pub_date` in a metadata record.
 */
export interface PubDate {
  year: string;
  month?: string;
  day?: string;
}

/**
 * Metadata extracted from the JATS front matter of one article.
 * Every field is absent when unknown; keys are the persisted JSON names.
 */
export interface MetadataRecord {
  /** Article title */
  title?: string;
  /** Journal title from journal-title-group */
  journal_title?: string;
  /** ISO abbreviation from journal-id[journal-id-type=iso-abbrev] */
  journal_iso_abbrev?: string;
  /** NLM title abbreviation from journal-id[journal-id-type=nlm-ta] */
  journal_nlm_ta?: string;
  /** First available of journal_title, journal_iso_abbrev, journal_nlm_ta */
  journal?: string;
  /** Display names, "Surname Given" */
  authors?: string[];
  abstract?: string;
  keywords?: string[];
  pmid?: string;
  pmcid?: string;
  doi?: string;
  year?: string;
  month?: string;
  day?: string;
  pub_date?: PubDate;
}

/**
 * One persisted article (`<keyword-dir>/PMC<id>.json`).
 */
export interface ArticleRecord {
  /** Display identifier with "PMC" prefix */
  pmcid: string;
  /** Always "PMC" */
  source: string;
  /** ISO 8601 timestamp of retrieval */
  download_date: string;
  metadata: MetadataRecord;
  /** Raw efetch XML */
  xml?: string;
  /** Tag-stripped plain text of the XML */
  text?: string;
}

/**
 * Terminal status of fetching one identifier.
 */
export type FetchStatus = "success" | "exists" | "unavailable" | "error";

export interface FetchOutcome {
  /** True for "success" and "exists" */
  success: boolean;
  status: FetchStatus;
  error?: string;
}

/**
 * Result of an esearch query.
 */
export interface SearchResult {
  /** Numeric PMC ids in relevance order, capped at the requested maximum */
  ids: string[];
  /** Total match count reported by the service */
  total: number;
}
