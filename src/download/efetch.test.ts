/**
 * Tests for the PMC efetch downloader.
 */

import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { EutilsClient } from "../http/eutils-client.js";
import { RateLimiter } from "../http/rate-limiter.js";
import { type FetchOptions, fetchArticle } from "./efetch.js";

const mockFetch = vi.fn();
vi.stubGlobal("fetch", mockFetch);

const ARTICLE_XML = `<pmc-articleset><article>
  <front>
    <journal-meta><journal-title-group><journal-title>Aging Cell</journal-title></journal-title-group></journal-meta>
    <article-meta>
      <article-id pub-id-type="pmcid">PMC1234567</article-id>
      <title-group><article-title>Cytokines in frailty</article-title></title-group>
    </article-meta>
  </front>
  <body><p>IL-6 &amp; TNF</p></body>
</article></pmc-articleset>`;

const UNAVAILABLE_XML =
  '<pmc-articleset><error id="1234567">The following PMCID is not available: 1234567</error></pmc-articleset>';

function createMockResponse(
  overrides: Partial<{ ok: boolean; status: number; statusText: string; body: string }> = {}
) {
  return {
    ok: overrides.ok ?? true,
    status: overrides.status ?? 200,
    statusText: overrides.statusText ?? "OK",
    text: () => Promise.resolve(overrides.body ?? ARTICLE_XML),
  };
}

function createOptions(overrides: Partial<FetchOptions> = {}): FetchOptions {
  return {
    client: new EutilsClient({ rateLimiter: new RateLimiter(0), userAgent: "test-agent/1.0" }),
    retries: 3,
    retryDelayMs: 1,
    ...overrides,
  };
}

async function readRecord(path: string): Promise<Record<string, unknown>> {
  return JSON.parse(await readFile(path, "utf-8")) as Record<string, unknown>;
}

describe("fetchArticle", () => {
  let destDir: string;

  beforeEach(async () => {
    mockFetch.mockReset();
    destDir = await mkdtemp(join(tmpdir(), "pmc-harvest-efetch-"));
  });

  afterEach(async () => {
    await rm(destDir, { recursive: true, force: true });
  });

  it("downloads an article and saves a text record", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse());

    const outcome = await fetchArticle("1234567", destDir, "text", createOptions());

    expect(outcome).toEqual({ success: true, status: "success" });
    const record = await readRecord(join(destDir, "PMC1234567.json"));
    expect(record["pmcid"]).toBe("PMC1234567");
    expect(record["source"]).toBe("PMC");
    expect(typeof record["download_date"]).toBe("string");
    expect(record["metadata"]).toEqual({
      journal_title: "Aging Cell",
      journal: "Aging Cell",
      pmcid: "PMC1234567",
      title: "Cytokines in frailty",
    });
    expect(record["text"]).toBe(
      "Aging Cell PMC1234567 Cytokines in frailty IL-6 &amp; TNF"
    );
    expect(record).not.toHaveProperty("xml");
  });

  it("requests full XML for the numeric id", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse());

    await fetchArticle("PMC1234567", destDir, "text", createOptions());

    const url = new URL(String(mockFetch.mock.calls[0]?.[0]));
    expect(url.pathname).toBe("/entrez/eutils/efetch.fcgi");
    expect(url.searchParams.get("db")).toBe("pmc");
    expect(url.searchParams.get("id")).toBe("1234567");
    expect(url.searchParams.get("rettype")).toBe("full");
    expect(url.searchParams.get("retmode")).toBe("xml");
  });

  it("sends the API key when the client has one", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse());
    const client = new EutilsClient({
      rateLimiter: new RateLimiter(0),
      userAgent: "test-agent/1.0",
      apiKey: "test-key",
    });

    await fetchArticle("1", destDir, "text", createOptions({ client }));

    const url = new URL(String(mockFetch.mock.calls[0]?.[0]));
    expect(url.searchParams.get("api_key")).toBe("test-key");
  });

  it("saves raw XML only for the xml format", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse());

    await fetchArticle("1234567", destDir, "xml", createOptions());

    const record = await readRecord(join(destDir, "PMC1234567.json"));
    expect(record["xml"]).toBe(ARTICLE_XML);
    expect(record).not.toHaveProperty("text");
  });

  it("saves XML and text for the both format", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse());

    await fetchArticle("1234567", destDir, "both", createOptions());

    const record = await readRecord(join(destDir, "PMC1234567.json"));
    expect(record["xml"]).toBe(ARTICLE_XML);
    expect(typeof record["text"]).toBe("string");
  });

  it("omits text when includeText is false", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse());

    await fetchArticle("1234567", destDir, "both", createOptions({ includeText: false }));

    const record = await readRecord(join(destDir, "PMC1234567.json"));
    expect(record).toHaveProperty("xml");
    expect(record).not.toHaveProperty("text");
  });

  it("skips an existing record without any request", async () => {
    const path = join(destDir, "PMC1234567.json");
    await writeFile(path, '{"pmcid":"PMC1234567"}', "utf-8");

    const outcome = await fetchArticle("1234567", destDir, "text", createOptions());

    expect(outcome).toEqual({ success: true, status: "exists" });
    expect(mockFetch).not.toHaveBeenCalled();
    expect(await readFile(path, "utf-8")).toBe('{"pmcid":"PMC1234567"}');
  });

  it("reports unavailable articles without retrying", async () => {
    mockFetch.mockResolvedValue(createMockResponse({ body: UNAVAILABLE_XML }));

    const outcome = await fetchArticle("1234567", destDir, "text", createOptions());

    expect(outcome).toEqual({
      success: false,
      status: "unavailable",
      error: "The following PMCID is not available: 1234567",
    });
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it("retries after a 429 and succeeds on the second attempt", async () => {
    mockFetch
      .mockResolvedValueOnce(
        createMockResponse({ ok: false, status: 429, statusText: "Too Many Requests" })
      )
      .mockResolvedValueOnce(createMockResponse());

    const outcome = await fetchArticle("1234567", destDir, "text", createOptions());

    expect(outcome).toEqual({ success: true, status: "success" });
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it("gives up with error after repeated server errors", async () => {
    mockFetch.mockResolvedValue(
      createMockResponse({ ok: false, status: 500, statusText: "Internal Server Error" })
    );

    const outcome = await fetchArticle("1234567", destDir, "text", createOptions());

    expect(outcome).toEqual({
      success: false,
      status: "error",
      error: "HTTP 500 Internal Server Error",
    });
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  it("retries a non-200 success status as an HTTP failure", async () => {
    mockFetch
      .mockResolvedValueOnce(createMockResponse({ status: 202, statusText: "Accepted", body: "" }))
      .mockResolvedValueOnce(createMockResponse());

    const outcome = await fetchArticle("1234567", destDir, "text", createOptions());

    expect(outcome).toEqual({ success: true, status: "success" });
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it("reports the last non-200 status after exhausting retries", async () => {
    mockFetch.mockResolvedValue(createMockResponse({ status: 204, statusText: "No Content", body: "" }));

    const outcome = await fetchArticle("1234567", destDir, "text", createOptions());

    expect(outcome).toEqual({ success: false, status: "error", error: "HTTP 204 No Content" });
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  it("retries malformed XML as a transient failure", async () => {
    mockFetch
      .mockResolvedValueOnce(createMockResponse({ body: "<pmc-articleset><article>" }))
      .mockResolvedValueOnce(createMockResponse());

    const outcome = await fetchArticle("1234567", destDir, "text", createOptions());

    expect(outcome.status).toBe("success");
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it("reports error when every body is malformed", async () => {
    mockFetch.mockResolvedValue(createMockResponse({ body: "Service unavailable" }));

    const outcome = await fetchArticle("1234567", destDir, "text", createOptions());

    expect(outcome.status).toBe("error");
    expect(outcome.error).toMatch(/^Malformed XML/);
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  it("retries network errors", async () => {
    mockFetch
      .mockRejectedValueOnce(new Error("ECONNRESET"))
      .mockResolvedValueOnce(createMockResponse());

    const outcome = await fetchArticle("1234567", destDir, "text", createOptions());

    expect(outcome.status).toBe("success");
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it("does not retry a failed write", async () => {
    const blocker = join(destDir, "blocker");
    await writeFile(blocker, "not a directory", "utf-8");
    mockFetch.mockResolvedValue(createMockResponse());

    const outcome = await fetchArticle("1234567", join(blocker, "out"), "text", createOptions());

    expect(outcome.success).toBe(false);
    expect(outcome.status).toBe("error");
    expect(outcome.error).toMatch(/^Failed to write/);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });
});
