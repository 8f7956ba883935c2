import { describe, expect, it } from "vitest";
import { formatFields, parseOutputFormat } from "./format.js";

describe("parseOutputFormat", () => {
  it("accepts canonical formats", () => {
    expect(parseOutputFormat("xml")).toBe("xml");
    expect(parseOutputFormat("text")).toBe("text");
    expect(parseOutputFormat("both")).toBe("both");
  });

  it("maps legacy json and txt to text", () => {
    expect(parseOutputFormat("json")).toBe("text");
    expect(parseOutputFormat("txt")).toBe("text");
  });

  it("ignores case and surrounding whitespace", () => {
    expect(parseOutputFormat(" XML ")).toBe("xml");
  });

  it("rejects unknown formats", () => {
    expect(() => parseOutputFormat("pdf")).toThrow(/Unknown output format "pdf"/);
  });

  it("rejects names inherited from Object.prototype", () => {
    expect(() => parseOutputFormat("constructor")).toThrow(/Unknown output format "constructor"/);
    expect(() => parseOutputFormat("toString")).toThrow(/Unknown output format "toString"/);
  });
});

describe("formatFields", () => {
  it("xml carries markup only", () => {
    expect(formatFields("xml")).toEqual({ xml: true, text: false });
  });

  it("text carries plain text only", () => {
    expect(formatFields("text")).toEqual({ xml: false, text: true });
  });

  it("both carries markup and plain text", () => {
    expect(formatFields("both")).toEqual({ xml: true, text: true });
  });

  it("includeText=false drops the plain text", () => {
    expect(formatFields("text", false)).toEqual({ xml: false, text: false });
    expect(formatFields("both", false)).toEqual({ xml: true, text: false });
    expect(formatFields("xml", false)).toEqual({ xml: true, text: false });
  });
});
