import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { getKeywordDir, getRecordPath } from "./paths.js";

describe("Path Resolution Utilities", () => {
  const outputDir = "/data/publications";

  describe("getKeywordDir", () => {
    it("should return slugged keyword directory under output dir", () => {
      expect(getKeywordDir(outputDir, "frailty cytokines")).toBe(
        join(outputDir, "frailty_cytokines")
      );
    });
  });

  describe("getRecordPath", () => {
    it("should name the record after the display PMCID", () => {
      const dir = join(outputDir, "frailty_cytokines");
      expect(getRecordPath(dir, "1234567")).toBe(join(dir, "PMC1234567.json"));
    });

    it("should not double the PMC prefix", () => {
      const dir = join(outputDir, "frailty_cytokines");
      expect(getRecordPath(dir, "PMC1234567")).toBe(join(dir, "PMC1234567.json"));
    });
  });
});
