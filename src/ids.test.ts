import { describe, expect, it } from "vitest";
import { normalizePmcid, toDisplayPmcid } from "./ids.js";

describe("normalizePmcid", () => {
  it("strips the PMC prefix", () => {
    expect(normalizePmcid("PMC1234567")).toBe("1234567");
  });

  it("is case-insensitive about the prefix", () => {
    expect(normalizePmcid("pmc1234567")).toBe("1234567");
  });

  it("leaves numeric ids untouched", () => {
    expect(normalizePmcid("1234567")).toBe("1234567");
  });
});

describe("toDisplayPmcid", () => {
  it("adds the PMC prefix to numeric ids", () => {
    expect(toDisplayPmcid("1234567")).toBe("PMC1234567");
  });

  it("does not double an existing prefix", () => {
    expect(toDisplayPmcid("PMC1234567")).toBe("PMC1234567");
  });
});
