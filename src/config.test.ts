import { describe, expect, it } from "vitest";
import {
  DEFAULT_OUTPUT_DIR,
  DEFAULT_USER_AGENT,
  RATE_LIMIT_NO_API_KEY_MS,
  RATE_LIMIT_WITH_API_KEY_MS,
  buildUserAgent,
  resolveConfig,
} from "./config.js";

describe("buildUserAgent", () => {
  it("uses the default agent without email", () => {
    expect(buildUserAgent()).toBe(DEFAULT_USER_AGENT);
  });

  it("appends a mailto contact when an email is given", () => {
    expect(buildUserAgent(undefined, "someone@example.org")).toBe(
      `${DEFAULT_USER_AGENT} (mailto:someone@example.org)`
    );
  });

  it("uses a custom agent verbatim", () => {
    expect(buildUserAgent("my-lab-bot/2.0", "someone@example.org")).toBe("my-lab-bot/2.0");
  });
});

describe("resolveConfig", () => {
  it("applies defaults with an empty environment", () => {
    const config = resolveConfig({}, {});
    expect(config).toEqual({
      userAgent: DEFAULT_USER_AGENT,
      rateLimitMs: RATE_LIMIT_NO_API_KEY_MS,
      outputDir: DEFAULT_OUTPUT_DIR,
    });
  });

  it("reads settings from the environment", () => {
    const config = resolveConfig(
      {},
      {
        NCBI_API_KEY: "test-key",
        NCBI_EMAIL: "someone@example.org",
        PMC_HARVEST_OUTPUT_DIR: "/data/pubs",
      }
    );
    expect(config.apiKey).toBe("test-key");
    expect(config.userAgent).toBe(`${DEFAULT_USER_AGENT} (mailto:someone@example.org)`);
    expect(config.outputDir).toBe("/data/pubs");
  });

  it("uses the faster rate limit when an API key is present", () => {
    expect(resolveConfig({ apiKey: "test-key" }, {}).rateLimitMs).toBe(
      RATE_LIMIT_WITH_API_KEY_MS
    );
  });

  it("lets explicit overrides beat the environment", () => {
    const config = resolveConfig(
      { apiKey: "explicit-key", rateLimitMs: 0, userAgent: "custom/1.0" },
      {
        NCBI_API_KEY: "env-key",
        PMC_HARVEST_RATE_LIMIT_MS: "500",
        PMC_HARVEST_USER_AGENT: "env-agent/1.0",
      }
    );
    expect(config.apiKey).toBe("explicit-key");
    expect(config.rateLimitMs).toBe(0);
    expect(config.userAgent).toBe("custom/1.0");
  });

  it("reads an explicit rate limit from the environment", () => {
    expect(resolveConfig({}, { PMC_HARVEST_RATE_LIMIT_MS: "250" }).rateLimitMs).toBe(250);
  });

  it("treats blank environment variables as unset", () => {
    const config = resolveConfig({}, { NCBI_API_KEY: "  ", NCBI_EMAIL: "" });
    expect(config.apiKey).toBeUndefined();
    expect(config.userAgent).toBe(DEFAULT_USER_AGENT);
  });

  it("rejects a negative rate limit", () => {
    expect(() => resolveConfig({ rateLimitMs: -1 }, {})).toThrow(/Invalid configuration: rateLimitMs/);
  });

  it("rejects a non-numeric rate limit from the environment", () => {
    expect(() => resolveConfig({}, { PMC_HARVEST_RATE_LIMIT_MS: "fast" })).toThrow(
      /rateLimitMs/
    );
  });

  it("rejects a malformed email", () => {
    expect(() => resolveConfig({ email: "not-an-email" }, {})).toThrow(/email/);
  });
});
