import { describe, it, expect } from "vitest";
import { buildApiBase, loadConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";

const BASE: Record<string, string> = {
  NOTEPM_TEAM: "acme",
  NOTEPM_API_TOKEN: "test-token",
};

describe("loadConfig", () => {
  it("loads minimal config and derives the API base", () => {
    const config = loadConfig(BASE);
    expect(config.team).toBe("acme");
    expect(config.apiToken).toBe("test-token");
    expect(config.apiBase).toBe("https://acme.notepm.jp/api/v1/pages");
  });

  it("applies defaults", () => {
    const config = loadConfig(BASE);
    expect(config.maxBodyLength).toBe(200);
    expect(config.requestTimeoutMs).toBe(30_000);
    expect(config.searchDescription).toBeUndefined();
    expect(config.pageDetailDescription).toBeUndefined();
    expect(config.logLevel).toBeUndefined();
  });

  it("overrides numeric settings via env vars", () => {
    const config = loadConfig({
      ...BASE,
      NOTEPM_MAX_BODY_LENGTH: "50",
      NOTEPM_REQUEST_TIMEOUT_MS: "5000",
    });
    expect(config.maxBodyLength).toBe(50);
    expect(config.requestTimeoutMs).toBe(5000);
  });

  it("reads tool description overrides", () => {
    const config = loadConfig({
      ...BASE,
      NOTEPM_SEARCH_DESCRIPTION: "Search our handbook",
      NOTEPM_PAGE_DETAIL_DESCRIPTION: "Read one handbook page",
    });
    expect(config.searchDescription).toBe("Search our handbook");
    expect(config.pageDetailDescription).toBe("Read one handbook page");
  });

  it("treats empty optional values as unset", () => {
    const config = loadConfig({ ...BASE, NOTEPM_MAX_BODY_LENGTH: "", NOTEPM_SEARCH_DESCRIPTION: "" });
    expect(config.maxBodyLength).toBe(200);
    expect(config.searchDescription).toBeUndefined();
  });

  it("overrides log level via env var", () => {
    expect(loadConfig({ ...BASE, LOG_LEVEL: "debug" }).logLevel).toBe("debug");
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(loadConfig(BASE))).toBe(true);
  });

  it("throws ConfigurationError when NOTEPM_TEAM is missing", () => {
    expect(() => loadConfig({ NOTEPM_API_TOKEN: "test-token" })).toThrow(ConfigurationError);
  });

  it("throws ConfigurationError when NOTEPM_API_TOKEN is empty", () => {
    expect(() => loadConfig({ NOTEPM_TEAM: "acme", NOTEPM_API_TOKEN: "" })).toThrow(
      "apiToken: NOTEPM_API_TOKEN is required"
    );
  });

  it("lists every missing credential", () => {
    let caught: unknown;
    try {
      loadConfig({});
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught instanceof ConfigurationError && caught.issues).toEqual([
      "team: NOTEPM_TEAM is required",
      "apiToken: NOTEPM_API_TOKEN is required",
    ]);
  });

  it("rejects a non-positive max body length", () => {
    expect(() => loadConfig({ ...BASE, NOTEPM_MAX_BODY_LENGTH: "0" })).toThrow(ConfigurationError);
  });

  it("rejects a non-numeric timeout", () => {
    expect(() => loadConfig({ ...BASE, NOTEPM_REQUEST_TIMEOUT_MS: "soon" })).toThrow(ConfigurationError);
  });
});

describe("buildApiBase", () => {
  it("puts the team in the host name", () => {
    expect(buildApiBase("docs-team")).toBe("https://docs-team.notepm.jp/api/v1/pages");
  });
});
