import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import {
  ConfigError,
  DEFAULT_PREFERENCES,
  loadConfig,
  loadPreferences,
  parseCliArgs,
} from "../src/utils/config.ts";

describe("loadConfig", () => {
  it("defaults to Gemini with the standard model and timeouts", () => {
    expect(loadConfig({ GEMINI_API_KEY: "test-key" })).toEqual({
      provider: "gemini",
      apiKey: "test-key",
      model: "gemini-2.0-flash",
      fetchTimeoutMs: 15000,
      oracleTimeoutMs: 60000,
      preferencesFile: "config/preferences.json",
      outputFile: undefined,
    });
  });

  it("fails when the API key is missing", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ GEMINI_API_KEY: "  " })).toThrow("GEMINI_API_KEY not found");
  });

  it("requires the key of the selected provider", () => {
    expect(() => loadConfig({ ORACLE_PROVIDER: "anthropic", GEMINI_API_KEY: "test-key" })).toThrow(
      "ANTHROPIC_API_KEY not found"
    );
  });

  it("applies model and timeout overrides", () => {
    const config = loadConfig({
      ORACLE_PROVIDER: "anthropic",
      ANTHROPIC_API_KEY: "test-key",
      ANTHROPIC_MODEL: "claude-test",
      FETCH_TIMEOUT_MS: "5000",
      OUTPUT_FILE: "out.xlsx",
    });
    expect(config.provider).toBe("anthropic");
    expect(config.model).toBe("claude-test");
    expect(config.fetchTimeoutMs).toBe(5000);
    expect(config.oracleTimeoutMs).toBe(60000);
    expect(config.outputFile).toBe("out.xlsx");
  });

  it("rejects an unknown provider", () => {
    expect(() => loadConfig({ ORACLE_PROVIDER: "other", GEMINI_API_KEY: "test-key" })).toThrow(ConfigError);
  });
});

describe("loadPreferences", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "jobscope-prefs-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns the defaults when the file does not exist", () => {
    expect(loadPreferences(join(dir, "missing.json"))).toEqual(DEFAULT_PREFERENCES);
  });

  it("fills in keys the file leaves out", () => {
    const path = join(dir, "prefs.json");
    writeFileSync(path, JSON.stringify({ preferred_skills: ["TypeScript"], job_type: "Contract" }));

    expect(loadPreferences(path)).toEqual({
      preferred_locations: ["Bangalore", "Remote", "Hybrid"],
      preferred_experience: "2-5 years",
      preferred_skills: ["TypeScript"],
      job_type: "Contract",
    });
  });

  it("throws ConfigError for malformed preferences", () => {
    const badType = join(dir, "bad-type.json");
    writeFileSync(badType, JSON.stringify({ preferred_skills: "TypeScript" }));
    expect(() => loadPreferences(badType)).toThrow(ConfigError);

    const badJson = join(dir, "bad.json");
    writeFileSync(badJson, "{ not json");
    expect(() => loadPreferences(badJson)).toThrow(ConfigError);
  });
});

describe("parseCliArgs", () => {
  it("reads input, output, limit and dry-run flags", () => {
    expect(parseCliArgs(["--input", "links.csv", "--output", "out.xlsx", "--limit", "3", "--dry-run"])).toEqual({
      input: "links.csv",
      output: "out.xlsx",
      limit: 3,
      dryRun: true,
    });
  });

  it("ignores an invalid limit and a flag without a value", () => {
    expect(parseCliArgs(["--limit", "abc", "--input", "--dry-run"])).toEqual({
      input: undefined,
      output: undefined,
      limit: undefined,
      ignoredLimit: "abc",
      dryRun: true,
    });
  });

  it("reports a non-positive limit as ignored", () => {
    const options = parseCliArgs(["--limit", "0"]);
    expect(options.limit).toBeUndefined();
    expect(options.ignoredLimit).toBe("0");
  });

  it("leaves ignoredLimit unset for a valid or missing limit", () => {
    expect(parseCliArgs(["--limit", "4"]).ignoredLimit).toBeUndefined();
    expect(parseCliArgs([]).ignoredLimit).toBeUndefined();
  });
});
