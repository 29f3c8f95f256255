import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import type { SearchPreferences } from "./types.ts";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type OracleProvider = "gemini" | "anthropic";

export interface AppConfig {
  provider: OracleProvider;
  apiKey: string;
  model: string;
  fetchTimeoutMs: number;
  oracleTimeoutMs: number;
  preferencesFile: string;
  outputFile?: string;
}

export const DEFAULT_MODELS: Record<OracleProvider, string> = {
  gemini: "gemini-2.0-flash",
  anthropic: "claude-haiku-4-5-20251001",
};

export const DEFAULT_PREFERENCES: SearchPreferences = {
  preferred_locations: ["Bangalore", "Remote", "Hybrid"],
  preferred_experience: "2-5 years",
  preferred_skills: ["Python", "AI", "Backend"],
  job_type: "Full-time",
};

const optionalText = z
  .string()
  .transform((v) => v.trim())
  .optional()
  .transform((v) => (v ? v : undefined));

const envSchema = z.object({
  ORACLE_PROVIDER: z.enum(["gemini", "anthropic"]).default("gemini"),
  GEMINI_API_KEY: optionalText,
  GEMINI_MODEL: optionalText,
  ANTHROPIC_API_KEY: optionalText,
  ANTHROPIC_MODEL: optionalText,
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  ORACLE_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  PREFERENCES_FILE: z.string().default("config/preferences.json"),
  OUTPUT_FILE: optionalText,
});

const preferencesSchema = z.object({
  preferred_locations: z.array(z.string()).default(DEFAULT_PREFERENCES.preferred_locations),
  preferred_experience: z.string().default(DEFAULT_PREFERENCES.preferred_experience),
  preferred_skills: z.array(z.string()).default(DEFAULT_PREFERENCES.preferred_skills),
  job_type: z.string().default(DEFAULT_PREFERENCES.job_type),
});

type Env = Record<string, string | undefined>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
}

/**
 * Reads and validates the environment. Throws ConfigError when the API key
 * of the selected provider is missing or a value is malformed.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  const values = parsed.data;
  const provider = values.ORACLE_PROVIDER;

  const apiKey = provider === "gemini" ? values.GEMINI_API_KEY : values.ANTHROPIC_API_KEY;
  if (!apiKey) {
    const keyName = provider === "gemini" ? "GEMINI_API_KEY" : "ANTHROPIC_API_KEY";
    throw new ConfigError(`${keyName} not found`);
  }

  const modelOverride = provider === "gemini" ? values.GEMINI_MODEL : values.ANTHROPIC_MODEL;

  return {
    provider,
    apiKey,
    model: modelOverride ?? DEFAULT_MODELS[provider],
    fetchTimeoutMs: values.FETCH_TIMEOUT_MS,
    oracleTimeoutMs: values.ORACLE_TIMEOUT_MS,
    preferencesFile: values.PREFERENCES_FILE,
    outputFile: values.OUTPUT_FILE,
  };
}

/** Loads search preferences; a missing file means the defaults. */
export function loadPreferences(path: string): SearchPreferences {
  if (!existsSync(path)) return { ...DEFAULT_PREFERENCES };

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(
      `Could not read preferences from ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const parsed = preferencesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid preferences in ${path}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

// ── CLI args ─────────────────────────────────────────────────────────

export interface CliOptions {
  input?: string;
  output?: string;
  limit?: number;
  /** Raw --limit value that was not a positive integer. */
  ignoredLimit?: string;
  dryRun: boolean;
}

function flagValue(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  if (idx < 0) return undefined;
  const value = args[idx + 1];
  return value && !value.startsWith("--") ? value : undefined;
}

export function parseCliArgs(args: string[]): CliOptions {
  const limitRaw = flagValue(args, "--limit");
  const parsed = limitRaw !== undefined ? parseInt(limitRaw, 10) : undefined;
  const limit = parsed !== undefined && !isNaN(parsed) && parsed > 0 ? parsed : undefined;

  return {
    input: flagValue(args, "--input"),
    output: flagValue(args, "--output"),
    limit,
    ignoredLimit: limitRaw !== undefined && limit === undefined ? limitRaw : undefined,
    dryRun: args.includes("--dry-run"),
  };
}
