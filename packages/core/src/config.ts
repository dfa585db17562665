import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { SolutionFormat } from "./domain/LogAnalysis.js";

export interface ModelConfig {
  apiKey?: string;
  model: string;
  baseUrl?: string;
  apiVersion?: string;
  temperature: number;
  maxOutputTokens: number;
  timeoutMs: number;
}

export interface PipelineConfig {
  maxAttempts: number;
  backoffMs: number;
  maxChars: number;
  solutionFormat: SolutionFormat;
  enrichment: boolean;
}

export interface SearchConfig {
  maxResults: number;
  timeoutMs: number;
  concurrency: number;
}

export interface AppConfig {
  model: ModelConfig;
  pipeline: PipelineConfig;
  search: SearchConfig;
  databaseUrl?: string;
  logLevel: string;
}

// unset and "" both mean "use the default"
const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const optionalString = z.preprocess(blankToUndefined, z.string().optional());
const int = (def: number, min: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(def));
const flag = (def: boolean) =>
  z.preprocess(
    blankToUndefined,
    z
      .enum(["true", "false", "1", "0", "yes", "no"])
      .transform((v) => v === "true" || v === "1" || v === "yes")
      .default(def ? "true" : "false")
  );

const EnvSchema = z.object({
  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: z.preprocess(blankToUndefined, z.string().default("gemini-1.5-flash")),
  GEMINI_BASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  GEMINI_API_VERSION: optionalString,
  LLM_TEMPERATURE: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(2).default(0)),
  LLM_MAX_OUTPUT_TOKENS: int(8192, 1),
  LLM_TIMEOUT_MS: int(60_000, 1000),
  LLM_MAX_ATTEMPTS: int(3, 1),
  LLM_BACKOFF_MS: int(5000, 0),
  MAX_LOG_CHARS: int(50_000, 1),
  SOLUTION_FORMAT: z.preprocess(blankToUndefined, z.enum(["phased", "flat"]).default("phased")),
  ENRICHMENT_ENABLED: flag(true),
  SEARCH_MAX_RESULTS: int(3, 1),
  SEARCH_TIMEOUT_MS: int(8000, 100),
  SEARCH_CONCURRENCY: int(4, 1),
  DATABASE_URL: optionalString,
  LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).default("info")
  )
});

/**
 * Builds the application config from environment variables.
 * Nothing is read at import time; callers pass the env they want (tests pass a plain object).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const e = parsed.data;

  return {
    model: {
      apiKey: e.GEMINI_API_KEY,
      model: e.GEMINI_MODEL,
      baseUrl: e.GEMINI_BASE_URL,
      apiVersion: e.GEMINI_API_VERSION,
      temperature: e.LLM_TEMPERATURE,
      maxOutputTokens: e.LLM_MAX_OUTPUT_TOKENS,
      timeoutMs: e.LLM_TIMEOUT_MS
    },
    pipeline: {
      maxAttempts: e.LLM_MAX_ATTEMPTS,
      backoffMs: e.LLM_BACKOFF_MS,
      maxChars: e.MAX_LOG_CHARS,
      solutionFormat: e.SOLUTION_FORMAT,
      enrichment: e.ENRICHMENT_ENABLED
    },
    search: {
      maxResults: e.SEARCH_MAX_RESULTS,
      timeoutMs: e.SEARCH_TIMEOUT_MS,
      concurrency: e.SEARCH_CONCURRENCY
    },
    databaseUrl: e.DATABASE_URL,
    logLevel: e.LOG_LEVEL
  };
}

/** Loads `.env` (if present) into process.env, then parses it. */
export function loadEnvConfig(path?: string): AppConfig {
  dotenv.config(path ? { path } : undefined);
  return loadConfig(process.env);
}
