import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "../errors";
import type { LogLevelName } from "../utils/logger";
import type { PipelineSettings } from "../types";

export type EnvRecord = Record<string, string | undefined>;

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value && value.length > 0 ? value : undefined));

const positiveInt = (fallback: number, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(
    (value) => (typeof value === "string" && value.trim().length > 0 ? Number(value) : undefined),
    z.number().int().positive().max(max).default(fallback)
  );

// SerpAPI returns at most this many results per query.
export const MAX_SEARCH_POOL_SIZE = 20;

const percent = (fallback: number) =>
  z.preprocess(
    (value) => (typeof value === "string" && value.trim().length > 0 ? Number(value) : undefined),
    z.number().min(0).max(100).default(fallback)
  );

const EnvSchema = z.object({
  OPENAI_API_KEY: optionalString,
  SERPAPI_KEY: optionalString,
  PORT: positiveInt(3000),
  OPENAI_MODEL: optionalString,
  ROUTER_MODEL: optionalString,
  AUDITOR_MODEL: optionalString,
  STAGE_TIMEOUT_MS: positiveInt(20_000),
  VETTER_TARGET: positiveInt(6),
  SEARCH_POOL_SIZE: positiveInt(10, MAX_SEARCH_POOL_SIZE),
  AUDIT_GREEN_THRESHOLD: percent(75),
  AUDIT_RED_THRESHOLD: percent(50),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === "string" && value.trim().length > 0 ? value.trim().toLowerCase() : undefined),
    z.enum(["debug", "info", "warn", "error", "silent"]).default("info")
  )
});

const REQUIRED_KEYS = ["OPENAI_API_KEY", "SERPAPI_KEY"] as const;

const DEFAULT_MODEL = "gpt-4o-mini";

export interface ModelConfig {
  apiKey: string;
  routerModel: string;
  vetterModel: string;
  auditorModel: string;
}

export interface AppConfig {
  port: number;
  logLevel: LogLevelName;
  openai: ModelConfig;
  serpApiKey: string;
  pipeline: PipelineSettings;
}

export function loadConfig(env: EnvRecord = loadDotenv()): AppConfig {
  const missing = REQUIRED_KEYS.filter((key) => {
    const value = env[key];
    return !value || value.trim().length === 0;
  });

  const parsed = EnvSchema.safeParse(env);
  const problems = parsed.success
    ? []
    : parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);

  if (!parsed.success || missing.length > 0) {
    throw new ConfigError([...missing], problems);
  }

  const values = parsed.data;
  if (values.AUDIT_RED_THRESHOLD > values.AUDIT_GREEN_THRESHOLD) {
    throw new ConfigError([], ["AUDIT_RED_THRESHOLD must not exceed AUDIT_GREEN_THRESHOLD"]);
  }

  const apiKey = values.OPENAI_API_KEY;
  const serpApiKey = values.SERPAPI_KEY;
  if (!apiKey || !serpApiKey) {
    throw new ConfigError([...missing]);
  }

  const defaultModel = values.OPENAI_MODEL ?? DEFAULT_MODEL;

  return {
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    openai: {
      apiKey,
      routerModel: values.ROUTER_MODEL ?? defaultModel,
      vetterModel: defaultModel,
      auditorModel: values.AUDITOR_MODEL ?? defaultModel
    },
    serpApiKey,
    pipeline: {
      stageTimeoutMs: values.STAGE_TIMEOUT_MS,
      vetterTarget: values.VETTER_TARGET,
      searchPoolSize: values.SEARCH_POOL_SIZE,
      greenThreshold: values.AUDIT_GREEN_THRESHOLD,
      redThreshold: values.AUDIT_RED_THRESHOLD
    }
  };
}

function loadDotenv(): EnvRecord {
  dotenv.config();
  return process.env;
}
