import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  baseUrl: "",
  municipality: "",
  years: [],
  userAgent: "municipal-corpus-extractor/1.0 (research; contact via repository)",
  ignoreHttpsErrors: false,
  respectRobots: true,
  crawlDelaySeconds: 1,
  requestTimeoutMs: 10_000,
  downloadTimeoutMs: 30_000,
  maxPages: 500,
  maxPdfs: 2000,
  downloadConcurrency: 8,
  extractConcurrency: 4,
  maxHttpAttempts: 3,
  retryBaseDelayMs: 1000,
  topK: 8,
  minScore: 0,
  contextWindow: 300,
  heuristicTopK: 3,
  dataDir: "workspace/data",
  outputDir: "output",
  indicatorsPath: undefined,
  allowExternal: false,
  valueModel: {
    enabled: false,
    model: "gpt-4o-mini",
    apiKey: undefined,
    confidenceThreshold: 0.7,
    maxDocs: 3,
    requestTimeoutMs: 60_000,
  },
};

const positiveInt = z.number().int().positive();

const overridesSchema = z
  .object({
    baseUrl: z.string().url(),
    municipality: z.string().min(1),
    years: z.array(z.number().int().min(1990).max(2030)),
    userAgent: z.string().min(1),
    ignoreHttpsErrors: z.boolean(),
    respectRobots: z.boolean(),
    crawlDelaySeconds: z.number().min(0),
    requestTimeoutMs: positiveInt,
    downloadTimeoutMs: positiveInt,
    maxPages: positiveInt,
    maxPdfs: positiveInt,
    downloadConcurrency: positiveInt,
    extractConcurrency: positiveInt,
    maxHttpAttempts: positiveInt,
    retryBaseDelayMs: z.number().int().min(0),
    topK: positiveInt,
    minScore: z.number(),
    contextWindow: positiveInt,
    heuristicTopK: positiveInt,
    dataDir: z.string().min(1),
    outputDir: z.string().min(1),
    indicatorsPath: z.string().min(1),
    allowExternal: z.boolean(),
    valueModel: z
      .object({
        enabled: z.boolean(),
        model: z.string().min(1),
        apiKey: z.string().min(1),
        confidenceThreshold: z.number().min(0).max(1),
        maxDocs: positiveInt,
        requestTimeoutMs: positiveInt,
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed = overridesSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid config file ${absolutePath}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

function toInt(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function toFloat(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }

  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function toBool(value: string | undefined): boolean | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return undefined;
}

function toYears(value: string | undefined): number[] | undefined {
  if (!value) {
    return undefined;
  }

  const years = value
    .split(",")
    .map((part) => Number.parseInt(part.trim(), 10))
    .filter((year) => Number.isFinite(year));
  return years.length > 0 ? years : undefined;
}

function definedEntries(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/** Set, parseable variables only; the result passes the same checks as the file. */
function readEnvOverrides(env: NodeJS.ProcessEnv): ConfigOverrides {
  const raw = definedEntries({
    baseUrl: env.BASE_URL || undefined,
    municipality: env.MUNICIPALITY || undefined,
    years: toYears(env.YEARS),
    userAgent: env.USER_AGENT || undefined,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS),
    respectRobots: toBool(env.RESPECT_ROBOTS),
    crawlDelaySeconds: toFloat(env.CRAWL_DELAY_SECONDS),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS),
    downloadTimeoutMs: toInt(env.DOWNLOAD_TIMEOUT_MS),
    maxPages: toInt(env.MAX_PAGES),
    maxPdfs: toInt(env.MAX_PDFS),
    downloadConcurrency: toInt(env.DOWNLOAD_CONCURRENCY),
    extractConcurrency: toInt(env.EXTRACT_CONCURRENCY),
    maxHttpAttempts: toInt(env.MAX_HTTP_ATTEMPTS),
    topK: toInt(env.TOP_K),
    minScore: toFloat(env.MIN_SCORE),
    contextWindow: toInt(env.CONTEXT_WINDOW),
    dataDir: env.DATA_DIR || undefined,
    outputDir: env.OUTPUT_DIR || undefined,
    indicatorsPath: env.INDICATORS_PATH || undefined,
    allowExternal: toBool(env.ALLOW_EXTERNAL),
    valueModel: definedEntries({
      enabled: toBool(env.VALUE_MODEL_ENABLED),
      model: env.VALUE_MODEL_NAME || undefined,
      apiKey: env.OPENAI_API_KEY || undefined,
    }),
  });

  const parsed = overridesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid environment configuration: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);
  const envConfig = readEnvOverrides(env);

  return {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    ...envConfig,
    valueModel: {
      ...DEFAULT_CONFIG.valueModel,
      ...(fileConfig.valueModel ?? {}),
      ...(envConfig.valueModel ?? {}),
    },
  };
}

export function assertRunnable(config: AppConfig): void {
  if (!config.baseUrl) {
    throw new Error("baseUrl is required (config file or BASE_URL)");
  }
  if (!config.municipality) {
    throw new Error("municipality is required (config file or MUNICIPALITY)");
  }
}

export { DEFAULT_CONFIG };
