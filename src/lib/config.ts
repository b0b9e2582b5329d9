import { z } from "zod/v3";

const envSchema = z.object({
  AI_PROVIDER: z.enum(["local", "anthropic", "google"]).default("local"),
  AI_MODEL: z.string().min(1).optional(),
  AI_BASE_URL: z.string().url().default("http://localhost:11434/v1"),
  AI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  AI_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(512),
  AI_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  PROMPT_CONTEXT_CHARS: z.coerce.number().int().min(500).default(8000),
  PROMPT_HISTORY_MESSAGES: z.coerce.number().int().min(0).default(12),
  PROMPT_SAMPLE_ROWS: z.coerce.number().int().min(0).max(50).default(5),
  DATASET_MAX_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  DATASET_MAX_ROWS: z.coerce.number().int().positive().default(100_000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export type AiProvider = z.infer<typeof envSchema>["AI_PROVIDER"];
export type LogLevel = z.infer<typeof envSchema>["LOG_LEVEL"];

export interface AiConfig {
  provider: AiProvider;
  model?: string;
  baseUrl: string;
  temperature: number;
  maxOutputTokens: number;
  timeoutMs: number;
}

export interface PromptConfig {
  contextChars: number;
  historyMessages: number;
  sampleRows: number;
}

export interface DatasetLimits {
  maxBytes: number;
  maxRows: number;
}

export interface AppConfig {
  ai: AiConfig;
  prompt: PromptConfig;
  dataset: DatasetLimits;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Configuracion invalida: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: Partial<NodeJS.ProcessEnv> = process.env): AppConfig {
  // Variables vacias cuentan como ausentes
  const defined = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const parsed = envSchema.safeParse(defined);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  return {
    ai: {
      provider: e.AI_PROVIDER,
      model: e.AI_MODEL,
      baseUrl: e.AI_BASE_URL,
      temperature: e.AI_TEMPERATURE,
      maxOutputTokens: e.AI_MAX_OUTPUT_TOKENS,
      timeoutMs: e.AI_TIMEOUT_MS,
    },
    prompt: {
      contextChars: e.PROMPT_CONTEXT_CHARS,
      historyMessages: e.PROMPT_HISTORY_MESSAGES,
      sampleRows: e.PROMPT_SAMPLE_ROWS,
    },
    dataset: {
      maxBytes: e.DATASET_MAX_BYTES,
      maxRows: e.DATASET_MAX_ROWS,
    },
    logLevel: e.LOG_LEVEL,
  };
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (cachedConfig) return cachedConfig;
  cachedConfig = loadConfig();
  return cachedConfig;
}
