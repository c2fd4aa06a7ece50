/**
 * Configuration Management
 * Loads and validates configuration from environment variables
 */

import { z } from "zod";
import "dotenv/config";
import { ConfigurationError } from "./errors.js";

// `KEY=` lines in .env arrive as empty strings
const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const envSchema = z.object({
  // YouTube Data API
  YOUTUBE_API_KEY: optionalString,
  YOUTUBE_CHANNEL_ID: optionalString,
  YOUTUBE_TIMEOUT_MS: positiveInt(30_000),

  // Table store
  TABLE_STORE: z.preprocess(blankToUndefined, z.enum(["fusion", "supabase", "none"]).default("fusion")),
  FUSION_BASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  FUSION_API_TOKEN: optionalString,
  CONTENT_TABLE_ID: optionalString,
  SUPABASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  SUPABASE_KEY: optionalString,
  TABLE_TIMEOUT_MS: positiveInt(30_000),

  // Answering service
  ANSWER_PROVIDER: z.preprocess(blankToUndefined, z.enum(["openrouter", "claude", "none"]).default("openrouter")),
  OPENROUTER_API_KEY: optionalString,
  OPENROUTER_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default("https://openrouter.ai/api/v1")),
  OPENROUTER_MODEL: z.preprocess(
    blankToUndefined,
    z.string().default("meta-llama/llama-3.3-70b-instruct:free")
  ),
  CLAUDE_MODEL: optionalString,
  ANSWER_TIMEOUT_MS: positiveInt(60_000),

  // Cache
  CACHE_TTL_MS: positiveInt(60_000),
  CACHE_MAX_ENTRIES: positiveInt(256),

  // General
  PORT: positiveInt(8000),
  LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(["debug", "info", "warn", "error"]).default("info")),
  NODE_ENV: z.preprocess(
    blankToUndefined,
    z.enum(["development", "production", "test"]).default("development")
  ),
});

export type AppEnv = z.infer<typeof envSchema>;

export type TableStoreConfig =
  | {
      kind: "fusion";
      baseUrl: string;
      token: string;
      tableId: string;
      timeoutMs: number;
    }
  | {
      kind: "supabase";
      url: string;
      key: string;
      tableId: string;
    };

export type AnswerProviderConfig =
  | {
      provider: "openrouter";
      apiKey: string;
      baseUrl: string;
      model: string;
      timeoutMs: number;
    }
  | {
      provider: "claude";
      model?: string;
      timeoutMs: number;
    };

export interface AppConfig {
  youtube: {
    apiKey?: string;
    defaultChannelId?: string;
    timeoutMs: number;
  };

  /** Undefined when the selected store is missing settings or disabled */
  tableStore?: TableStoreConfig;

  /** Undefined when answers are always generated locally */
  answer?: AnswerProviderConfig;

  cache: {
    ttlMs: number;
    maxEntries: number;
  };

  server: {
    port: number;
  };

  env: {
    logLevel: "debug" | "info" | "warn" | "error";
    nodeEnv: "development" | "production" | "test";
  };
}

let configInstance: AppConfig | null = null;

function selectTableStore(env: AppEnv): TableStoreConfig | undefined {
  if (env.TABLE_STORE === "fusion") {
    if (!env.FUSION_BASE_URL || !env.FUSION_API_TOKEN || !env.CONTENT_TABLE_ID) {
      return undefined;
    }
    return {
      kind: "fusion",
      baseUrl: env.FUSION_BASE_URL,
      token: env.FUSION_API_TOKEN,
      tableId: env.CONTENT_TABLE_ID,
      timeoutMs: env.TABLE_TIMEOUT_MS,
    };
  }

  if (env.TABLE_STORE === "supabase") {
    if (!env.SUPABASE_URL || !env.SUPABASE_KEY) {
      return undefined;
    }
    return {
      kind: "supabase",
      url: env.SUPABASE_URL,
      key: env.SUPABASE_KEY,
      tableId: env.CONTENT_TABLE_ID ?? "content_items",
    };
  }

  return undefined;
}

function selectAnswerProvider(env: AppEnv): AnswerProviderConfig | undefined {
  if (env.ANSWER_PROVIDER === "openrouter") {
    if (!env.OPENROUTER_API_KEY) return undefined;
    return {
      provider: "openrouter",
      apiKey: env.OPENROUTER_API_KEY,
      baseUrl: env.OPENROUTER_BASE_URL,
      model: env.OPENROUTER_MODEL,
      timeoutMs: env.ANSWER_TIMEOUT_MS,
    };
  }

  if (env.ANSWER_PROVIDER === "claude") {
    return {
      provider: "claude",
      model: env.CLAUDE_MODEL,
      timeoutMs: env.ANSWER_TIMEOUT_MS,
    };
  }

  return undefined;
}

/**
 * Load and validate configuration
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const errors = parseResult.error.issues
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigurationError(`Configuration validation failed:\n${errors}`, {
      fields: parseResult.error.issues.map((e) => e.path.join(".")),
    });
  }

  const env = parseResult.data;

  return {
    youtube: {
      apiKey: env.YOUTUBE_API_KEY,
      defaultChannelId: env.YOUTUBE_CHANNEL_ID,
      timeoutMs: env.YOUTUBE_TIMEOUT_MS,
    },

    tableStore: selectTableStore(env),
    answer: selectAnswerProvider(env),

    cache: {
      ttlMs: env.CACHE_TTL_MS,
      maxEntries: env.CACHE_MAX_ENTRIES,
    },

    server: {
      port: env.PORT,
    },

    env: {
      logLevel: env.LOG_LEVEL,
      nodeEnv: env.NODE_ENV,
    },
  };
}

/**
 * Get configuration (lazy-loaded singleton)
 */
export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset config (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

