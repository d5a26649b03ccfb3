import { z } from "zod";
import { ConfigError } from "./errors.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0", ""])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  API_PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  USE_MOCKS: booleanFlag,

  NEWS_API_KEY: z.string().default(""),
  NEWS_API_BASE_URL: z.string().url().default("https://newsapi.org/v2"),
  GAMMA_API_BASE_URL: z
    .string()
    .url()
    .default("https://gamma-api.polymarket.com"),

  LLM_PROVIDER: z.enum(["openai", "anthropic"]).default("openai"),
  LLM_MODEL: z.string().optional(),
  OPENAI_API_KEY: z.string().default(""),
  ANTHROPIC_API_KEY: z.string().default(""),

  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  DEFAULT_LANGUAGE: z.string().length(2).default("en"),
  MAX_ARTICLES_PER_EVENT: z.coerce.number().int().min(1).max(20).default(5),
  DEFAULT_DAYS_BACK: z.coerce.number().int().min(1).max(30).default(7),
});

export interface AppConfig {
  port: number;
  useMocks: boolean;
  news: {
    apiKey: string;
    baseUrl: string;
    language: string;
  };
  gamma: {
    baseUrl: string;
  };
  llm: {
    provider: "openai" | "anthropic";
    model?: string;
    apiKey: string;
  };
  timeoutMs: number;
  maxArticlesPerEvent: number;
  defaultDaysBack: number;
}

/**
 * Reads the environment into a typed config. Empty strings count as
 * unset so a blank line in .env falls back to the default.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(
      `Invalid ${issue.path.join(".")}: ${issue.message}`
    );
  }

  const parsed = result.data;
  return {
    port: parsed.API_PORT,
    useMocks: parsed.USE_MOCKS,
    news: {
      apiKey: parsed.NEWS_API_KEY,
      baseUrl: parsed.NEWS_API_BASE_URL,
      language: parsed.DEFAULT_LANGUAGE,
    },
    gamma: {
      baseUrl: parsed.GAMMA_API_BASE_URL,
    },
    llm: {
      provider: parsed.LLM_PROVIDER,
      model: parsed.LLM_MODEL,
      apiKey:
        parsed.LLM_PROVIDER === "anthropic"
          ? parsed.ANTHROPIC_API_KEY
          : parsed.OPENAI_API_KEY,
    },
    timeoutMs: parsed.HTTP_TIMEOUT_MS,
    maxArticlesPerEvent: parsed.MAX_ARTICLES_PER_EVENT,
    defaultDaysBack: parsed.DEFAULT_DAYS_BACK,
  };
}
