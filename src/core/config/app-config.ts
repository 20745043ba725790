/**
 * AppConfig - environment configuration validated at startup.
 */

import { z } from "zod";

const AppConfigSchema = z.object({
  GROQ_API_KEY: z.string().min(1, "is required"),
  LLM_BASE_URL: z.string().url().default("https://api.groq.com/openai/v1"),
  LLM_MODEL: z.string().min(1).default("llama-3.3-70b-versatile"),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
  TAVILY_API_KEY: z.string().min(1, "is required"),
  TAVILY_MAX_RESULTS: z.coerce.number().int().min(1).max(20).default(5),
  MARKET_DATA_BASE_URL: z.string().url().default("https://query1.finance.yahoo.com"),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  REDIS_URL: z.string().min(1).optional(),
  RUN_TTL_SECONDS: z.coerce.number().int().positive().default(86400),
  ROLES_DIR: z.string().min(1).optional(),
});

export interface AppConfig {
  llm: {
    apiKey: string;
    baseUrl: string;
    model: string;
    temperature: number;
    timeoutMs: number;
  };
  search: {
    apiKey: string;
    maxResults: number;
  };
  marketData: {
    baseUrl: string;
  };
  httpTimeoutMs: number;
  redisUrl?: string;
  runTtlSeconds: number;
  rolesDir?: string;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Read configuration from environment variables.
 *
 * Empty strings count as unset.
 *
 * @throws ConfigError listing every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const parsed = AppConfigSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return {
    llm: {
      apiKey: vars.GROQ_API_KEY,
      baseUrl: vars.LLM_BASE_URL,
      model: vars.LLM_MODEL,
      temperature: vars.LLM_TEMPERATURE,
      timeoutMs: vars.LLM_TIMEOUT_MS,
    },
    search: {
      apiKey: vars.TAVILY_API_KEY,
      maxResults: vars.TAVILY_MAX_RESULTS,
    },
    marketData: {
      baseUrl: vars.MARKET_DATA_BASE_URL,
    },
    httpTimeoutMs: vars.HTTP_TIMEOUT_MS,
    redisUrl: vars.REDIS_URL,
    runTtlSeconds: vars.RUN_TTL_SECONDS,
    rolesDir: vars.ROLES_DIR,
  };
}
