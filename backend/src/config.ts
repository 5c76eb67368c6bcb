import dotenv from "dotenv";
import path from "path";
import { z } from "zod";

dotenv.config();

type Env = Record<string, string | undefined>;

const checkEnv = (env: Env, key: string): string => {
  const value = env[key];
  if (!value) {
    throw new Error(`Missing environment variable: ${key}`);
  }
  return value;
};

const positiveInt = (env: Env, key: string, fallback: number): number => {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  const parsed = z.coerce.number().int().positive().safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Environment variable ${key} must be a positive integer, got "${raw}"`);
  }
  return parsed.data;
};

const logLevels = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export function loadConfig(env: Env = process.env) {
  const logLevel = z.enum(logLevels).catch("info").parse(env.LOG_LEVEL);

  return {
    port: positiveInt(env, "PORT", 5000),
    host: env.HOST || "0.0.0.0",
    logLevel,
    publicDir: path.resolve(env.PUBLIC_DIR || "frontend/public"),
    youtube: {
      apiKey: checkEnv(env, "YOUTUBE_API_KEY"),
      pageDelayMs: positiveInt(env, "PLAYLIST_PAGE_DELAY_MS", 1000),
    },
    openai: {
      apiKey: checkEnv(env, "OPENAI_API_KEY"),
      model: env.OPENAI_MODEL || "gpt-4o-mini",
      requestsPerMinute: positiveInt(env, "SUMMARY_REQUESTS_PER_MINUTE", 6),
    },
    pipeline: {
      concurrency: positiveInt(env, "MAX_CONCURRENT_DOWNLOADS", 2),
    },
    retry: {
      attempts: positiveInt(env, "RETRY_ATTEMPTS", 3),
      delay: positiveInt(env, "RETRY_BASE_DELAY_MS", 1000),
    },
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;
