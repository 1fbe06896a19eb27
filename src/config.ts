// src/config.ts
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { BreakerOptions, RetryOptions, UpstreamOptions } from "./types.js";

const integer = (defaultValue: number, min: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val === undefined || val.trim() === "" ? defaultValue : Number(val)))
    .refine((val) => Number.isInteger(val) && val >= min, { message: `Must be an integer >= ${min}` });

const ratio = (defaultValue: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val === undefined || val.trim() === "" ? defaultValue : Number(val)))
    .refine((val) => Number.isFinite(val) && val >= 0 && val <= 1, { message: "Must be a number between 0 and 1" });

const path = (defaultValue: string) =>
  z
    .string()
    .optional()
    .transform((val) => val || defaultValue)
    .refine((val) => val.startsWith("/"), { message: "Must start with '/'" });

const envSchema = z.object({
  PORT: integer(8080, 1),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

  UPSTREAM_BASE_URL: z.string().url().default("https://jsonplaceholder.typicode.com"),
  UPSTREAM_POSTS_PATH: path("/posts"),
  UPSTREAM_COMMENTS_PATH: path("/comments"),
  UPSTREAM_CONNECT_TIMEOUT_MS: integer(5_000, 1),
  UPSTREAM_READ_TIMEOUT_MS: integer(10_000, 1),

  RETRY_MAX_ATTEMPTS: integer(3, 1),
  RETRY_BASE_DELAY_MS: integer(200, 0),
  RETRY_MAX_DELAY_MS: integer(2_000, 0),

  BREAKER_NAME: z.string().min(1).default("postsApi"),
  BREAKER_WINDOW: integer(20, 1),
  BREAKER_MIN_REQ: integer(5, 0),
  BREAKER_THRESHOLD: ratio(0.5),
  BREAKER_COOLDOWN_MS: integer(30_000, 1),
  BREAKER_PROBES: integer(3, 1),
});

export interface AppConfig {
  port: number;
  logLevel: string;
  upstream: UpstreamOptions;
  retry: RetryOptions;
  breaker: BreakerOptions;
}

/**
 * Read and validate configuration from the environment. Throws ConfigError
 * naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const e = parsed.data;

  if (e.RETRY_MAX_DELAY_MS < e.RETRY_BASE_DELAY_MS) {
    throw new ConfigError(["RETRY_MAX_DELAY_MS: Must be >= RETRY_BASE_DELAY_MS"]);
  }

  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    upstream: {
      baseUrl: e.UPSTREAM_BASE_URL,
      postsPath: e.UPSTREAM_POSTS_PATH,
      commentsPath: e.UPSTREAM_COMMENTS_PATH,
      connectTimeoutMs: e.UPSTREAM_CONNECT_TIMEOUT_MS,
      readTimeoutMs: e.UPSTREAM_READ_TIMEOUT_MS,
    },
    retry: {
      maxAttempts: e.RETRY_MAX_ATTEMPTS,
      baseDelayMs: e.RETRY_BASE_DELAY_MS,
      maxDelayMs: e.RETRY_MAX_DELAY_MS,
    },
    breaker: {
      name: e.BREAKER_NAME,
      windowSize: e.BREAKER_WINDOW,
      minRequests: e.BREAKER_MIN_REQ,
      failureThreshold: e.BREAKER_THRESHOLD,
      cooldownMs: e.BREAKER_COOLDOWN_MS,
      halfOpenProbeCount: e.BREAKER_PROBES,
    },
  };
}
