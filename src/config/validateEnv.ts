import { config as loadEnv } from "dotenv";
import { z } from "zod";

import { ConfigurationError } from "@/utils/errors";

loadEnv();

const telegramId = z
  .string()
  .trim()
  .regex(/^-?\d+$/, "must be a numeric Telegram id");

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("true")
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).optional(),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65_535).default(3000),
  DATABASE_URL: z.string().url().optional(),
  POSTGRES_URL: z.string().url().optional(),
  REDIS_URL: z.string().url().default("redis://localhost:6379"),
  TELEGRAM_API_ID: z.coerce.number().int().optional(),
  TELEGRAM_API_HASH: z.string().optional(),
  BOT_TOKEN: z.string().optional(),
  OPERATOR_ID: telegramId.optional(),
  SESSION_ENCRYPTION_KEY: z.string().min(32).default("development-session-encryption-key-please-change"),
  MIRROR_OWNER: z.enum(["operator", "delivery"]).default("delivery"),
  STAGING_TOPICS: booleanFlag,
  POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1_000),
  BACKOFF_STRATEGY: z.enum(["fixed", "exponential"]).default("exponential"),
  BACKOFF_BASE_MS: z.coerce.number().int().positive().default(2_000),
  BACKOFF_MAX_MS: z.coerce.number().int().positive().default(30_000),
  CREDENTIAL_POLL_MS: z.coerce.number().int().positive().default(3_000),
  STALE_CLAIM_MINUTES: z.coerce.number().positive().max(10_080).default(10),
  SWEEP_SCHEDULE: z.string().default("* * * * *"),
});

export type EnvSchema = z.infer<typeof envSchema>;

// `KEY=` lines in .env mean "unset", not an empty value.
function withoutBlankValues(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  return Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""));
}

export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvSchema {
  const result = envSchema.safeParse(withoutBlankValues(env));
  if (!result.success) {
    throw new ConfigurationError("Invalid environment configuration", result.error.flatten().fieldErrors);
  }

  return result.data;
}
