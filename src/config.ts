import { z } from "zod";

import { createPolicy, type CompliancePolicy } from "../core/compliance_engine/index.js";
import { ConfigError } from "./errors.js";
import type { LogLevel } from "./logger.js";

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === "" ? undefined : value))
  .optional();

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: optionalString,
  TELEGRAM_BOT_TOKEN: z.string().min(1),
  TELEGRAM_GROUP_CHAT_ID: z.string().min(1),
  TELEGRAM_GENERAL_THREAD_ID: optionalString,
  TELEGRAM_API_URL: z.string().url().default("https://api.telegram.org"),
  CLASSIFIER_URL: z.string().url(),
  CLASSIFIER_API_KEY: optionalString,
  CLASSIFIER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  SCHEDULER_INTERVAL_MINUTES: z.coerce.number().int().positive().default(5),
  UTC_OFFSET_MINUTES: z.coerce.number().int().min(-720).max(840).default(300),
  CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.85),
  LATE_THRESHOLD_MINUTES: z.coerce.number().int().nonnegative().default(30),
  BASE_MAX_STRIKES: z.coerce.number().int().positive().default(3),
  MAX_APPEALS: z.coerce.number().int().nonnegative().default(2),
});

export interface TelegramConfig {
  token: string;
  apiUrl: string;
  groupChatId: string;
  /** Thread receiving general notices and the dashboard; the group root when absent */
  generalThreadId: string | null;
}

export interface ClassifierConfig {
  url: string;
  apiKey: string | null;
  timeoutMs: number;
}

export interface AppConfig {
  port: number;
  /** Without a database URL the service runs on the in-memory store */
  databaseUrl: string | null;
  logLevel: LogLevel;
  telegram: TelegramConfig;
  classifier: ClassifierConfig;
  policy: CompliancePolicy;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  const values = parsed.data;
  return {
    port: values.PORT,
    databaseUrl: values.DATABASE_URL ?? null,
    logLevel: values.LOG_LEVEL,
    telegram: {
      token: values.TELEGRAM_BOT_TOKEN,
      apiUrl: values.TELEGRAM_API_URL,
      groupChatId: values.TELEGRAM_GROUP_CHAT_ID,
      generalThreadId: values.TELEGRAM_GENERAL_THREAD_ID ?? null,
    },
    classifier: {
      url: values.CLASSIFIER_URL,
      apiKey: values.CLASSIFIER_API_KEY ?? null,
      timeoutMs: values.CLASSIFIER_TIMEOUT_MS,
    },
    policy: createPolicy({
      utcOffsetMinutes: values.UTC_OFFSET_MINUTES,
      schedulerIntervalMinutes: values.SCHEDULER_INTERVAL_MINUTES,
      confidenceThreshold: values.CONFIDENCE_THRESHOLD,
      lateThresholdMinutes: values.LATE_THRESHOLD_MINUTES,
      baseStrikes: values.BASE_MAX_STRIKES,
      maxAppeals: values.MAX_APPEALS,
    }),
  };
};
