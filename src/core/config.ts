import { config as dotenvConfig } from "dotenv";
import { join } from "path";
import { z } from "zod";
import { ConfigError } from "./errors";
import { SCHEDULE_TIME_PATTERN } from "../domain/schedule-time";
import type { PlatformCode } from "../domain/models";

const booleanString = (fallback: "true" | "false") =>
  z.string().default(fallback).transform((v) => v === "true" || v === "1" || v === "yes");

const commaList = z
  .string()
  .default("")
  .transform((v) =>
    v
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

const envSchema = z.object({
  DATA_DIR: z.string().default("data"),

  WEIBO_COOKIE: z.string().default(""),
  WEIBO_UID_LIST: commaList,
  WEIBO_DELAY: z.coerce.number().min(0).default(3),
  XIAOHONGSHU_COOKIE: z.string().default(""),
  XIAOHONGSHU_URL_LIST: commaList,
  XIAOHONGSHU_DELAY: z.coerce.number().min(0).default(2),
  DOUYIN_COOKIE: z.string().default(""),
  DOUYIN_SEC_USER_ID_LIST: commaList,
  DOUYIN_DELAY: z.coerce.number().min(0).default(2),

  SCHEDULE_TIME: z.string().regex(SCHEDULE_TIME_PATTERN, "expected HH:MM").default("23:59"),
  SCHEDULE_ENABLED: booleanString("false"),
  SCHEDULER_TICK_MS: z.coerce.number().int().positive().default(1000),
  TASK_RETRY_DELAY_SECONDS: z.coerce.number().min(0).default(60),

  HTTP_TIMEOUT_SECONDS: z.coerce.number().positive().default(30),
  HTTP_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),

  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  LOG_PRETTY: booleanString("true"),
  LOG_TO_FILE: booleanString("true"),
  LOG_MAX_SIZE: z.string().default("10m"),
  LOG_MAX_FILES: z.coerce.number().int().positive().default(5),

  API_ENABLED: booleanString("true"),
  API_HOST: z.string().default("127.0.0.1"),
  API_PORT: z.coerce.number().int().min(0).max(65535).default(3000),
});

export type Env = z.infer<typeof envSchema>;

export interface PlatformSettings {
  /** Static fallback credential, last link of the resolution chain. */
  cookie: string;
  targets: readonly string[];
  delayMs: number;
}

export interface AppConfig {
  dataDir: string;
  databasePath: string;
  credentialsDatabasePath: string;
  logDir: string;
  platforms: Readonly<Record<PlatformCode, Readonly<PlatformSettings>>>;
  schedule: {
    defaultTime: string;
    enabled: boolean;
    tickIntervalMs: number;
    retryDelayMs: number;
  };
  http: {
    timeoutMs: number;
    maxAttempts: number;
  };
  log: {
    level: Env["LOG_LEVEL"];
    pretty: boolean;
    toFile: boolean;
    maxSize: string;
    maxFiles: number;
  };
  api: {
    enabled: boolean;
    host: string;
    port: number;
  };
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child && typeof child === "object" && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

export function parseConfig(source: Record<string, string | undefined>): Readonly<AppConfig> {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  const env = result.data;

  return deepFreeze<AppConfig>({
    dataDir: env.DATA_DIR,
    databasePath: join(env.DATA_DIR, "tracker.db"),
    credentialsDatabasePath: join(env.DATA_DIR, "credentials.db"),
    logDir: join(env.DATA_DIR, "logs"),
    platforms: {
      weibo: { cookie: env.WEIBO_COOKIE, targets: env.WEIBO_UID_LIST, delayMs: env.WEIBO_DELAY * 1000 },
      xiaohongshu: {
        cookie: env.XIAOHONGSHU_COOKIE,
        targets: env.XIAOHONGSHU_URL_LIST,
        delayMs: env.XIAOHONGSHU_DELAY * 1000,
      },
      douyin: {
        cookie: env.DOUYIN_COOKIE,
        targets: env.DOUYIN_SEC_USER_ID_LIST,
        delayMs: env.DOUYIN_DELAY * 1000,
      },
    },
    schedule: {
      defaultTime: env.SCHEDULE_TIME,
      enabled: env.SCHEDULE_ENABLED,
      tickIntervalMs: env.SCHEDULER_TICK_MS,
      retryDelayMs: env.TASK_RETRY_DELAY_SECONDS * 1000,
    },
    http: {
      timeoutMs: env.HTTP_TIMEOUT_SECONDS * 1000,
      maxAttempts: env.HTTP_MAX_ATTEMPTS,
    },
    log: {
      level: env.LOG_LEVEL,
      pretty: env.LOG_PRETTY,
      toFile: env.LOG_TO_FILE,
      maxSize: env.LOG_MAX_SIZE,
      maxFiles: env.LOG_MAX_FILES,
    },
    api: {
      enabled: env.API_ENABLED,
      host: env.API_HOST,
      port: env.API_PORT,
    },
  });
}

/** Reads `.env` and the process environment once; the result is frozen for the process lifetime. */
export function loadConfig(): Readonly<AppConfig> {
  dotenvConfig();
  return parseConfig(process.env);
}
