import { existsSync, readFileSync } from 'node:fs';
import dotenv from 'dotenv';
import { z } from 'zod';
import { MissingConfigError } from './errors.js';
import type { LogLevel } from './logger.js';

export interface AppConfig {
  practicum: {
    token: string;
    apiBase: string;
  };
  telegram: {
    token: string;
    chatId: string;
    apiBase: string;
  };
  pollIntervalMs: number;
  httpTimeoutMs: number;
  commands: {
    enabled: boolean;
    longPollTimeoutSec: number;
    errorBackoffMs: number;
    statusLookbackSec: number;
    discardBacklogOnStart: boolean;
  };
  logLevel: LogLevel;
}

export const REQUIRED_ENV = ['PRACTICUM_TOKEN', 'TELEGRAM_TOKEN', 'TELEGRAM_CHAT_ID'] as const;

const booleanFlag = (fallback: '0' | '1') =>
  z
    .enum(['0', '1', 'true', 'false'])
    .default(fallback)
    .transform((value) => value === '1' || value === 'true');

const envSchema = z.object({
  PRACTICUM_TOKEN: z.string().trim().min(1),
  TELEGRAM_TOKEN: z.string().trim().min(1),
  TELEGRAM_CHAT_ID: z
    .string()
    .trim()
    .regex(/^(-?\d+|@\w+)$/, 'must be a numeric chat id or an @channel username'),
  PRACTICUM_API_BASE: z.string().url().default('https://practicum.yandex.ru/api/user_api'),
  TELEGRAM_API_BASE: z.string().url().default('https://api.telegram.org'),
  POLL_INTERVAL_MS: z.coerce.number().int().min(1_000).max(86_400_000).default(600_000),
  HTTP_TIMEOUT_MS: z.coerce.number().int().min(1_000).max(120_000).default(15_000),
  ENABLE_COMMANDS: booleanFlag('1'),
  COMMAND_POLL_TIMEOUT_SEC: z.coerce.number().int().min(0).max(50).default(30),
  COMMAND_ERROR_BACKOFF_MS: z.coerce.number().int().min(0).max(600_000).default(10_000),
  STATUS_LOOKBACK_SEC: z.coerce.number().int().min(60).max(31_536_000).default(3_600),
  DISCARD_BACKLOG_ON_START: booleanFlag('1'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export function findMissingEnv(env: NodeJS.ProcessEnv): string[] {
  return REQUIRED_ENV.filter((name) => (env[name] ?? '').trim().length === 0);
}

/**
 * Copies variables from a dotenv file into `env`. Values already present in
 * `env` are kept; a missing file loads nothing. Returns the names it set.
 */
export function loadEnvFile(path = '.env', env: NodeJS.ProcessEnv = process.env): string[] {
  if (!existsSync(path)) {
    return [];
  }

  const loaded: string[] = [];
  for (const [name, value] of Object.entries(dotenv.parse(readFileSync(path)))) {
    if (env[name] === undefined) {
      env[name] = value;
      loaded.push(name);
    }
  }
  return loaded;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const missing = findMissingEnv(env);
  if (missing.length > 0) {
    throw new MissingConfigError(missing);
  }

  const parsed = envSchema.parse(env);

  return {
    practicum: {
      token: parsed.PRACTICUM_TOKEN,
      apiBase: parsed.PRACTICUM_API_BASE,
    },
    telegram: {
      token: parsed.TELEGRAM_TOKEN,
      chatId: parsed.TELEGRAM_CHAT_ID,
      apiBase: parsed.TELEGRAM_API_BASE,
    },
    pollIntervalMs: parsed.POLL_INTERVAL_MS,
    httpTimeoutMs: parsed.HTTP_TIMEOUT_MS,
    commands: {
      enabled: parsed.ENABLE_COMMANDS,
      longPollTimeoutSec: parsed.COMMAND_POLL_TIMEOUT_SEC,
      errorBackoffMs: parsed.COMMAND_ERROR_BACKOFF_MS,
      statusLookbackSec: parsed.STATUS_LOOKBACK_SEC,
      discardBacklogOnStart: parsed.DISCARD_BACKLOG_ON_START,
    },
    logLevel: parsed.LOG_LEVEL,
  };
}
