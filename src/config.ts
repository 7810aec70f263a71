import { ConfigError } from './errors.js';
import { LogLevel, isLogLevel } from './logger.js';

export const TOKEN_ENV = 'FASTMAIL_TOKEN';
export const DEFAULT_SESSION_URL = 'https://api.fastmail.com/jmap/session';

export interface Config {
  token: string;
  sessionUrl: string;
  requestTimeoutMs: number;
  logLevel: LogLevel;
}

export interface ConfigDefaults {
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

export function loadConfig(
  defaults: ConfigDefaults = { logLevel: 'warn' },
  env: Env = process.env
): Config {
  const token = env[TOKEN_ENV];
  if (!token) {
    throw new ConfigError(`${TOKEN_ENV} environment variable not set`);
  }

  return {
    token,
    sessionUrl: env.JMAP_SESSION_URL || DEFAULT_SESSION_URL,
    requestTimeoutMs: parseTimeout(env.JMAP_TIMEOUT_MS),
    logLevel: parseLogLevel(env.LOG_LEVEL, defaults.logLevel),
  };
}

function parseTimeout(raw: string | undefined): number {
  if (!raw) return 30_000;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`JMAP_TIMEOUT_MS must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseLogLevel(raw: string | undefined, fallback: LogLevel): LogLevel {
  if (!raw) return fallback;
  const level = raw.toLowerCase();
  if (!isLogLevel(level)) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, got "${raw}"`);
  }
  return level;
}
