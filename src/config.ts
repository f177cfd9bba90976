import { invariant } from './invariant.ts';
import { isLogLevel, type LogLevel } from './logger.ts';

export type RuntimeConfig = {
  port: number;
  host: string;
  clientKeySalt: string;
  rateLimitCapacity: number;
  rateLimitWindowSeconds: number;
  rateLimitSweepIntervalSeconds: number;
  appVersion: string;
  logLevel: LogLevel;
  maxBodyBytes: number;
  docsBaseUrl: string;
  supportContact: string;
};

type Env = Record<string, string | undefined>;

const intFromEnv = (env: Env, key: string, fallback: number): number => {
  const raw = env[key];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
  const config: RuntimeConfig = {
    port: intFromEnv(env, 'PORT', 8080),
    host: env.HOST ?? '0.0.0.0',
    clientKeySalt: mustGetEnv(env, 'CLIENT_KEY_SALT'),
    rateLimitCapacity: intFromEnv(env, 'RATE_LIMIT_CAPACITY', 5),
    rateLimitWindowSeconds: intFromEnv(env, 'RATE_LIMIT_WINDOW_SECONDS', 10),
    rateLimitSweepIntervalSeconds: intFromEnv(env, 'RATE_LIMIT_SWEEP_INTERVAL_SECONDS', 60),
    appVersion: env.APP_VERSION ?? '0.1.0',
    logLevel: logLevelFromEnv(env),
    maxBodyBytes: intFromEnv(env, 'MAX_BODY_BYTES', 64 * 1024),
    docsBaseUrl: (env.DOCS_BASE_URL ?? 'https://docs.example.com/checkin-api').replace(/\/+$/, ''),
    supportContact: env.SUPPORT_CONTACT ?? 'support@example.com',
  };

  invariant(config.rateLimitCapacity > 0, 'RATE_LIMIT_CAPACITY must be positive');
  invariant(config.rateLimitWindowSeconds > 0, 'RATE_LIMIT_WINDOW_SECONDS must be positive');
  invariant(config.rateLimitSweepIntervalSeconds >= 0, 'RATE_LIMIT_SWEEP_INTERVAL_SECONDS must not be negative');
  invariant(config.maxBodyBytes > 0, 'MAX_BODY_BYTES must be positive');
  return config;
}

function logLevelFromEnv(env: Env): LogLevel {
  const raw = env.LOG_LEVEL?.toLowerCase();
  if (!raw) return 'info';
  if (!isLogLevel(raw)) {
    throw new Error(`LOG_LEVEL must be one of info, warn, error (got ${raw})`);
  }
  return raw;
}

function mustGetEnv(env: Env, key: string): string {
  const value = env[key];
  if (!value) {
    throw new Error(`Missing required environment variable ${key}`);
  }
  return value;
}
