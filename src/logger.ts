interface LogMeta {
  [key: string]: unknown;
}

export type LogLevel = 'info' | 'warn' | 'error';

export type Logger = {
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
};

export type LogSink = Pick<Console, 'log' | 'warn' | 'error'>;

export type LoggerOptions = {
  sink?: LogSink;
  /** Lines below this level are dropped. */
  level?: LogLevel;
};

const LEVEL_RANK: Record<LogLevel, number> = { info: 0, warn: 1, error: 2 };

// Raw identifiers never reach a log line; callers log `subject_hash` instead.
const IDENTIFYING_KEYS = new Set([
  'user_id',
  'userid',
  'subject',
  'subject_id',
  'client_ip',
  'ip',
  'remote_address',
  'user_agent',
]);

export const REDACTED = '[redacted]';

export function isLogLevel(value: string): value is LogLevel {
  return value === 'info' || value === 'warn' || value === 'error';
}

export function createLogger(component: string, options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? console;
  const threshold = LEVEL_RANK[options.level ?? 'info'];

  const log = (level: LogLevel, message: string, meta: LogMeta = {}) => {
    if (LEVEL_RANK[level] < threshold) return;
    const payload = {
      level,
      component,
      message,
      timestamp: new Date().toISOString(),
      ...scrub(meta),
    };
    sink[level === 'info' ? 'log' : level](JSON.stringify(payload));
  };

  return {
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
  };
}

function scrub(meta: LogMeta): LogMeta {
  const clean: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    if (IDENTIFYING_KEYS.has(key.toLowerCase())) {
      clean[key] = REDACTED;
    } else if (value instanceof Error) {
      clean[key] = { name: value.name, message: value.message };
    } else {
      clean[key] = value;
    }
  }
  return clean;
}
