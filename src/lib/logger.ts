/**
 * Simple logging utility with log levels
 */

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

const logLevelMap: Record<string, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
};

// Get log level from environment, default to INFO
const currentLevel = logLevelMap[process.env.LOG_LEVEL?.toLowerCase() || 'info'] ?? LogLevel.INFO;
const jsonFormat = process.env.LOG_FORMAT?.toLowerCase() === 'json';

const SENSITIVE_KEYS = new Set([
  'access_token',
  'accesstoken',
  'refresh_token',
  'refreshtoken',
  'id_token',
  'idtoken',
  'client_secret',
  'clientsecret',
  'authorization',
  'code',
  'code_verifier',
  'password',
]);

export const REDACTED = '[REDACTED]';

/** Replaces values stored under token/secret keys, at any depth. */
export function redact(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redact);
  if (value instanceof Error) return { name: value.name, message: value.message };
  if (!value || typeof value !== 'object') return value;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = SENSITIVE_KEYS.has(k.toLowerCase()) ? REDACTED : redact(v);
  }
  return out;
}

function shouldLog(level: LogLevel): boolean {
  return level <= currentLevel;
}

export function formatMessage(level: string, component: string, message: string, meta?: unknown): string {
  const timestamp = new Date().toISOString();
  const safeMeta = meta !== undefined ? redact(meta) : undefined;
  if (jsonFormat) {
    return JSON.stringify({ timestamp, level, component, message, ...(safeMeta !== undefined ? { meta: safeMeta } : {}) });
  }
  const metaStr = safeMeta !== undefined ? ` ${JSON.stringify(safeMeta)}` : '';
  return `${timestamp} [${level}] [${component}] ${message}${metaStr}`;
}

export const logger = {
  error(component: string, message: string, meta?: unknown): void {
    if (shouldLog(LogLevel.ERROR)) {
      console.error(formatMessage('ERROR', component, message, meta));
    }
  },

  warn(component: string, message: string, meta?: unknown): void {
    if (shouldLog(LogLevel.WARN)) {
      console.warn(formatMessage('WARN', component, message, meta));
    }
  },

  info(component: string, message: string, meta?: unknown): void {
    if (shouldLog(LogLevel.INFO)) {
      console.log(formatMessage('INFO', component, message, meta));
    }
  },

  debug(component: string, message: string, meta?: unknown): void {
    if (shouldLog(LogLevel.DEBUG)) {
      console.log(formatMessage('DEBUG', component, message, meta));
    }
  },
};
