/**
 * Structured Logging Module
 *
 * Provides JSON-formatted logs with:
 * - Configurable log levels (debug, info, warn, error)
 * - Module/context tagging
 * - Redaction of credentials, hashes and tokens
 *
 * Usage:
 *   import { logger, createLogger } from './logging';
 *   logger.info('Server started', { port: 8080 });
 *   const authLog = createLogger('auth');
 *   authLog.debug('Token issued', { userId: 42 });
 */

// ==================== Configuration ====================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

function parseLevel(value: string | undefined): LogLevel {
  return isLogLevel(value) ? value : 'info';
}

export const LOG_CONFIG = {
  /** Minimum log level to output */
  level: parseLevel(process.env.LOG_LEVEL),

  /** Whether to pretty-print JSON (dev mode) */
  pretty: process.env.LOG_PRETTY === 'true',

  /** Include stack traces for errors */
  includeStack: process.env.LOG_INCLUDE_STACK !== 'false',

  /** Service name for log identification */
  service: process.env.LOG_SERVICE || 'wayfarer',
};

/**
 * Change the minimum level at runtime (config validation happens after import)
 */
export function setLogLevel(level: string): void {
  LOG_CONFIG.level = parseLevel(level);
}

// ==================== Types ====================

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  module?: string;
  [key: string]: unknown;
}

export interface LogMetadata {
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, meta?: LogMetadata): void;
  info(message: string, meta?: LogMetadata): void;
  warn(message: string, meta?: LogMetadata): void;
  error(message: string, meta?: LogMetadata | Error): void;
  child(context: { module?: string; [key: string]: unknown }): Logger;
}

// ==================== Logger Implementation ====================

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[LOG_CONFIG.level];
}

function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      ...(LOG_CONFIG.includeStack && error.stack ? { stack: error.stack } : {}),
    };
  }
  return { errorValue: String(error) };
}

// ==================== Sensitive Data Sanitization ====================

/**
 * Keys that commonly contain sensitive data.
 * Compared lower-cased with dashes and underscores removed.
 */
const SENSITIVE_KEYS = new Set([
  'password', 'passwd', 'pass', 'pwd',
  'passwordhash', 'credentialhash', 'hash',
  'secret', 'secrets', 'jwtsecret',
  'token', 'tokens', 'accesstoken', 'bearertoken',
  'apikey',
  'key', 'privatekey', 'signingkey',
  'credential', 'credentials',
  'auth', 'authorization',
  'cookie', 'cookies',
  'jwt', 'bearer',
]);

/**
 * Values that look like secrets regardless of their key
 */
const SENSITIVE_VALUE_PATTERNS = [
  /^eyJ[a-zA-Z0-9-_]+\.eyJ[a-zA-Z0-9-_]+/, // JWT tokens
  /^\$2[aby]\$\d{2}\$[./A-Za-z0-9]{53}$/, // bcrypt hashes
];

function isSensitiveKey(key: string): boolean {
  const normalizedKey = key.toLowerCase().replace(/[-_]/g, '');
  return SENSITIVE_KEYS.has(normalizedKey);
}

function isSensitiveValue(value: unknown): boolean {
  if (typeof value !== 'string') return false;
  if (value.length < 20) return false;
  return SENSITIVE_VALUE_PATTERNS.some((pattern) => pattern.test(value));
}

/**
 * Sanitize a value for logging
 */
export function sanitizeValue(key: string, value: unknown, depth = 0): unknown {
  if (depth > 5) return '[nested too deep]';

  if (isSensitiveKey(key)) {
    return '[REDACTED]';
  }

  if (isSensitiveValue(value)) {
    return '[REDACTED]';
  }

  if (value !== null && typeof value === 'object') {
    if (Array.isArray(value)) {
      return value.map((v, i) => sanitizeValue(String(i), v, depth + 1));
    }
    const sanitized: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      sanitized[k] = sanitizeValue(k, v, depth + 1);
    }
    return sanitized;
  }

  return value;
}

function sanitizeMetadata(metadata: LogMetadata): LogMetadata {
  const sanitized: LogMetadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    sanitized[key] = sanitizeValue(key, value);
  }
  return sanitized;
}

function writeLog(entry: LogEntry): void {
  const output = LOG_CONFIG.pretty
    ? JSON.stringify(entry, null, 2)
    : JSON.stringify(entry);

  if (entry.level === 'error') {
    console.error(output);
  } else if (entry.level === 'warn') {
    console.warn(output);
  } else {
    console.log(output);
  }
}

function createLoggerImpl(
  baseContext: { module?: string; [key: string]: unknown } = {}
): Logger {
  const log = (level: LogLevel, message: string, meta?: LogMetadata | Error): void => {
    if (!shouldLog(level)) return;

    let metadata: LogMetadata = {};
    if (meta instanceof Error) {
      metadata = formatError(meta);
    } else if (meta) {
      metadata = { ...meta };
      if (metadata.error instanceof Error) {
        const { error, ...rest } = metadata;
        metadata = { ...rest, ...formatError(error) };
      }
    }

    metadata = sanitizeMetadata(metadata);

    const { module, ...extraContext } = baseContext;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: LOG_CONFIG.service,
      ...(module ? { module } : {}),
      ...sanitizeMetadata(extraContext),
      ...metadata,
    };

    writeLog(entry);
  };

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    child: (context) => createLoggerImpl({ ...baseContext, ...context }),
  };
}

// ==================== Exports ====================

/**
 * Root logger instance
 */
export const logger = createLoggerImpl();

/**
 * Create a module-scoped logger
 * @param module - Module name (e.g., 'db', 'auth', 'http')
 */
export function createLogger(module: string): Logger {
  return logger.child({ module });
}
