import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { AsyncLocalStorage } from 'async_hooks';
import { config } from '../config';

// ============================================================================
// Types
// ============================================================================

export type LogMeta = Record<string, unknown>;

/**
 * Per-envelope context stored in AsyncLocalStorage so every log line emitted
 * while a message is handled carries the connection it came from.
 */
export interface ConnectionContext {
  connectionId: string;
  userId?: string;
  messageType?: string;
  gameId?: string;
}

// ============================================================================
// Connection Context (AsyncLocalStorage)
// ============================================================================

export const connectionContextStorage = new AsyncLocalStorage<ConnectionContext>();

/**
 * Get the current connection context.
 * Returns undefined if called outside of a message handler.
 */
export const getConnectionContext = (): ConnectionContext | undefined => {
  return connectionContextStorage.getStore();
};

/**
 * Run a function within a connection context. All logs and async operations
 * within the callback will have access to the context.
 */
export const runWithContext = <T>(context: ConnectionContext, fn: () => T): T => {
  return connectionContextStorage.run(context, fn);
};

// ============================================================================
// Sensitive Data Masking
// ============================================================================

/**
 * Patterns for detecting sensitive keys in objects.
 * These are matched case-insensitively.
 */
const SENSITIVE_KEY_PATTERNS = [
  /password/i,
  /secret/i,
  /token/i,
  /api[_-]?key/i,
  /authorization/i,
  /bearer/i,
  /credential/i,
  /cookie/i,
];

const isSensitiveKey = (key: string): boolean => {
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
};

/**
 * Redact email addresses to show only first 3 characters of local part.
 * Example: "john.doe@example.com" -> "joh***@example.com"
 */
export const redactEmail = (email: string | null | undefined): string | undefined => {
  if (!email) return undefined;
  const trimmed = email.trim();
  const atIndex = trimmed.indexOf('@');
  if (atIndex <= 0 || atIndex === trimmed.length - 1) {
    return '[REDACTED_EMAIL]';
  }
  const local = trimmed.slice(0, atIndex);
  const domain = trimmed.slice(atIndex + 1);
  return `${local.slice(0, Math.min(3, local.length))}***@${domain}`;
};

/**
 * Shows first 4 characters for debugging while hiding the rest.
 */
const redactSensitiveString = (value: string): string => {
  if (value.length <= 8) {
    return '[REDACTED]';
  }
  return `${value.slice(0, 4)}...[REDACTED]`;
};

/**
 * Recursively mask sensitive values in an object.
 * Returns a new object with sensitive values redacted.
 *
 * @param maxDepth - Maximum recursion depth (default: 5)
 */
export const maskSensitiveData = (obj: unknown, maxDepth: number = 5): unknown => {
  if (maxDepth <= 0) {
    return '[MAX_DEPTH_EXCEEDED]';
  }

  if (obj === null || obj === undefined || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => maskSensitiveData(item, maxDepth - 1));
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveKey(key)) {
      if (value === null || value === undefined) {
        result[key] = value;
      } else if (typeof value === 'string') {
        result[key] = redactSensitiveString(value);
      } else if (typeof value === 'object') {
        result[key] = maskSensitiveData(value, maxDepth - 1);
      } else {
        result[key] = '[REDACTED]';
      }
    } else if (key.toLowerCase() === 'email' && typeof value === 'string') {
      result[key] = redactEmail(value);
    } else {
      result[key] = maskSensitiveData(value, maxDepth - 1);
    }
  }
  return result;
};

// ============================================================================
// Winston Logger Configuration
// ============================================================================

const SERVICE_NAME = 'chess-relay';

/**
 * Copies the active connection context onto the log entry.
 */
const addConnectionContext = winston.format((info) => {
  const context = getConnectionContext();
  if (context) {
    info.connectionId = context.connectionId;
    if (context.userId) {
      info.userId = context.userId;
    }
    if (context.messageType) {
      info.messageType = context.messageType;
    }
    if (context.gameId) {
      info.gameId = context.gameId;
    }
  }
  return info;
});

const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = SERVICE_NAME;
  }

  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }

  const { level, message, timestamp, ...rest } = info;
  const masked = maskSensitiveData(rest);
  return Object.assign({ level, message, timestamp }, masked);
});

/**
 * Format for structured JSON logging (used in production and file transports).
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  addConnectionContext(),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output (used in development).
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  addConnectionContext(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, connectionId, service: _service, ...meta }) => {
    const connStr = typeof connectionId === 'string' ? ` [${connectionId}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(maskSensitiveData(meta))}` : '';
    return `${String(timestamp)} ${level}${connStr}: ${String(message)}${metaStr}`;
  })
);

const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: SERVICE_NAME,
    environment: config.nodeEnv,
  },
  transports: [
    new winston.transports.Console({
      format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
    }),
  ],
});

if (config.logging.file) {
  const logPath = path.resolve(config.logging.file);
  fs.mkdirSync(path.dirname(logPath), { recursive: true });
  // File transport always uses JSON
  logger.add(
    new winston.transports.File({
      filename: logPath,
      format: jsonFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

export { logger };
