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
 * Per-event context stored in AsyncLocalStorage so every log line emitted
 * while handling one chat event carries the same correlation fields.
 */
export interface EventContext {
  eventId: string;
  sessionId: string;
  authorId?: string;
  replayed?: boolean;
}

// ============================================================================
// Event Context (AsyncLocalStorage)
// ============================================================================

export const eventContextStorage = new AsyncLocalStorage<EventContext>();

/**
 * Get the current event context, or undefined outside of event handling.
 */
export const getEventContext = (): EventContext | undefined => {
  return eventContextStorage.getStore();
};

/**
 * Run a function within an event context. All logs and async operations
 * within the callback will have access to the context.
 */
export const runWithEventContext = <T>(context: EventContext, fn: () => T): T => {
  return eventContextStorage.run(context, fn);
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
  /credential/i,
  /private[_-]?key/i,
];

const isSensitiveKey = (key: string): boolean => {
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
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
 * Recursively mask sensitive values in an object. Binary payloads are
 * replaced by their length so attachment bytes never reach the logs.
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

  if (Buffer.isBuffer(obj) || obj instanceof Uint8Array) {
    return `[binary ${obj.byteLength} bytes]`;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => maskSensitiveData(item, maxDepth - 1));
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveKey(key) && value !== null && value !== undefined) {
      result[key] =
        typeof value === 'string'
          ? redactSensitiveString(value)
          : typeof value === 'object'
            ? maskSensitiveData(value, maxDepth - 1)
            : '[REDACTED]';
    } else {
      result[key] = maskSensitiveData(value, maxDepth - 1);
    }
  }
  return result;
};

// ============================================================================
// Winston Logger Configuration
// ============================================================================

const SERVICE_NAME = 'parlor-bot';

/**
 * Custom format to add event context from AsyncLocalStorage to log entries.
 */
const addEventContext = winston.format((info) => {
  const context = getEventContext();
  if (context) {
    info.eventId = context.eventId;
    info.sessionId = info.sessionId ?? context.sessionId;
    if (context.authorId) {
      info.authorId = context.authorId;
    }
    if (context.replayed) {
      info.replayed = true;
    }
  }
  return info;
});

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = SERVICE_NAME;
  }
  if (!info.environment) {
    info.environment = config.nodeEnv;
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
  return {
    level,
    message,
    timestamp,
    ...(typeof masked === 'object' && masked !== null ? masked : {}),
  };
});

/**
 * Format for structured JSON logging (used in production and file transports).
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  addEventContext(),
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
  addEventContext(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, sessionId, ...meta }) => {
    const sessionStr = typeof sessionId === 'string' ? ` [${sessionId}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(maskSensitiveData(meta))}` : '';
    return `${String(timestamp)} ${level}${sessionStr}: ${String(message)}${metaStr}`;
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
      silent: config.isTest,
    }),
  ],
});

// File transports stay off under test so runs leave nothing on disk.
if (!config.isTest) {
  const logsDir = path.join(process.cwd(), 'logs');
  const combinedLogPath = config.logging.file
    ? path.resolve(config.logging.file)
    : path.join(logsDir, 'combined.log');

  for (const dir of [logsDir, path.dirname(combinedLogPath)]) {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  logger.add(
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error',
      format: jsonFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
  logger.add(
    new winston.transports.File({
      filename: combinedLogPath,
      format: jsonFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

export { logger };
