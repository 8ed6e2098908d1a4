/**
 * Structured Logger
 *
 * JSON-structured logging with level filtering, context enrichment and
 * child loggers. Each security component receives a child logger tagged
 * with its component name, so a single line is enough to tell which
 * stage of the request pipeline emitted it.
 *
 * @module logging/logger
 */

import { randomUUID } from 'node:crypto';

// ─── Types ───────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogMetadata {
  [key: string]: unknown;
}

export interface LogContext {
  correlationId?: string;
  requestId?: string;
  userId?: string;
  component?: string;
  service?: string;
}

export interface ErrorInfo {
  name: string;
  message: string;
  stack?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  correlationId: string;
  component?: string;
  requestId?: string;
  userId?: string;
  metadata?: LogMetadata;
  error?: ErrorInfo;
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, error?: Error, metadata?: LogMetadata): void;
  fatal(message: string, error?: Error, metadata?: LogMetadata): void;
  child(context: LogContext): Logger;
}

// ─── Log Level Ordering ──────────────────────────────────────────────────────

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

/** Output sink for log entries. Defaults to one JSON line on stdout. */
export type LogOutput = (entry: LogEntry) => void;

const defaultLogOutput: LogOutput = (entry: LogEntry) => {
  process.stdout.write(JSON.stringify(entry) + '\n');
};

// ─── Logger Options ──────────────────────────────────────────────────────────

export interface LoggerOptions {
  /** Service name included in every log entry. Defaults to 'field-service-auth'. */
  service?: string;
  /** Minimum log level to emit. Defaults to 'info'. */
  level?: LogLevel;
  /** Base context merged into every log entry. */
  context?: LogContext;
  /** Custom output sink. */
  output?: LogOutput;
}

// ─── Implementation ──────────────────────────────────────────────────────────

export function createLogger(options: LoggerOptions = {}): Logger {
  const service = options.service ?? 'field-service-auth';
  const minLevel = options.level ?? 'info';
  const output = options.output ?? defaultLogOutput;
  const baseContext: LogContext = {
    ...options.context,
  };
  if (!baseContext.correlationId) {
    baseContext.correlationId = randomUUID();
  }

  function buildEntry(
    level: LogLevel,
    message: string,
    error?: Error,
    metadata?: LogMetadata,
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: baseContext.service ?? service,
      correlationId: baseContext.correlationId ?? '',
    };

    if (baseContext.component) entry.component = baseContext.component;
    if (baseContext.requestId) entry.requestId = baseContext.requestId;
    if (baseContext.userId) entry.userId = baseContext.userId;
    if (metadata && Object.keys(metadata).length > 0) entry.metadata = metadata;

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return entry;
  }

  function log(level: LogLevel, message: string, error?: Error, metadata?: LogMetadata): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) return;
    output(buildEntry(level, message, error, metadata));
  }

  return {
    debug(message: string, metadata?: LogMetadata): void {
      log('debug', message, undefined, metadata);
    },
    info(message: string, metadata?: LogMetadata): void {
      log('info', message, undefined, metadata);
    },
    warn(message: string, metadata?: LogMetadata): void {
      log('warn', message, undefined, metadata);
    },
    error(message: string, error?: Error, metadata?: LogMetadata): void {
      log('error', message, error, metadata);
    },
    fatal(message: string, error?: Error, metadata?: LogMetadata): void {
      log('fatal', message, error, metadata);
    },
    child(context: LogContext): Logger {
      return createLogger({
        service,
        level: minLevel,
        context: { ...baseContext, ...context },
        output,
      });
    },
  };
}

/** Normalise an unknown thrown value into an Error for logging. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
