/**
 * @module logger
 * @description Structured JSON logging with trace correlation.
 *
 * Every line is one JSON object carrying the timestamp, level, service name,
 * message, the active OpenTelemetry trace/span ids (when a span is active)
 * and any metadata. Level and service come from `LOG_LEVEL` and
 * `OTEL_SERVICE_NAME`.
 */

import { trace } from "@opentelemetry/api";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, error?: unknown, meta?: Record<string, unknown>): void;
}

/**
 * Destination for formatted lines. Defaults to the console.
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerConfig {
  /** Service name stamped on each entry. Default: `OTEL_SERVICE_NAME` or "state-core" */
  service?: string;
  /** Minimum level written. Default: `LOG_LEVEL` or "info" */
  level?: LogLevel;
  /** Line destination. Default: console.log / console.warn / console.error */
  sink?: LogSink;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  traceId?: string;
  spanId?: string;
  [key: string]: unknown;
}

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(levels, value);
}

/**
 * Resolve a level from an environment value, falling back to "info".
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : "info";
}

const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

function getTraceContext(): { traceId?: string; spanId?: string } {
  const activeSpan = trace.getActiveSpan();
  if (activeSpan) {
    const ctx = activeSpan.spanContext();
    return {
      traceId: ctx.traceId,
      spanId: ctx.spanId,
    };
  }
  return {};
}

function describeError(error: unknown): unknown {
  if (error instanceof Error) {
    const described: Record<string, unknown> = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
    if ("code" in error && typeof error.code === "string") {
      described.code = error.code;
    }
    return described;
  }
  return String(error);
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const service = config.service ?? process.env.OTEL_SERVICE_NAME ?? "state-core";
  const threshold = config.level ?? parseLogLevel(process.env.LOG_LEVEL);
  const sink = config.sink ?? consoleSink;

  const write = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (levels[level] < levels[threshold]) {
      return;
    }
    const entry: LogEntry = {
      ...meta,
      timestamp: new Date().toISOString(),
      level,
      service,
      message,
      ...getTraceContext(),
    };
    sink(level, JSON.stringify(entry));
  };

  return {
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, error, meta) => {
      const errorMeta: Record<string, unknown> = { ...meta };
      if (error !== undefined) {
        errorMeta.error = describeError(error);
      }
      write("error", message, errorMeta);
    },
  };
}

export const logger: Logger = createLogger();
