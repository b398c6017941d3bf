import { createLogger } from "../src/logger.js";
import type { Logger, LogLevel } from "../src/logger.js";

export interface CapturedLogger {
  logger: Logger;
  entries: Record<string, unknown>[];
}

/**
 * Logger that keeps parsed entries in memory instead of writing them.
 */
export function captureLogger(level: LogLevel = "debug"): CapturedLogger {
  const entries: Record<string, unknown>[] = [];
  const logger = createLogger({
    service: "test",
    level,
    sink: (_level, line) => {
      entries.push(JSON.parse(line));
    },
  });
  return { logger, entries };
}

/**
 * Run `fn` and return what it threw.
 */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected function to throw");
}
