// ---------------------------------------------------------------------------
// Logging – pino root logger and per-subsystem children
// ---------------------------------------------------------------------------

import { pino } from "pino";

/**
 * The slice of a logger that components depend on. Pino child loggers satisfy
 * it, and so does a bag of `vi.fn()` spies in tests.
 */
export type SubsystemLogger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

const rootLogger = pino({
  name: "trade-graph",
  level: process.env.LOG_LEVEL ?? "info",
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function setLogLevel(level: string): void {
  rootLogger.level = level;
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  return rootLogger.child({ subsystem });
}

/** Logger that drops everything; the default when a caller passes none. */
export const silentLogger: SubsystemLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function formatError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
