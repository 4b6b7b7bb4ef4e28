/**
 * Structured logger and pipeline diagnostics counters used across packages.
 */

import type { LogLevel } from "./enums.js";

export type LogContext = Record<string, unknown>;

export type Logger = {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(scope: string): Logger;
};

export type LogSink = (level: LogLevel, line: string) => void;

export type CreateLoggerOptions = {
  level?: LogLevel;
  scope?: string;
  sink?: LogSink;
};

type DiagnosticsCounters = {
  layoutFallbacks: number;
  diagramFailures: number;
  degradedDiagramLookups: number;
  slideRenderFallbacks: number;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const counters: DiagnosticsCounters = {
  layoutFallbacks: 0,
  diagramFailures: 0,
  degradedDiagramLookups: 0,
  slideRenderFallbacks: 0,
};

function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case "debug":
      console.debug(line);
      return;
    case "info":
      console.info(line);
      return;
    case "warn":
      console.warn(line);
      return;
    case "error":
      console.error(line);
      return;
    default: {
      const exhaustive: never = level;
      console.log(exhaustive);
    }
  }
}

function formatEvent(
  level: LogLevel,
  scope: string | undefined,
  message: string,
  context?: LogContext,
): string {
  const event = {
    ts: new Date().toISOString(),
    level,
    ...(scope ? { scope } : {}),
    message,
    ...context,
  };
  return JSON.stringify(event);
}

/**
 * JSON-line logger writing to stdout/stderr unless a sink is supplied.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const minRank = LEVEL_RANK[options.level ?? "info"];
  const sink = options.sink ?? consoleSink;

  const emit = (level: LogLevel, message: string, context?: LogContext): void => {
    if (LEVEL_RANK[level] < minRank) return;
    sink(level, formatEvent(level, options.scope, message, context));
  };

  return {
    debug: (message, context) => emit("debug", message, context),
    info: (message, context) => emit("info", message, context),
    warn: (message, context) => emit("warn", message, context),
    error: (message, context) => emit("error", message, context),
    child: (scope) =>
      createLogger({
        ...options,
        scope: options.scope ? `${options.scope}.${scope}` : scope,
      }),
  };
}

export const logger: Logger = createLogger({ level: "info" });

/** Logger that drops everything; handy for tests and library callers. */
export const silentLogger: Logger = createLogger({ sink: () => {} });

export function recordLayoutFallback(): void {
  counters.layoutFallbacks += 1;
}

export function recordDiagramFailure(): void {
  counters.diagramFailures += 1;
}

export function recordDegradedDiagramLookup(): void {
  counters.degradedDiagramLookups += 1;
}

export function recordSlideRenderFallback(): void {
  counters.slideRenderFallbacks += 1;
}

/**
 * Returns a copy of the current counters for summaries and tests.
 */
export function getDiagnosticsCounters(): DiagnosticsCounters {
  return { ...counters };
}

export function resetDiagnosticsCounters(): void {
  counters.layoutFallbacks = 0;
  counters.diagramFailures = 0;
  counters.degradedDiagramLookups = 0;
  counters.slideRenderFallbacks = 0;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
