// =============================================================================
// @weekly-digest/runner — Structured run logging
// =============================================================================
// One JSON object per line on stderr: level, msg, timestamp, the bindings of
// the run (runId) and the call's own fields. Stage and external-call helpers
// give every run the same timing lines.
// =============================================================================

import { randomUUID } from "node:crypto";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

type LogFields = Record<string, unknown>;

export interface Logger {
  trace(msg: string, data?: LogFields): void;
  debug(msg: string, data?: LogFields): void;
  info(msg: string, data?: LogFields): void;
  warn(msg: string, data?: LogFields): void;
  error(msg: string, data?: LogFields): void;
  fatal(msg: string, data?: LogFields): void;
  child(bindings: LogFields): Logger;
}

/** Anything that accepts one log line at a time */
export interface LogSink {
  write(line: string): unknown;
}

export interface LoggerOptions {
  /** Unknown names fall back to info */
  level?: string;
  sink?: LogSink;
  clock?: () => Date;
}

export function createRunId(): string {
  return randomUUID();
}

/** Message of a thrown value, whatever was thrown */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function severity(level: string): number {
  const index = LOG_LEVELS.findIndex((l) => l === level);
  return index === -1 ? LOG_LEVELS.indexOf("info") : index;
}

class JsonLogger implements Logger {
  constructor(
    private readonly threshold: number,
    private readonly sink: LogSink,
    private readonly clock: () => Date,
    private readonly bindings: LogFields,
  ) {}

  trace(msg: string, data?: LogFields): void {
    this.emit("trace", msg, data);
  }

  debug(msg: string, data?: LogFields): void {
    this.emit("debug", msg, data);
  }

  info(msg: string, data?: LogFields): void {
    this.emit("info", msg, data);
  }

  warn(msg: string, data?: LogFields): void {
    this.emit("warn", msg, data);
  }

  error(msg: string, data?: LogFields): void {
    this.emit("error", msg, data);
  }

  fatal(msg: string, data?: LogFields): void {
    this.emit("fatal", msg, data);
  }

  child(bindings: LogFields): Logger {
    return new JsonLogger(this.threshold, this.sink, this.clock, {
      ...this.bindings,
      ...bindings,
    });
  }

  private emit(level: LogLevel, msg: string, data?: LogFields): void {
    if (severity(level) < this.threshold) return;
    const line = {
      level,
      msg,
      timestamp: this.clock().toISOString(),
      ...this.bindings,
      ...data,
    };
    this.sink.write(JSON.stringify(line) + "\n");
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new JsonLogger(
    severity(options.level ?? "info"),
    options.sink ?? process.stderr,
    options.clock ?? (() => new Date()),
    {},
  );
}

// ---------------------------------------------------------------------------
// Run stages
// ---------------------------------------------------------------------------

export type RunStage = "config" | "fetch" | "parse" | "rank" | "extract" | "render";

export function logStage(
  logger: Logger,
  stage: RunStage,
  durationMs: number,
  error?: string,
): void {
  if (error !== undefined) {
    logger.error("Stage failed", { stage, durationMs, error });
  } else {
    logger.info("Stage completed", { stage, durationMs });
  }
}

export function logExternalCall(
  logger: Logger,
  service: "arxiv",
  operation: string,
  durationMs: number,
  error?: string,
): void {
  if (error !== undefined) {
    logger.error("External call failed", { service, operation, durationMs, error });
  } else {
    logger.info("External call completed", { service, operation, durationMs });
  }
}

/** Run `fn` as one stage: a completed or failed line, errors rethrown */
export async function timeStage<T>(
  logger: Logger,
  stage: RunStage,
  fn: () => Promise<T>,
): Promise<T> {
  const start = performance.now();
  try {
    const result = await fn();
    logStage(logger, stage, Math.round(performance.now() - start));
    return result;
  } catch (err) {
    logStage(logger, stage, Math.round(performance.now() - start), describeError(err));
    throw err;
  }
}
