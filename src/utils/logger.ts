/**
 * Logger utility
 */

import { Logger } from "tslog";
import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { ILogObj } from "tslog";

/**
 * Minimal logging capability accepted by the pipeline.
 * Any tslog `Logger` satisfies it; embedders can pass their own sink.
 */
export interface LogSink {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export function resolveMinLevel(raw: string | undefined): number {
  if (!raw) return LEVELS.info;
  return LEVELS[raw.trim().toLowerCase()] ?? LEVELS.info;
}

/** Optional file transport: if LOG_FILE is set, also append formatted lines. */
function buildAttachedTransports(): ((logObj: ILogObj) => void)[] {
  const logFile = process.env.LOG_FILE;
  if (!logFile) return [];

  try {
    mkdirSync(dirname(logFile), { recursive: true });
  } catch {
    // appends below then fail and are dropped
  }

  return [
    (logObj: ILogObj) => {
      try {
        const meta = logObj["_meta"];
        const ts =
          typeof meta === "object" && meta !== null && "date" in meta
            ? String(meta.date)
            : new Date().toISOString();
        const parts = Object.values(logObj).filter(
          (v) => typeof v === "string" || typeof v === "number",
        );
        appendFileSync(logFile, `${ts} ${parts.join(" ")}\n`);
      } catch {
        // Swallow write errors to avoid recursive logging
      }
    },
  ];
}

export const logger = new Logger<ILogObj>({
  name: "corpus-index",
  type: process.env.LOG_FORMAT === "json" ? "json" : "pretty",
  minLevel: resolveMinLevel(process.env.LOG_LEVEL),
  prettyLogTemplate:
    "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ",
  attachedTransports: buildAttachedTransports(),
});

export function createLogger(name: string): Logger<ILogObj> {
  return logger.getSubLogger({ name });
}
