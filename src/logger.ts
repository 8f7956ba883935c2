/**
 * Structured logging with pino.
 *
 * Logs go to stderr so that stdout carries only the session summary.
 */

import pino from "pino";
import type { Level, LevelWithSilent, Logger } from "pino";

const LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function isLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

/**
 * Resolve the log level from the environment.
 * LOG_LEVEL wins; tests default to silent, everything else to info.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LevelWithSilent {
  const requested = env.LOG_LEVEL?.trim().toLowerCase();
  if (requested && isLevel(requested)) return requested;
  return env.NODE_ENV === "test" ? "silent" : "info";
}

function createLogger(): Logger {
  return pino(
    {
      level: resolveLogLevel(),
      base: { service: "pmc-harvest" },
      formatters: {
        level: (label) => {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2)
  );
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context.
 * Call per operation rather than at module load, so level changes made by the
 * CLI (e.g. `--verbose`) apply.
 */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

/** Change the level of the main logger. */
export function setLogLevel(level: Level | "silent"): void {
  logger.level = level;
}
