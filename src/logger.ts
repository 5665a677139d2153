/**
 * Purpose: Create the pino loggers used across the build.
 * Intent: Resolve one log level (explicit option, then environment, then `warn`) and tag each logger with its module.
 */

import pino, { type Logger } from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export const LOG_LEVEL_ENV = "THEME_BUILDER_LOG_LEVEL";

export type { Logger };

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value);
}

export function resolveLogLevel(level?: LogLevel): LogLevel {
  if (level) return level;
  const fromEnv = process.env[LOG_LEVEL_ENV];
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
  return "warn";
}

const baseLogger = pino({
  name: "theme-builder",
  level: resolveLogLevel(),
  timestamp: pino.stdTimeFunctions.isoTime,
});

export const logger = baseLogger;

export function createModuleLogger(module: string, level?: LogLevel): Logger {
  const child = logger.child({ module });
  child.level = resolveLogLevel(level);
  return child;
}
