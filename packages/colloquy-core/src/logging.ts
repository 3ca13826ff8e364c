// Structured logging for colloquy services.
//
// Components take an optional Logger and derive a child from it, so a host
// can route everything through its own pino instance.

import pino, { type Logger } from "pino";

export type { Logger };

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const DEFAULT_LOG_LEVEL: LogLevel = "info";

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export interface LoggerOptions {
  level?: string;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level?.trim().toLowerCase();
  return pino({
    name: options.name ?? "colloquy",
    level: level !== undefined && isLogLevel(level) ? level : DEFAULT_LOG_LEVEL,
  });
}

/** Process-wide default logger. */
export const logger: Logger = createLogger({ level: process.env.LOG_LEVEL });

export function configureLogger(level?: string): void {
  const normalized = (level || process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL).trim().toLowerCase();
  if (isLogLevel(normalized)) {
    logger.level = normalized;
    return;
  }
  logger.warn({ level }, "Invalid log level; keeping current level");
}
