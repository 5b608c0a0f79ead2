/**
 * Pino Logger Factory
 *
 * Structured logging for selector operations. The library logs quietly by
 * default (`warn`); set TEXTMARK_LOG_LEVEL to see resolution traces.
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
  level?: LogLevel;
  /** Pretty-print through pino-pretty; defaults on under NODE_ENV=development */
  pretty?: boolean;
  /** Write synchronously to this destination instead of stdout */
  destination?: DestinationStream;
}

const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function levelFromEnv(fallback: LogLevel): LogLevel {
  const value = process.env.TEXTMARK_LOG_LEVEL;
  return LOG_LEVELS.find((level) => level === value) ?? fallback;
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    level: config.level ?? levelFromEnv("warn"),
    base: { service: "textmark" },
  };
  if (config.destination) {
    return pino(options, config.destination);
  }
  if (config.pretty ?? process.env.NODE_ENV === "development") {
    options.transport = {
      target: "pino-pretty",
      options: { colorize: true, ignore: "pid,hostname" },
    };
  }
  return pino(options);
}

/**
 * The logging surface selectors write to: resolution traces at debug,
 * failed quote sets at warn.
 */
export interface SelectorLogger {
  debug(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): SelectorLogger;
}

function toSelectorLogger(logger: Logger): SelectorLogger {
  return {
    debug: (msg, data = {}) => logger.debug(data, msg),
    warn: (msg, data = {}) => logger.warn(data, msg),
    child: (bindings) => toSelectorLogger(logger.child(bindings)),
  };
}

export function createSelectorLogger(
  config: LoggerConfig & { module?: string } = {}
): SelectorLogger {
  const logger = createLogger(config);
  return toSelectorLogger(config.module ? logger.child({ module: config.module }) : logger);
}

export type { Logger } from "pino";

let defaultLogger: SelectorLogger | null = null;

export function getLogger(): SelectorLogger {
  if (!defaultLogger) {
    defaultLogger = createSelectorLogger();
  }
  return defaultLogger;
}

/** Replace the default logger; `null` goes back to the lazily created one */
export function setDefaultLogger(logger: SelectorLogger | null): void {
  defaultLogger = logger;
}
