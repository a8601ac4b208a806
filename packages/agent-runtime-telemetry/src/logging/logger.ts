/**
 * Pino Logger Factory
 *
 * Structured logging via pino with context binding. Level comes from
 * LOG_LEVEL; LOG_PRETTY=true routes output through pino-pretty.
 */

import pino, { type Logger, type LoggerOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Log level */
  level?: LogLevel;
  /** Enable pretty printing (for development) */
  pretty?: boolean;
  /** Base bindings (always included in logs) */
  base?: Record<string, unknown>;
  /** Custom transport */
  transport?: LoggerOptions["transport"];
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

function defaultConfig(): LoggerConfig {
  return {
    level: parseLogLevel(process.env.LOG_LEVEL),
    pretty: process.env.LOG_PRETTY === "true",
    base: { service: "taskloop" },
  };
}

/**
 * Create a pino logger instance
 */
export function createLogger(config?: LoggerConfig): Logger {
  const mergedConfig = { ...defaultConfig(), ...config };

  const options: LoggerOptions = {
    level: mergedConfig.level,
    base: mergedConfig.base,
  };

  if (mergedConfig.transport) {
    options.transport = mergedConfig.transport;
  } else if (mergedConfig.pretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }

  return pino(options);
}

/**
 * Logger surface used across the runtime packages
 */
export interface RuntimeLogger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: Error | Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): RuntimeLogger;
}

/**
 * Create a runtime logger wrapper
 */
export function createRuntimeLogger(config?: LoggerConfig & { module?: string }): RuntimeLogger {
  const base = createLogger(config);
  const logger = config?.module ? base.child({ module: config.module }) : base;

  return wrapLogger(logger);
}

export function wrapLogger(logger: Logger): RuntimeLogger {
  return {
    trace: (msg, data) => (data ? logger.trace(data, msg) : logger.trace(msg)),
    debug: (msg, data) => (data ? logger.debug(data, msg) : logger.debug(msg)),
    info: (msg, data) => (data ? logger.info(data, msg) : logger.info(msg)),
    warn: (msg, data) => (data ? logger.warn(data, msg) : logger.warn(msg)),
    error: (msg, err) => {
      if (err instanceof Error) {
        logger.error({ err }, msg);
      } else if (err) {
        logger.error(err, msg);
      } else {
        logger.error(msg);
      }
    },
    child: (bindings) => wrapLogger(logger.child(bindings)),
  };
}

export type { Logger } from "pino";

let defaultLogger: RuntimeLogger | null = null;

/**
 * Get or create the default runtime logger
 */
export function getLogger(): RuntimeLogger {
  if (!defaultLogger) {
    defaultLogger = createRuntimeLogger();
  }
  return defaultLogger;
}
