/**
 * Console-backed loggers, filtered by the configured `log` level.
 *
 * Output format: `[pledge/<scope>] LEVEL: message`.
 */

import { config, LOG_LEVELS, type LogLevel } from "./config.js";

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(config.get("log"));
}

export function createLogger(scope: string): Logger {
  const prefix = `[pledge/${scope}]`;
  return {
    error(message) {
      if (enabled("error")) console.error(`${prefix} ERROR: ${message}`);
    },
    warn(message) {
      if (enabled("warn")) console.warn(`${prefix} WARN: ${message}`);
    },
    info(message) {
      if (enabled("info")) console.info(`${prefix} INFO: ${message}`);
    },
    debug(message) {
      if (enabled("debug")) console.debug(`${prefix} DEBUG: ${message}`);
    },
  };
}

const loggers = new Map<string, Logger>();

/**
 * Log a parse event at debug level when `trace` is on. The message is only
 * built when it will be printed.
 */
export function trace(scope: string, message: () => string): void {
  if (!config.get("trace")) return;
  let logger = loggers.get(scope);
  if (logger === undefined) {
    logger = createLogger(scope);
    loggers.set(scope, logger);
  }
  logger.debug(message());
}
