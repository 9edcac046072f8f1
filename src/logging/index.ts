/**
 * Logging utilities.
 */

import { config } from "../config/index.js";
import { createLogger, isLogLevel, type Logger } from "./logger.js";

export {
  createLogger,
  initSessionId,
  getSessionId,
  isLogLevel,
  silentLogger,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";

let defaultLogger: Logger | null = null;

/**
 * Library-wide logger at the configured LOG_LEVEL, console only.
 */
export function getDefaultLogger(): Logger {
  if (defaultLogger === null) {
    defaultLogger = createLogger({
      level: isLogLevel(config.logLevel) ? config.logLevel : "info",
    });
  }
  return defaultLogger;
}
