/**
 * Logging exports.
 */

import type { Logger } from "./types";

export { ElectronLogService } from "./electron-log-service";
export { LogLevel, LOGGER_NAMES } from "./types";
export type { Logger, LoggerName, LoggingService, LogContext } from "./types";

/**
 * Create a silent no-op logger.
 * Used when the caller of the library passes no logger.
 */
export function createSilentLogger(): Logger {
  return {
    silly: () => {},
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}
