/**
 * ElectronLogService - Logging implementation using electron-log's Node.js entry.
 *
 * Features:
 * - Environment variable configuration for level, console output and logger filter
 * - Optional session-based log files: `<datetime>-<uuid>.log`
 * - Named logger scopes for component identification
 * - Context serialization as key=value pairs
 */

import log from "electron-log/node";
import { randomUUID } from "node:crypto";
import { join } from "node:path";
import type { EnvironmentVariables } from "../platform/platform-info";
import type { Logger, LoggerName, LoggingService, LogContext, LogLevel } from "./types";
import { LogLevel as LogLevelValues, LOGGER_NAMES } from "./types";

/**
 * Type for electron-log scope (log functions).
 */
type ElectronLogScope = ReturnType<typeof log.scope>;

const DEFAULT_LOG_LEVEL: LogLevel = "warn";
const LOG_FORMAT = "[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}";

/**
 * Format context object as key=value pairs for log message.
 *
 * @param context - Context object to format
 * @returns Formatted string like "key1=value1 key2=value2"
 */
export function formatContext(context: LogContext | undefined): string {
  if (!context) return "";
  return Object.entries(context)
    .map(([key, value]) => {
      if (value === null) return `${key}=null`;
      return `${key}=${String(value)}`;
    })
    .join(" ");
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LogLevelValues, value);
}

function isLoggerName(value: string): value is LoggerName {
  return LOGGER_NAMES.some((name) => name === value);
}

/**
 * Parse and validate FONTLISTER_LOGLEVEL.
 *
 * @param envValue - Raw environment variable value
 * @returns Valid log level or undefined if invalid
 */
export function parseLogLevel(envValue: string | undefined): LogLevel | undefined {
  if (!envValue) return undefined;
  const normalized = envValue.toLowerCase().trim();
  return isLogLevel(normalized) ? normalized : undefined;
}

/**
 * Parse FONTLISTER_LOGGER to get the set of allowed logger names.
 * Unknown names are dropped.
 *
 * @returns Set of allowed logger names, or undefined if not set (allow all)
 */
export function parseLoggerFilter(envValue: string | undefined): Set<LoggerName> | undefined {
  if (!envValue) return undefined;
  const names = envValue
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  if (names.length === 0) return undefined;
  return new Set(names.filter(isLoggerName));
}

/**
 * Generate session-based log filename.
 * Format: YYYY-MM-DDTHH-MM-SS-<uuid>.log
 */
function generateSessionFilename(): string {
  const timestamp = new Date()
    .toISOString()
    .replace(/[:.]/g, "-")
    .slice(0, 19); // YYYY-MM-DDTHH-MM-SS
  const uuid = randomUUID().slice(0, 8);
  return `${timestamp}-${uuid}.log`;
}

/**
 * Logger implementation wrapping an electron-log scope.
 */
class ElectronLogLogger implements Logger {
  constructor(private readonly scope: ElectronLogScope) {}

  silly(message: string, context?: LogContext): void {
    this.scope.silly(withContext(message, context));
  }

  debug(message: string, context?: LogContext): void {
    this.scope.debug(withContext(message, context));
  }

  info(message: string, context?: LogContext): void {
    this.scope.info(withContext(message, context));
  }

  warn(message: string, context?: LogContext): void {
    this.scope.warn(withContext(message, context));
  }

  error(message: string, context?: LogContext, error?: Error): void {
    const fullMessage = withContext(message, context);
    if (error) {
      this.scope.error(fullMessage, error);
    } else {
      this.scope.error(fullMessage);
    }
  }
}

function withContext(message: string, context: LogContext | undefined): string {
  const contextStr = formatContext(context);
  return contextStr ? `${message} ${contextStr}` : message;
}

/**
 * Logger that does nothing unless its name is in the allowed set.
 */
class FilteredLogger implements Logger {
  private readonly enabled: boolean;

  constructor(
    private readonly inner: Logger,
    allowedLoggers: Set<LoggerName> | undefined,
    name: LoggerName
  ) {
    this.enabled = allowedLoggers === undefined || allowedLoggers.has(name);
  }

  silly(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.silly(message, context);
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.debug(message, context);
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.info(message, context);
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.warn(message, context);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (this.enabled) this.inner.error(message, context, error);
  }
}

/**
 * Logging service using electron-log.
 *
 * Configuration:
 * - Default level: WARN, override via FONTLISTER_LOGLEVEL
 * - Console output via FONTLISTER_PRINT_LOGS (any non-empty value)
 * - File output via FONTLISTER_LOG_DIR (one file per session in that directory)
 * - Logger filtering via FONTLISTER_LOGGER (comma-separated logger names)
 *
 * @example
 * ```typescript
 * const loggingService = new ElectronLogService(process.env);
 * const logger = loggingService.createLogger('fonts');
 * logger.debug('Scope resolved', { scope: 'AllUsers', dir: '/usr/share/fonts' });
 * // Output: [2026-10-19 10:30:00.123] [debug] [fonts] Scope resolved scope=AllUsers dir=/usr/share/fonts
 * ```
 */
export class ElectronLogService implements LoggingService {
  private readonly loggers = new Map<LoggerName, Logger>();
  private readonly logLevel: LogLevel;
  private readonly allowedLoggers: Set<LoggerName> | undefined;

  constructor(env: EnvironmentVariables) {
    this.logLevel = parseLogLevel(env.FONTLISTER_LOGLEVEL) ?? DEFAULT_LOG_LEVEL;
    this.allowedLoggers = parseLoggerFilter(env.FONTLISTER_LOGGER);

    const enableConsole = !!env.FONTLISTER_PRINT_LOGS;
    log.transports.console.level = enableConsole ? this.logLevel : false;
    log.transports.console.format = LOG_FORMAT;

    const logsDir = env.FONTLISTER_LOG_DIR;
    if (logsDir) {
      const filename = generateSessionFilename();
      log.transports.file.resolvePathFn = (): string => join(logsDir, filename);
      log.transports.file.level = this.logLevel;
      log.transports.file.format = LOG_FORMAT;
    } else {
      log.transports.file.level = false;
    }
  }

  /**
   * Create a logger with the specified name (scope).
   * If FONTLISTER_LOGGER is set, only loggers in the list will actually log.
   */
  createLogger(name: LoggerName): Logger {
    const existing = this.loggers.get(name);
    if (existing) {
      return existing;
    }

    const scope = log.scope(`[${name}]`);
    const logger = new FilteredLogger(new ElectronLogLogger(scope), this.allowedLoggers, name);
    this.loggers.set(name, logger);
    return logger;
  }

  dispose(): void {
    this.loggers.clear();
  }
}
