/**
 * Logging types and interfaces.
 *
 * Provides a testable logging abstraction over electron-log with:
 * - Type-safe logger names (scopes)
 * - Constrained context type (no nested objects, functions, symbols)
 * - Interface for dependency injection
 */

/**
 * Log levels in order of verbosity (most verbose to least).
 */
export const LogLevel = {
  silly: "silly",
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Valid logger names (scopes).
 * Each name corresponds to a module or subsystem in the application.
 */
export type LoggerName =
  | "fonts" // FontLister - directory resolution and matching
  | "fs" // DefaultFileSystemLayer - filesystem operations
  | "config" // ConfigService - config file loading
  | "cli"; // Command line entry point

export const LOGGER_NAMES: readonly LoggerName[] = ["fonts", "fs", "config", "cli"];

/**
 * Context data for log entries.
 * Constrained to primitive types for serialization safety:
 * - No nested objects (prevents circular references)
 * - No functions or symbols (not serializable)
 * - null allowed for explicit "no value" cases
 */
export type LogContext = Record<string, string | number | boolean | null>;

/**
 * Logger interface for dependency injection.
 * Services receive this interface via constructor injection.
 *
 * @example
 * ```typescript
 * class MyService {
 *   constructor(private readonly logger: Logger) {}
 *
 *   async scan(): Promise<void> {
 *     this.logger.debug('Scanning', { dir: '/usr/share/fonts' });
 *     try {
 *       // ... work
 *       this.logger.info('Scan complete', { count: 12 });
 *     } catch (err) {
 *       this.logger.error('Scan failed', { dir: '/usr/share/fonts' }, toError(err));
 *     }
 *   }
 * }
 * ```
 */
export interface Logger {
  /**
   * Log a silly message (most verbose).
   * Use for per-file details that would be overwhelming in normal debug output.
   */
  silly(message: string, context?: LogContext): void;

  /**
   * Log a debug message.
   * Use for detailed tracing information.
   */
  debug(message: string, context?: LogContext): void;

  /**
   * Log an info message.
   * Use for significant operations (completions, totals).
   */
  info(message: string, context?: LogContext): void;

  /**
   * Log a warning message.
   * Use for recoverable issues.
   */
  warn(message: string, context?: LogContext): void;

  /**
   * Log an error message.
   *
   * @param message - Human-readable error description
   * @param context - Structured context data
   * @param error - Optional Error object for stack trace inclusion
   */
  error(message: string, context?: LogContext, error?: Error): void;
}

/**
 * Logging service interface.
 * Creates named loggers.
 *
 * @example
 * ```typescript
 * const loggingService = new ElectronLogService();
 * const lister = new FontLister({
 *   platformInfo,
 *   fileSystem,
 *   logger: loggingService.createLogger('fonts'),
 * });
 * ```
 */
export interface LoggingService {
  /**
   * Create a logger with the specified name (scope).
   * The name appears in log output to identify the source.
   */
  createLogger(name: LoggerName): Logger;

  /**
   * Dispose of the logging service.
   */
  dispose(): void;
}
