/**
 * Mock utilities for logging tests.
 *
 * Provides mock logger and logging service factories for unit testing
 * services that depend on the Logger interface.
 */

import { vi, type Mock } from "vitest";
import type { Logger, LoggerName, LoggingService, LogContext } from "./types";

/**
 * Mock logger with vitest spy methods.
 * All method calls are recorded for assertion.
 */
export interface MockLogger extends Logger {
  silly: Mock<(message: string, context?: LogContext) => void>;
  debug: Mock<(message: string, context?: LogContext) => void>;
  info: Mock<(message: string, context?: LogContext) => void>;
  warn: Mock<(message: string, context?: LogContext) => void>;
  error: Mock<(message: string, context?: LogContext, error?: Error) => void>;
}

/**
 * Mock logging service with vitest spy methods.
 */
export interface MockLoggingService extends LoggingService {
  createLogger: Mock<(name: LoggerName) => Logger>;
  dispose: Mock<() => void>;

  /**
   * Get the mock logger instance for a specific name.
   * Returns undefined if that logger was never created.
   */
  getLogger(name: LoggerName): MockLogger | undefined;
}

/**
 * Create a mock logger with vitest spy methods.
 *
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * const fs = new DefaultFileSystemLayer(logger);
 *
 * await fs.readdir('/missing').catch(() => {});
 *
 * expect(logger.debug).toHaveBeenCalledWith('Readdir failed', expect.anything());
 * ```
 */
export function createMockLogger(): MockLogger {
  return {
    silly: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * Create a mock logging service that hands out one MockLogger per name.
 */
export function createMockLoggingService(): MockLoggingService {
  const loggers = new Map<LoggerName, MockLogger>();

  return {
    createLogger: vi.fn((name: LoggerName): Logger => {
      const existing = loggers.get(name);
      if (existing) {
        return existing;
      }
      const logger = createMockLogger();
      loggers.set(name, logger);
      return logger;
    }),

    dispose: vi.fn(),

    getLogger(name: LoggerName): MockLogger | undefined {
      return loggers.get(name);
    },
  };
}

// ============================================================================
// Behavioral Logger Mock
// ============================================================================

/**
 * Logged message type for behavioral testing.
 */
export interface LoggedMessage {
  readonly level: "silly" | "debug" | "info" | "warn" | "error";
  readonly message: string;
  readonly context?: LogContext | undefined;
}

/**
 * Behavioral logger that stores messages for verification.
 */
export interface BehavioralLogger extends Logger {
  getMessages(): readonly LoggedMessage[];
  getMessagesByLevel(level: LoggedMessage["level"]): readonly LoggedMessage[];
  clear(): void;
}

/**
 * Create a behavioral logger that stores messages for verification.
 *
 * Unlike mock loggers that track calls, this logger stores actual messages
 * so tests can check what was logged and in which order.
 *
 * @example
 * ```typescript
 * const logger = createBehavioralLogger();
 * const lister = new FontLister({ platformInfo, fileSystem, logger });
 *
 * await lister.list();
 *
 * expect(logger.getMessages()).toContainEqual({
 *   level: 'info',
 *   message: 'Fonts listed',
 *   context: { count: 2 },
 * });
 * ```
 */
export function createBehavioralLogger(): BehavioralLogger {
  const messages: LoggedMessage[] = [];

  return {
    silly: (message: string, context?: LogContext) => {
      messages.push({ level: "silly", message, context });
    },
    debug: (message: string, context?: LogContext) => {
      messages.push({ level: "debug", message, context });
    },
    info: (message: string, context?: LogContext) => {
      messages.push({ level: "info", message, context });
    },
    warn: (message: string, context?: LogContext) => {
      messages.push({ level: "warn", message, context });
    },
    error: (message: string, context?: LogContext) => {
      messages.push({ level: "error", message, context });
    },
    getMessages: () => [...messages],
    getMessagesByLevel: (level) => messages.filter((m) => m.level === level),
    clear: () => {
      messages.length = 0;
    },
  };
}
