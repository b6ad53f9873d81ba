/**
 * font-lister library entry point.
 *
 * @example
 * ```typescript
 * import { createFontLister, DefaultFileSystemLayer, NodePlatformInfo, createSilentLogger } from "font-lister";
 *
 * const logger = createSilentLogger();
 * const lister = createFontLister({
 *   platformInfo: new NodePlatformInfo(),
 *   fileSystem: new DefaultFileSystemLayer(logger),
 *   logger,
 * });
 * const fonts = await lister.list({ names: ["Noto*"], scopes: ["CurrentUser", "AllUsers"] });
 * ```
 */

export * from "./services/fonts";
export * from "./services/config";
export { ElectronLogService, LogLevel, LOGGER_NAMES, createSilentLogger } from "./services/logging";
export type { Logger, LoggerName, LoggingService, LogContext } from "./services/logging";
export { DefaultFileSystemLayer } from "./services/platform/filesystem";
export type { DirEntry, FileSystemErrorCode, FileSystemLayer } from "./services/platform/filesystem";
export { NodePlatformInfo } from "./services/platform/platform-info";
export type { EnvironmentVariables, PlatformInfo } from "./services/platform/platform-info";
export {
  ConfigError,
  FileSystemError,
  FontListError,
  ServiceError,
  getErrorMessage,
  isFileSystemErrorWithCode,
  isServiceError,
} from "./services/errors";
export type {
  ConfigErrorCode,
  FontListErrorCode,
  ServiceErrorType,
} from "./services/errors";
export { runCli } from "./cli/main";
export type { CliDeps, TextOutput } from "./cli/main";
