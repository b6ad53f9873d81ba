/**
 * Service error definitions.
 */

import type { FileSystemErrorCode } from "./platform/filesystem";

/**
 * Error codes for font listing operations.
 */
export type FontListErrorCode = "UNSUPPORTED_PLATFORM";

/**
 * Error codes for configuration loading.
 */
export type ConfigErrorCode = "INVALID_JSON" | "INVALID_CONFIG";

/**
 * Discriminator of the ServiceError subclasses.
 */
export type ServiceErrorType = "filesystem" | "font-list" | "config";

/**
 * Base class for all service errors.
 */
export abstract class ServiceError extends Error {
  abstract readonly type: ServiceErrorType;
  readonly code: string | undefined;

  constructor(message: string, code?: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code ?? undefined;
    // Fix prototype chain for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Error from font listing (e.g. the host OS has no font directory map).
 */
export class FontListError extends ServiceError {
  override readonly type = "font-list" as const;

  constructor(
    message: string,
    readonly errorCode: FontListErrorCode
  ) {
    super(message, errorCode);
    this.name = "FontListError";
  }
}

/**
 * Error from loading the configuration file.
 */
export class ConfigError extends ServiceError {
  override readonly type = "config" as const;

  constructor(
    message: string,
    readonly errorCode: ConfigErrorCode
  ) {
    super(message, errorCode);
    this.name = "ConfigError";
  }
}

/**
 * Error from filesystem operations.
 */
export class FileSystemError extends ServiceError {
  override readonly type = "filesystem" as const;

  constructor(
    /** Mapped error code */
    readonly fsCode: FileSystemErrorCode,
    /** Path that caused the error */
    readonly path: string,
    message: string,
    /** Original error for debugging */
    override readonly cause?: Error,
    /** Original Node.js error code (e.g., "EMFILE", "ELOOP") */
    readonly originalCode?: string
  ) {
    super(message, fsCode);
    this.name = "FileSystemError";
  }
}

/**
 * Type guard to check if an error is a ServiceError.
 */
export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

/**
 * Type guard for a FileSystemError with one of the given codes.
 */
export function isFileSystemErrorWithCode(
  error: unknown,
  ...codes: readonly FileSystemErrorCode[]
): error is FileSystemError {
  return error instanceof FileSystemError && codes.includes(error.fsCode);
}

export { getErrorMessage } from "../shared/error-utils";
