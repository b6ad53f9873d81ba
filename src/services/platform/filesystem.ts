/**
 * FileSystemLayer - Abstraction over read-only filesystem operations.
 *
 * Provides an injectable interface for filesystem access, enabling:
 * - Unit testing of the font lister and config loader with a mock FileSystemLayer
 * - Boundary testing of DefaultFileSystemLayer against the real filesystem
 * - Consistent error handling via FileSystemError
 */

import * as fs from "node:fs/promises";
import { join } from "node:path";
import { FileSystemError } from "../errors";
import type { Logger } from "../logging";

/**
 * Directory entry returned by readdir.
 */
export interface DirEntry {
  /** Entry name (not full path) */
  readonly name: string;
  /** True if entry is a directory, or a symlink to one */
  readonly isDirectory: boolean;
  /** True if entry is a regular file, or a symlink to one */
  readonly isFile: boolean;
  /** True if entry is a symbolic link */
  readonly isSymbolicLink: boolean;
}

/**
 * Error codes for filesystem operations.
 */
export type FileSystemErrorCode =
  | "ENOENT" // File/directory not found
  | "EACCES" // Permission denied
  | "ENOTDIR" // Not a directory
  | "EISDIR" // Is a directory (when file expected)
  | "UNKNOWN"; // Other errors (check originalCode)

/**
 * Abstraction over filesystem reads.
 *
 * All paths are absolute strings. Text is read as UTF-8.
 * Methods throw FileSystemError on failures.
 *
 * NOTE: No exists() method - use try/catch on actual operations to avoid TOCTOU races.
 */
export interface FileSystemLayer {
  /**
   * Read entire file as UTF-8 string.
   *
   * @param path - Absolute path to file
   * @returns File contents as string
   * @throws FileSystemError with code ENOENT if file not found
   * @throws FileSystemError with code EACCES if permission denied
   * @throws FileSystemError with code EISDIR if path is a directory
   *
   * @example
   * const content = await fs.readFile('/path/to/config.json');
   * const config = JSON.parse(content);
   */
  readFile(path: string): Promise<string>;

  /**
   * List directory contents (non-recursive), in the order the OS returns them.
   *
   * @param path - Absolute path to directory
   * @returns Array of directory entries with type information; symlinks take
   * isFile/isDirectory from their target
   * @throws FileSystemError with code ENOENT if directory not found
   * @throws FileSystemError with code ENOTDIR if path is not a directory
   *
   * @example
   * const entries = await fs.readdir('/usr/share/fonts');
   * const files = entries.filter(e => e.isFile);
   */
  readdir(path: string): Promise<readonly DirEntry[]>;
}

/**
 * Known error codes that map to FileSystemErrorCode.
 */
const KNOWN_ERROR_CODES: ReadonlySet<string> = new Set([
  "ENOENT",
  "EACCES",
  "ENOTDIR",
  "EISDIR",
]);

function isKnownErrorCode(code: string | undefined): code is Exclude<FileSystemErrorCode, "UNKNOWN"> {
  return code !== undefined && KNOWN_ERROR_CODES.has(code);
}

/**
 * Extract the POSIX error code (e.g. "ENOENT") from a Node.js error.
 */
function extractErrorCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Map a Node.js filesystem error to a FileSystemError.
 *
 * @param error - The original Node.js error
 * @param path - The filesystem path that caused the error
 * @returns A FileSystemError with mapped error code
 */
function mapError(error: unknown, path: string): FileSystemError {
  if (!(error instanceof Error)) {
    return new FileSystemError("UNKNOWN", path, String(error));
  }

  const code = extractErrorCode(error);

  if (isKnownErrorCode(code)) {
    return new FileSystemError(code, path, error.message, error);
  }

  // Unknown error code - preserve original code
  return new FileSystemError("UNKNOWN", path, error.message, error, code);
}

/**
 * Default implementation of FileSystemLayer using node:fs/promises.
 * Maps Node.js errors to FileSystemError for consistent error handling.
 */
export class DefaultFileSystemLayer implements FileSystemLayer {
  constructor(private readonly logger: Logger) {}

  async readFile(filePath: string): Promise<string> {
    this.logger.debug("Read", { path: filePath });
    try {
      return await fs.readFile(filePath, "utf-8");
    } catch (error) {
      const fsError = mapError(error, filePath);
      this.logger.warn("Read failed", {
        path: filePath,
        code: fsError.fsCode,
        error: fsError.message,
      });
      throw fsError;
    }
  }

  async readdir(dirPath: string): Promise<readonly DirEntry[]> {
    try {
      const entries = await fs.readdir(dirPath, { withFileTypes: true });
      const result = await Promise.all(
        entries.map((entry) => {
          const dirEntry: DirEntry = {
            name: entry.name,
            isDirectory: entry.isDirectory(),
            isFile: entry.isFile(),
            isSymbolicLink: entry.isSymbolicLink(),
          };
          return dirEntry.isSymbolicLink ? this.followLink(dirPath, dirEntry) : dirEntry;
        })
      );
      this.logger.debug("Readdir", { path: dirPath, count: result.length });
      return result;
    } catch (error) {
      const fsError = mapError(error, dirPath);
      const context = { path: dirPath, code: fsError.fsCode, error: fsError.message };
      // ENOENT is routine when probing font directories
      if (fsError.fsCode === "ENOENT") {
        this.logger.debug("Readdir failed", context);
      } else {
        this.logger.warn("Readdir failed", context);
      }
      throw fsError;
    }
  }

  /**
   * Take the file type of a symlink from its target.
   * A link whose target cannot be read stays neither file nor directory.
   */
  private async followLink(dirPath: string, entry: DirEntry): Promise<DirEntry> {
    const linkPath = join(dirPath, entry.name);
    try {
      const stats = await fs.stat(linkPath);
      return { ...entry, isDirectory: stats.isDirectory(), isFile: stats.isFile() };
    } catch (error) {
      const fsError = mapError(error, linkPath);
      const context = { path: linkPath, code: fsError.fsCode, error: fsError.message };
      if (fsError.fsCode === "ENOENT") {
        this.logger.debug("Dangling symlink", context);
      } else {
        this.logger.warn("Symlink target unreadable", context);
      }
      return entry;
    }
  }
}
