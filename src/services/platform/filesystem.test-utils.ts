/**
 * Test utilities for FileSystemLayer mocking.
 *
 * Provides mock factories for FileSystemLayer to enable easy unit testing of consumers.
 */

import { vi, type Mock } from "vitest";
import type { FileSystemLayer, DirEntry } from "./filesystem";
import { FileSystemError } from "../errors";

// ============================================================================
// Mock Option Types
// ============================================================================

/**
 * Options for mock readFile method.
 */
export interface MockReadFileOptions {
  /** Content to return */
  readonly content?: string;
  /** Error to throw */
  readonly error?: FileSystemError;
  /** Custom implementation */
  readonly implementation?: (path: string) => Promise<string>;
}

/**
 * Options for mock readdir method.
 */
export interface MockReaddirOptions {
  /** Entries to return */
  readonly entries?: readonly DirEntry[];
  /** Error to throw */
  readonly error?: FileSystemError;
  /** Custom implementation */
  readonly implementation?: (path: string) => Promise<readonly DirEntry[]>;
}

/**
 * Options for creating a mock FileSystemLayer.
 */
export interface MockFileSystemLayerOptions {
  /** Mock readFile: return content or throw error */
  readonly readFile?: MockReadFileOptions;
  /** Mock readdir: return entries or throw error */
  readonly readdir?: MockReaddirOptions;
}

// ============================================================================
// Mock FileSystemLayer Factory
// ============================================================================

/**
 * Create mock FileSystemLayer for testing.
 *
 * @example Basic usage - empty directories, empty files
 * const mockFs = createMockFileSystemLayer();
 *
 * @example Return specific file content
 * const mockFs = createMockFileSystemLayer({
 *   readFile: { content: '{"format": "json"}' }
 * });
 *
 * @example Throw specific error
 * const mockFs = createMockFileSystemLayer({
 *   readdir: { error: new FileSystemError('ENOENT', '/path', 'Not found') }
 * });
 */
export function createMockFileSystemLayer(options?: MockFileSystemLayerOptions): FileSystemLayer {
  return {
    async readFile(path: string): Promise<string> {
      if (options?.readFile?.implementation) {
        return options.readFile.implementation(path);
      }
      if (options?.readFile?.error) {
        throw options.readFile.error;
      }
      return options?.readFile?.content ?? "";
    },

    async readdir(path: string): Promise<readonly DirEntry[]> {
      if (options?.readdir?.implementation) {
        return options.readdir.implementation(path);
      }
      if (options?.readdir?.error) {
        throw options.readdir.error;
      }
      return options?.readdir?.entries ?? [];
    },
  };
}

/**
 * Create a FileSystemLayer backed by an in-memory directory table.
 * Directories not in the table fail with ENOENT, like a missing path on disk.
 *
 * @example
 * ```typescript
 * const fs = createDirectoryFileSystemLayer({
 *   "/home/test/.local/share/fonts": [createDirEntry("Arial.ttf")],
 * });
 * ```
 */
export function createDirectoryFileSystemLayer(
  directories: Readonly<Record<string, readonly DirEntry[]>>,
  files: Readonly<Record<string, string>> = {}
): FileSystemLayer {
  return createMockFileSystemLayer({
    readFile: {
      implementation: async (path) => {
        const content = files[path];
        if (content === undefined) {
          throw new FileSystemError("ENOENT", path, `ENOENT: no such file, open '${path}'`);
        }
        return content;
      },
    },
    readdir: {
      implementation: async (path) => {
        const entries = directories[path];
        if (entries === undefined) {
          throw new FileSystemError("ENOENT", path, `ENOENT: no such directory, scandir '${path}'`);
        }
        return entries;
      },
    },
  });
}

// ============================================================================
// Spy FileSystemLayer Factory
// ============================================================================

/**
 * FileSystemLayer with vi.fn() spies for asserting on method calls.
 */
export interface SpyFileSystemLayer extends FileSystemLayer {
  readFile: Mock<FileSystemLayer["readFile"]>;
  readdir: Mock<FileSystemLayer["readdir"]>;
}

/**
 * Wrap a FileSystemLayer with vi.fn() spies.
 * Use when you need to assert on method calls.
 *
 * @example
 * ```typescript
 * const fs = createSpyFileSystemLayer(createDirectoryFileSystemLayer({ "/fonts": [] }));
 * await lister.list();
 * expect(fs.readdir).toHaveBeenCalledWith("/fonts");
 * ```
 */
export function createSpyFileSystemLayer(
  inner: FileSystemLayer = createMockFileSystemLayer()
): SpyFileSystemLayer {
  return {
    readFile: vi.fn((path: string) => inner.readFile(path)),
    readdir: vi.fn((path: string) => inner.readdir(path)),
  };
}

// ============================================================================
// Helper Functions for Creating Common Test Scenarios
// ============================================================================

/**
 * Create a DirEntry for testing.
 *
 * @example File entry
 * createDirEntry('Arial.ttf')
 *
 * @example Directory entry
 * createDirEntry('truetype', { isDirectory: true })
 *
 * @example Symlink entry
 * createDirEntry('link.ttf', { isSymbolicLink: true })
 */
export function createDirEntry(
  name: string,
  options?: {
    isDirectory?: boolean;
    isFile?: boolean;
    isSymbolicLink?: boolean;
  }
): DirEntry {
  return {
    name,
    isDirectory: options?.isDirectory ?? false,
    // isFile defaults to true only when both isDirectory and isSymbolicLink are falsy
    isFile: options?.isFile ?? (!options?.isDirectory && !options?.isSymbolicLink),
    isSymbolicLink: options?.isSymbolicLink ?? false,
  };
}
