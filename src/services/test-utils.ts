/**
 * Test utilities for service tests.
 * These helpers create temporary directories with automatic cleanup.
 */

import { mkdtemp, rm, realpath, mkdir, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join } from "path";

/**
 * Create a temporary directory with automatic cleanup.
 * Uses realpath to resolve Windows 8.3 short paths (e.g., RUNNER~1 -> runneradmin).
 * @returns Object with path and cleanup function
 */
export async function createTempDir(): Promise<{
  path: string;
  cleanup: () => Promise<void>;
}> {
  const tempPath = await mkdtemp(join(tmpdir(), "font-lister-test-"));
  // Resolve to canonical path so path comparisons in tests match
  const resolvedPath = await realpath(tempPath);
  return {
    path: resolvedPath,
    cleanup: async () => {
      await rm(resolvedPath, {
        recursive: true,
        force: true,
        maxRetries: 5,
        retryDelay: 200,
      });
    },
  };
}

/**
 * Create empty placeholder font files (and their parent directories) below a root.
 *
 * @param root - Directory to create the files in
 * @param relativePaths - File paths relative to root, e.g. "Arial.ttf" or "truetype/Nested.ttf"
 */
export async function createFontFiles(root: string, relativePaths: readonly string[]): Promise<void> {
  for (const relativePath of relativePaths) {
    const filePath = join(root, relativePath);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, "");
  }
}
