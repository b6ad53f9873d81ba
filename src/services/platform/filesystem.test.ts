// @vitest-environment node
/**
 * Unit tests for DefaultFileSystemLayer logging.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { symlink, writeFile as nodeWriteFile } from "node:fs/promises";
import { DefaultFileSystemLayer } from "./filesystem";
import { createMockLogger, type MockLogger } from "../logging/logging.test-utils";
import { createTempDir } from "../test-utils";

describe("DefaultFileSystemLayer logging", () => {
  let logger: MockLogger;
  let fs: DefaultFileSystemLayer;
  let tempDir: { path: string; cleanup: () => Promise<void> };

  beforeEach(async () => {
    logger = createMockLogger();
    fs = new DefaultFileSystemLayer(logger);
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await tempDir.cleanup();
  });

  it("logs the entry count of a listed directory", async () => {
    await nodeWriteFile(join(tempDir.path, "Arial.ttf"), "");

    await fs.readdir(tempDir.path);

    expect(logger.debug).toHaveBeenCalledWith("Readdir", { path: tempDir.path, count: 1 });
  });

  it("logs a missing directory at debug level", async () => {
    const dirPath = join(tempDir.path, "missing");

    await expect(fs.readdir(dirPath)).rejects.toThrow();

    expect(logger.debug).toHaveBeenCalledWith(
      "Readdir failed",
      expect.objectContaining({ path: dirPath, code: "ENOENT" })
    );
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("logs other readdir failures at warn level", async () => {
    const filePath = join(tempDir.path, "Arial.ttf");
    await nodeWriteFile(filePath, "");

    await expect(fs.readdir(filePath)).rejects.toThrow();

    expect(logger.warn).toHaveBeenCalledWith(
      "Readdir failed",
      expect.objectContaining({ path: filePath, code: "ENOTDIR" })
    );
  });

  it.skipIf(process.platform === "win32")("logs a dangling symlink at debug level", async () => {
    const linkPath = join(tempDir.path, "Dangling.ttf");
    await symlink(join(tempDir.path, "Gone.ttf"), linkPath);

    await fs.readdir(tempDir.path);

    expect(logger.debug).toHaveBeenCalledWith(
      "Dangling symlink",
      expect.objectContaining({ path: linkPath, code: "ENOENT" })
    );
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it.skipIf(process.platform === "win32")("logs a symlink loop at warn level", async () => {
    const first = join(tempDir.path, "First.ttf");
    const second = join(tempDir.path, "Second.ttf");
    await symlink(second, first);
    await symlink(first, second);

    const entries = await fs.readdir(tempDir.path);

    expect(entries.filter((e) => e.isFile)).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      "Symlink target unreadable",
      expect.objectContaining({ path: first, code: "UNKNOWN" })
    );
  });

  it("logs failed reads at warn level", async () => {
    const filePath = join(tempDir.path, "config.json");

    await expect(fs.readFile(filePath)).rejects.toThrow();

    expect(logger.warn).toHaveBeenCalledWith(
      "Read failed",
      expect.objectContaining({ path: filePath, code: "ENOENT" })
    );
  });
});
