// @vitest-environment node
/**
 * Boundary tests for DefaultFileSystemLayer.
 * Tests filesystem operations against real filesystem with temp directories.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { symlink, writeFile as nodeWriteFile, mkdir as nodeMkdir } from "node:fs/promises";
import { DefaultFileSystemLayer } from "./filesystem";
import { FileSystemError } from "../errors";
import { createSilentLogger } from "../logging";
import { createTempDir } from "../test-utils";

describe("DefaultFileSystemLayer", () => {
  let fs: DefaultFileSystemLayer;
  let tempDir: { path: string; cleanup: () => Promise<void> };

  beforeEach(async () => {
    fs = new DefaultFileSystemLayer(createSilentLogger());
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await tempDir.cleanup();
  });

  describe("readFile", () => {
    it("reads UTF-8 content", async () => {
      const filePath = join(tempDir.path, "config.json");
      await nodeWriteFile(filePath, '{"names":["Noto*"]} 世界', "utf-8");

      const content = await fs.readFile(filePath);

      expect(content).toBe('{"names":["Noto*"]} 世界');
    });

    it("throws ENOENT for non-existent file", async () => {
      const filePath = join(tempDir.path, "non-existent.json");

      const error = await fs.readFile(filePath).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FileSystemError);
      expect((error as FileSystemError).fsCode).toBe("ENOENT");
      expect((error as FileSystemError).path).toBe(filePath);
    });

    it("throws EISDIR when reading a directory", async () => {
      const dirPath = join(tempDir.path, "fonts");
      await nodeMkdir(dirPath);

      const error = await fs.readFile(dirPath).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FileSystemError);
      expect((error as FileSystemError).fsCode).toBe("EISDIR");
    });
  });

  describe("readdir", () => {
    it("returns entries with type information", async () => {
      await nodeWriteFile(join(tempDir.path, "Arial.ttf"), "");
      await nodeMkdir(join(tempDir.path, "truetype"));

      const entries = await fs.readdir(tempDir.path);
      const sorted = [...entries].sort((a, b) => a.name.localeCompare(b.name));

      expect(sorted).toEqual([
        { name: "Arial.ttf", isDirectory: false, isFile: true, isSymbolicLink: false },
        { name: "truetype", isDirectory: true, isFile: false, isSymbolicLink: false },
      ]);
    });

    it("does not descend into subdirectories", async () => {
      await nodeMkdir(join(tempDir.path, "truetype"));
      await nodeWriteFile(join(tempDir.path, "truetype", "Nested.ttf"), "");

      const entries = await fs.readdir(tempDir.path);

      expect(entries.map((e) => e.name)).toEqual(["truetype"]);
    });

    describe.skipIf(process.platform === "win32")("symlinks", () => {
      it("reports a link to a file as a file", async () => {
        await nodeWriteFile(join(tempDir.path, "Real.ttf"), "");
        await symlink(join(tempDir.path, "Real.ttf"), join(tempDir.path, "Link.ttf"));

        const entries = await fs.readdir(tempDir.path);
        const link = entries.find((e) => e.name === "Link.ttf");

        expect(link).toEqual({
          name: "Link.ttf",
          isDirectory: false,
          isFile: true,
          isSymbolicLink: true,
        });
      });

      it("follows relative link targets", async () => {
        await nodeMkdir(join(tempDir.path, "fonts"));
        await nodeWriteFile(join(tempDir.path, "Real.ttf"), "");
        await symlink("../Real.ttf", join(tempDir.path, "fonts", "Linked.ttf"));

        const entries = await fs.readdir(join(tempDir.path, "fonts"));

        expect(entries).toEqual([
          { name: "Linked.ttf", isDirectory: false, isFile: true, isSymbolicLink: true },
        ]);
      });

      it("reports a link to a directory as a directory", async () => {
        await nodeMkdir(join(tempDir.path, "truetype"));
        await symlink(join(tempDir.path, "truetype"), join(tempDir.path, "linked-dir"));

        const entries = await fs.readdir(tempDir.path);
        const link = entries.find((e) => e.name === "linked-dir");

        expect(link).toEqual({
          name: "linked-dir",
          isDirectory: true,
          isFile: false,
          isSymbolicLink: true,
        });
      });

      it("reports a dangling link as neither file nor directory", async () => {
        await symlink(join(tempDir.path, "Gone.ttf"), join(tempDir.path, "Dangling.ttf"));

        const entries = await fs.readdir(tempDir.path);

        expect(entries).toEqual([
          { name: "Dangling.ttf", isDirectory: false, isFile: false, isSymbolicLink: true },
        ]);
      });
    });

    it("throws ENOENT for a missing directory", async () => {
      const dirPath = join(tempDir.path, "missing");

      const error = await fs.readdir(dirPath).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FileSystemError);
      expect((error as FileSystemError).fsCode).toBe("ENOENT");
      expect((error as FileSystemError).path).toBe(dirPath);
    });

    it("throws ENOTDIR when the path is a file", async () => {
      const filePath = join(tempDir.path, "Arial.ttf");
      await nodeWriteFile(filePath, "");

      const error = await fs.readdir(filePath).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FileSystemError);
      expect((error as FileSystemError).fsCode).toBe("ENOTDIR");
    });
  });
});
