/**
 * FontLister - enumerates font files in the per-scope font directories.
 *
 * Pure service over PlatformInfo and FileSystemLayer; it never writes to disk.
 */

import type { FileSystemLayer, DirEntry } from "../platform/filesystem";
import type { PlatformInfo } from "../platform/platform-info";
import type { Logger } from "../logging";
import { isFileSystemErrorWithCode } from "../errors";
import { joinFontPath, resolveFontDirectory, resolvePlatform } from "./font-directories";
import { createFontNameMatcher, stripExtension } from "./font-pattern";
import {
  DEFAULT_FONT_NAMES,
  DEFAULT_FONT_SCOPES,
  type FontRecord,
  type FontScope,
  type IFontLister,
  type ItemSource,
  type ListFontsOptions,
  type Platform,
} from "./types";

/**
 * Dependencies for FontLister.
 */
export interface FontListerDeps {
  readonly platformInfo: PlatformInfo;
  readonly fileSystem: FileSystemLayer;
  readonly logger: Logger;
}

function isItemSource<T extends string>(value: T | ItemSource<T>): value is ItemSource<T> {
  // Strings are iterable too; a bare string is a single item, not a list of characters
  return typeof value === "object" && value !== null;
}

function toSource<T extends string>(
  value: T | ItemSource<T> | undefined,
  fallback: readonly T[]
): ItemSource<T> {
  if (value === undefined) {
    return fallback;
  }
  return isItemSource(value) ? value : [value];
}

async function collect<T>(source: ItemSource<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

/**
 * Lists installed font files.
 *
 * @example
 * ```typescript
 * const lister = new FontLister({ platformInfo, fileSystem, logger });
 * const fonts = await lister.list({ names: ["Noto*"], scopes: ["CurrentUser", "AllUsers"] });
 * ```
 */
export class FontLister implements IFontLister {
  private readonly platformInfo: PlatformInfo;
  private readonly fileSystem: FileSystemLayer;
  private readonly logger: Logger;

  constructor(deps: FontListerDeps) {
    this.platformInfo = deps.platformInfo;
    this.fileSystem = deps.fileSystem;
    this.logger = deps.logger;
  }

  async list(options?: ListFontsOptions): Promise<readonly FontRecord[]> {
    const platform = resolvePlatform(this.platformInfo);
    this.logger.debug("Platform resolved", { platform });

    // Patterns are reused for every scope, so they are drained up front
    const patterns = await collect(toSource(options?.names, DEFAULT_FONT_NAMES));
    const matchers = patterns.map((pattern) => ({ pattern, matches: createFontNameMatcher(pattern) }));

    const records: FontRecord[] = [];
    let scopeCount = 0;

    for await (const scope of toSource(options?.scopes, DEFAULT_FONT_SCOPES)) {
      const directory = resolveFontDirectory(platform, scope, this.platformInfo);
      this.logger.debug("Listing scope", { scope, dir: directory });

      const files = await this.listFiles(directory);
      if (files === undefined) {
        // Remaining scopes are not visited
        this.logger.debug("Font directory missing, stopping", { scope, dir: directory });
        break;
      }
      scopeCount++;

      for (const { pattern, matches } of matchers) {
        let matched = 0;
        for (const file of files) {
          if (!matches(file.name)) continue;
          records.push(this.createRecord(platform, directory, file, scope));
          matched++;
        }
        this.logger.silly("Pattern matched", { scope, pattern, count: matched });
      }
    }

    this.logger.info("Fonts listed", { scopes: scopeCount, count: records.length });
    return records;
  }

  /**
   * Regular files directly inside a directory, or undefined if the directory does not exist.
   */
  private async listFiles(directory: string): Promise<readonly DirEntry[] | undefined> {
    try {
      const entries = await this.fileSystem.readdir(directory);
      return entries.filter((entry) => entry.isFile);
    } catch (error) {
      if (isFileSystemErrorWithCode(error, "ENOENT", "ENOTDIR")) {
        return undefined;
      }
      throw error;
    }
  }

  private createRecord(
    platform: Platform,
    directory: string,
    file: DirEntry,
    scope: FontScope
  ): FontRecord {
    return Object.freeze({
      name: stripExtension(file.name),
      path: joinFontPath(platform, directory, file.name),
      scope,
    });
  }
}

/**
 * Create a FontLister instance.
 */
export function createFontLister(deps: FontListerDeps): FontLister {
  return new FontLister(deps);
}
