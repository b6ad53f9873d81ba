/**
 * Types for installed-font enumeration.
 */

/**
 * Host operating system families that have a font directory map.
 */
export type Platform = "Windows" | "Linux" | "MacOS";

/**
 * Installation tier to search. The value doubles as the display string
 * reported in FontRecord.scope.
 */
export type FontScope = "CurrentUser" | "AllUsers";

export const FONT_SCOPES: readonly FontScope[] = ["CurrentUser", "AllUsers"];

export const DEFAULT_FONT_NAMES: readonly string[] = ["*"];
export const DEFAULT_FONT_SCOPES: readonly FontScope[] = ["CurrentUser"];

export function isFontScope(value: string): value is FontScope {
  return FONT_SCOPES.some((scope) => scope === value);
}

/**
 * Parse a scope name case-insensitively ("allusers" -> "AllUsers").
 */
export function parseFontScope(value: string): FontScope | undefined {
  const normalized = value.trim().toLowerCase();
  return FONT_SCOPES.find((scope) => scope.toLowerCase() === normalized);
}

/**
 * A font file found in a scope's directory.
 */
export interface FontRecord {
  /** File name without its extension */
  readonly name: string;
  /** Font directory joined with the file name */
  readonly path: string;
  /** Scope the file was found under */
  readonly scope: FontScope;
}

/**
 * Input that can be given as a whole or produced one item at a time.
 */
export type ItemSource<T> = Iterable<T> | AsyncIterable<T>;

/**
 * Options for FontLister.list().
 */
export interface ListFontsOptions {
  /** Glob-style file name patterns. Default: ["*"] */
  readonly names?: string | ItemSource<string>;
  /** Scopes to search, in order. Default: ["CurrentUser"] */
  readonly scopes?: FontScope | ItemSource<FontScope>;
}

/**
 * Interface for listing installed fonts.
 */
export interface IFontLister {
  /**
   * List font files per scope and pattern.
   *
   * Records are ordered by scope, then pattern, then directory listing order.
   * A file matching several patterns is listed once per pattern.
   * If a scope's directory does not exist, listing stops and the records
   * collected for earlier scopes are returned.
   *
   * @throws FontListError with code UNSUPPORTED_PLATFORM if the host OS has no directory map
   * @throws FileSystemError if a directory exists but cannot be read
   */
  list(options?: ListFontsOptions): Promise<readonly FontRecord[]>;
}
