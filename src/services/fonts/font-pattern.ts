/**
 * Case-insensitive wildcard matching of font file names.
 *
 * Patterns are wildcards (`*`, `?`, `[...]`) matched with minimatch. Every
 * other character is literal: no brace or extglob expansion, and a leading
 * `#` or `!` is part of the name.
 */

import { posix } from "node:path";
import { Minimatch, type MinimatchOptions } from "minimatch";

/**
 * Predicate telling whether a file name matches a pattern.
 */
export type FontNameMatcher = (fileName: string) => boolean;

const MATCH_OPTIONS: MinimatchOptions = {
  nocase: true,
  dot: true,
  nocomment: true,
  nonegate: true,
  nobrace: true,
  noext: true,
};

/**
 * File name without its last extension ("Arial-Bold.ttf" -> "Arial-Bold").
 * Dotfiles keep their name (".fonts.conf" -> ".fonts").
 */
export function stripExtension(fileName: string): string {
  return posix.parse(fileName).name;
}

/**
 * Create a matcher for one pattern.
 *
 * A file matches when the pattern matches its full name or its name without
 * extension, so both `Arial*.ttf` and `Arial` select `Arial.ttf`.
 * An empty pattern matches nothing.
 */
export function createFontNameMatcher(pattern: string): FontNameMatcher {
  const matcher = new Minimatch(pattern, MATCH_OPTIONS);

  return (fileName: string): boolean => {
    if (matcher.match(fileName)) {
      return true;
    }
    const stem = stripExtension(fileName);
    return stem !== fileName && matcher.match(stem);
  };
}
