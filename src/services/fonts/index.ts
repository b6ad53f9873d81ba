export { FontLister, createFontLister } from "./font-lister";
export type { FontListerDeps } from "./font-lister";
export {
  FONT_DIRECTORY_MAP,
  joinFontPath,
  resolveFontDirectory,
  resolvePlatform,
} from "./font-directories";
export { createFontNameMatcher, stripExtension } from "./font-pattern";
export type { FontNameMatcher } from "./font-pattern";
export {
  DEFAULT_FONT_NAMES,
  DEFAULT_FONT_SCOPES,
  FONT_SCOPES,
  isFontScope,
  parseFontScope,
} from "./types";
export type {
  FontRecord,
  FontScope,
  IFontLister,
  ItemSource,
  ListFontsOptions,
  Platform,
} from "./types";
