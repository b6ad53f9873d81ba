/**
 * Configuration types for the font lister.
 *
 * The optional config.json supplies defaults for the command line when no
 * patterns or scopes are passed.
 */

import { z } from "zod";
import { DEFAULT_FONT_NAMES, DEFAULT_FONT_SCOPES, type FontScope } from "../fonts/types";

/**
 * How the command line prints records.
 */
export type OutputFormat = "table" | "json";

/**
 * Effective configuration after defaults are applied.
 */
export interface FontListerConfig {
  /** Patterns used when none are given on the command line */
  readonly names: readonly string[];
  /** Scopes used when none are given on the command line */
  readonly scopes: readonly FontScope[];
  /** Output format used unless --json is given */
  readonly format: OutputFormat;
}

/**
 * Schema of config.json. Every field is optional; unknown fields are rejected.
 */
export const ConfigFileSchema = z
  .object({
    names: z.array(z.string()).optional(),
    scopes: z.array(z.enum(["CurrentUser", "AllUsers"])).optional(),
    format: z.enum(["table", "json"]).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export const DEFAULT_CONFIG: FontListerConfig = {
  names: DEFAULT_FONT_NAMES,
  scopes: DEFAULT_FONT_SCOPES,
  format: "table",
};
