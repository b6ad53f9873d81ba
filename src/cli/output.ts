/**
 * Record formatting for the command line.
 */

import type { FontRecord } from "../services/fonts/types";
import type { OutputFormat } from "../services/config/types";

const COLUMN_GAP = "  ";

/**
 * Format records as a table with Name, Scope and Path columns.
 * No records produce an empty string.
 */
export function formatTable(records: readonly FontRecord[]): string {
  if (records.length === 0) {
    return "";
  }

  const nameWidth = records.reduce((width, r) => Math.max(width, r.name.length), "Name".length);
  const scopeWidth = records.reduce((width, r) => Math.max(width, r.scope.length), "Scope".length);
  const row = (name: string, scope: string, path: string): string =>
    `${name.padEnd(nameWidth)}${COLUMN_GAP}${scope.padEnd(scopeWidth)}${COLUMN_GAP}${path}`;

  const lines = [
    row("Name", "Scope", "Path"),
    row("----", "-----", "----"),
    ...records.map((r) => row(r.name, r.scope, r.path)),
  ];
  return lines.join("\n") + "\n";
}

/**
 * Format records as a pretty-printed JSON array.
 */
export function formatJson(records: readonly FontRecord[]): string {
  return JSON.stringify(records, null, 2) + "\n";
}

export function formatRecords(records: readonly FontRecord[], format: OutputFormat): string {
  return format === "json" ? formatJson(records) : formatTable(records);
}
