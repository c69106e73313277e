// src/modules/analysis/duplicates.ts

import type { WorkbookRow } from "./analysis.types";
import type { KeyColumn } from "./analysis.columns";
import { identityOf, keyText } from "./analysis.cells";

/**
 * Marks every row whose key occurs more than once, first occurrence included.
 */
export function flagDuplicates<T>(items: readonly T[], keyOf: (item: T) => string): boolean[] {
  const counts = new Map<string, number>();
  const keys = items.map(keyOf);

  for (const key of keys) {
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  return keys.map((key) => (counts.get(key) ?? 0) > 1);
}

export function exactKey(columns: readonly string[]) {
  return (row: WorkbookRow): string =>
    JSON.stringify(columns.map((column) => identityOf(row[column] ?? null)));
}

/** Trimmed text key; selected parts are compared case-insensitively. */
export function normalizedKey(columns: readonly KeyColumn[]) {
  return (row: WorkbookRow): string =>
    JSON.stringify(
      columns.map(({ column, upper }) => keyText(row[column] ?? null, upper)),
    );
}
