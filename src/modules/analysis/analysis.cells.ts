// src/modules/analysis/analysis.cells.ts
// Cell-level predicates shared by classification, validation and duplicate detection.

import type { CellValue, OutputValue } from "./analysis.types";

const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const PLACEHOLDER_TEXT = new Set(["", "0", "nan", "NaN"]);

export function isMissing(value: CellValue): boolean {
  return value === null || (typeof value === "number" && Number.isNaN(value));
}

export function cellText(value: CellValue): string {
  if (value === null) return "";
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

export function isBlank(value: CellValue): boolean {
  return isMissing(value) || cellText(value).trim() === "";
}

/**
 * Numbers pass through, booleans become 1/0, decimal strings are parsed.
 * Everything else becomes null.
 */
export function toNumeric(value: CellValue): number | null {
  if (typeof value === "number") return Number.isNaN(value) ? null : value;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "string") {
    const trimmed = value.trim();
    return DECIMAL_RE.test(trimmed) ? Number(trimmed) : null;
  }
  return null;
}

/** True when the cell carries an actual reading rather than a zero or placeholder. */
export function hasReading(value: CellValue): boolean {
  if (isMissing(value)) return false;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "boolean") return value;
  return !PLACEHOLDER_TEXT.has(cellText(value).trim());
}

export function isNegative(value: CellValue): boolean {
  return typeof value === "number" && value < 0;
}

/** Identity used when comparing cells for duplicates; 1 and "1" differ. */
export function identityOf(value: CellValue): string {
  if (isMissing(value)) return "null";
  if (value instanceof Date) return `d:${value.toISOString()}`;
  return `${typeof value}:${String(value)}`;
}

export function keyText(value: CellValue, upper: boolean): string {
  if (isMissing(value)) return "";
  const text = cellText(value).trim();
  return upper ? text.toUpperCase() : text;
}

export function toOutputValue(value: CellValue): OutputValue {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (typeof value === "number" && !Number.isFinite(value)) return null;
  return value;
}
