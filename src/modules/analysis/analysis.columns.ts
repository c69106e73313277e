// src/modules/analysis/analysis.columns.ts
// Column sets derived from the workbook layout in analysis.columns.json.

import layout from "./analysis.columns.json";

export const REQUIRED_OPERATIONAL_COLUMNS: readonly string[] =
  layout.operational.required;
export const OPTIONAL_OPERATIONAL_COLUMNS: readonly string[] =
  layout.operational.optional;
export const IDENTITY_COLUMNS: readonly string[] = layout.operational.identity;
export const REQUIRED_CARE_COLUMNS: readonly string[] = layout.care.required;
export const TREATMENT_COLUMNS: readonly string[] = layout.care.treatment;

export interface KeyColumn {
  column: string;
  upper: boolean;
}

export const CARE_DUPLICATE_KEY: readonly KeyColumn[] = layout.care.duplicateKey;

/** Operational columns that decide classification and are validated per row. */
export const CHECKED_OPERATIONAL_COLUMNS: readonly string[] =
  REQUIRED_OPERATIONAL_COLUMNS.filter(
    (col) =>
      !OPTIONAL_OPERATIONAL_COLUMNS.includes(col) &&
      !IDENTITY_COLUMNS.includes(col),
  );

/** Checked columns holding measurements; coerced to numbers before analysis. */
export const NUMERIC_OPERATIONAL_COLUMNS: readonly string[] =
  CHECKED_OPERATIONAL_COLUMNS.filter(
    (col) => !layout.operational.text.includes(col),
  );

export const CHECKED_CARE_COLUMNS: readonly string[] =
  REQUIRED_CARE_COLUMNS.filter((col) => !TREATMENT_COLUMNS.includes(col));

export const ALL_REQUIRED_COLUMNS: readonly string[] = Array.from(
  new Set([...REQUIRED_OPERATIONAL_COLUMNS, ...REQUIRED_CARE_COLUMNS]),
);
