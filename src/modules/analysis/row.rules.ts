// src/modules/analysis/row.rules.ts
// Per-row classification and validation rules.

import type { WorkbookRow } from "./analysis.types";
import {
  CHECKED_CARE_COLUMNS,
  CHECKED_OPERATIONAL_COLUMNS,
  IDENTITY_COLUMNS,
} from "./analysis.columns";
import { cellText, hasReading, isBlank, isNegative } from "./analysis.cells";

export const VACCINATION_ONLY_NOTE =
  "Note: Only vaccination recorded, no medication data entered.";
export const MEDICATION_ONLY_NOTE =
  "Note: Only medication recorded, no vaccination data entered.";

export interface CareCheck {
  errors: string[];
  note: string;
}

function cell(row: WorkbookRow, column: string) {
  return row[column] ?? null;
}

/**
 * A row is operational as soon as one production column carries a reading.
 * Flock, Date and the optional weight/uniformity columns never decide it.
 */
export function isOperationalRow(row: WorkbookRow): boolean {
  return CHECKED_OPERATIONAL_COLUMNS.some((column) => hasReading(cell(row, column)));
}

export function checkOperationalRow(row: WorkbookRow): string[] {
  const errors: string[] = [];

  for (const column of CHECKED_OPERATIONAL_COLUMNS) {
    const value = cell(row, column);
    if (isBlank(value)) {
      errors.push(`Missing ${column}`);
    } else if (isNegative(value)) {
      errors.push(`Negative value in ${column}`);
    }
  }

  for (const column of IDENTITY_COLUMNS) {
    if (isBlank(cell(row, column))) {
      errors.push(`Missing ${column}`);
    }
  }

  return errors;
}

export function checkCareRow(row: WorkbookRow): CareCheck {
  const errors: string[] = [];
  let note = "";

  const vaccination = isBlank(cell(row, "Vaccination"))
    ? ""
    : cellText(cell(row, "Vaccination")).trim();
  const medication = isBlank(cell(row, "Medication"))
    ? ""
    : cellText(cell(row, "Medication")).trim();

  if (vaccination === "" && medication === "") {
    errors.push("Missing Vaccination and Medication");
  } else if (medication === "") {
    note = VACCINATION_ONLY_NOTE;
  } else if (vaccination === "") {
    note = MEDICATION_ONLY_NOTE;
  }

  for (const column of CHECKED_CARE_COLUMNS) {
    if (isBlank(cell(row, column))) {
      errors.push(`Missing ${column}`);
    }
  }

  return { errors, note };
}
