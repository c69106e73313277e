// src/modules/analysis/analysis.service.ts
// Splits workbook rows into operational and care records and annotates each with its errors.

import type {
  AnalysisResult,
  AnalyzedCareRecord,
  AnalyzedRecord,
  OutputValue,
  ParsedSheet,
  WorkbookRow,
} from "./analysis.types";
import {
  ALL_REQUIRED_COLUMNS,
  CARE_DUPLICATE_KEY,
  IDENTITY_COLUMNS,
  NUMERIC_OPERATIONAL_COLUMNS,
} from "./analysis.columns";
import { toNumeric, toOutputValue } from "./analysis.cells";
import { checkCareRow, checkOperationalRow, isOperationalRow } from "./row.rules";
import { exactKey, flagDuplicates, normalizedKey } from "./duplicates";
import { readWorkbook } from "./workbook.reader";

export const OPERATIONAL_DUPLICATE_ERROR = "Duplicate Flock/Date";
export const CARE_DUPLICATE_ERROR = "Duplicate Flock/Date/Vaccination/Medication";

/**
 * Appends required columns the sheet lacks (as nulls) and coerces the
 * numeric operational columns.
 */
export function prepareRows(sheet: ParsedSheet): { columns: string[]; rows: WorkbookRow[] } {
  const columns = [
    ...sheet.columns,
    ...ALL_REQUIRED_COLUMNS.filter((col) => !sheet.columns.includes(col)),
  ];

  const rows = sheet.rows.map((source) => {
    const row: WorkbookRow = {};
    for (const column of columns) {
      row[column] = source[column] ?? null;
    }
    for (const column of NUMERIC_OPERATIONAL_COLUMNS) {
      row[column] = toNumeric(row[column] ?? null);
    }
    return row;
  });

  return { columns, rows };
}

function joinErrors(errors: string[]): string | null {
  return errors.length > 0 ? errors.join("; ") : null;
}

function project(row: WorkbookRow, columns: readonly string[]): Record<string, OutputValue> {
  const out: Record<string, OutputValue> = {};
  for (const column of columns) {
    out[column] = toOutputValue(row[column] ?? null);
  }
  return out;
}

export function analyzeSheet(sheet: ParsedSheet): AnalysisResult {
  const { columns, rows } = prepareRows(sheet);

  const operationalRows = rows.filter((row) => isOperationalRow(row));
  const careRows = rows.filter((row) => !isOperationalRow(row));

  const operationalDuplicates = flagDuplicates(operationalRows, exactKey(IDENTITY_COLUMNS));
  const careDuplicates = flagDuplicates(careRows, normalizedKey(CARE_DUPLICATE_KEY));

  const operational_data = operationalRows.map((row, index): AnalyzedRecord => {
    const duplicate = operationalDuplicates[index] ?? false;
    const errors = checkOperationalRow(row);
    if (duplicate) errors.push(OPERATIONAL_DUPLICATE_ERROR);

    return {
      ...project(row, columns),
      "Duplicate Error": duplicate,
      "Error Details": joinErrors(errors),
      has_error: errors.length > 0,
    };
  });

  const care_data = careRows.map((row, index): AnalyzedCareRecord => {
    const duplicate = careDuplicates[index] ?? false;
    const { errors, note } = checkCareRow(row);
    if (duplicate) errors.push(CARE_DUPLICATE_ERROR);

    return {
      ...project(row, columns),
      "Duplicate Error": duplicate,
      "Error Details": joinErrors(errors),
      note,
      has_error: errors.length > 0,
    };
  });

  return { operational_data, care_data };
}

export class AnalysisService {
  analyzeWorkbook(buffer: Buffer): AnalysisResult {
    return analyzeSheet(readWorkbook(buffer));
  }
}
