// src/modules/analysis/workbook.reader.ts
// Reads the first sheet of an .xls/.xlsx buffer; the first row is the header.

import * as XLSX from "xlsx";
import type { CellValue, ParsedSheet, WorkbookRow } from "./analysis.types";
import { WorkbookReadError } from "./analysis.errors";

// xlsx is a ZIP container, legacy xls an OLE2 compound document.
const WORKBOOK_SIGNATURES: readonly (readonly number[])[] = [
  [0x50, 0x4b, 0x03, 0x04],
  [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1],
];

export function hasWorkbookSignature(buffer: Buffer): boolean {
  return WORKBOOK_SIGNATURES.some(
    (signature) =>
      buffer.length >= signature.length &&
      signature.every((byte, index) => buffer[index] === byte),
  );
}

/**
 * Date cells are built in the process timezone; keep their wall-clock
 * reading and express it in UTC so output does not depend on TZ.
 */
export function wallClockToUtc(date: Date): Date {
  return new Date(
    Date.UTC(
      date.getFullYear(),
      date.getMonth(),
      date.getDate(),
      date.getHours(),
      date.getMinutes(),
      date.getSeconds(),
      date.getMilliseconds(),
    ),
  );
}

function toCellValue(raw: unknown): CellValue {
  if (raw === null || raw === undefined) return null;
  if (raw instanceof Date) return wallClockToUtc(raw);
  if (typeof raw === "string" || typeof raw === "number" || typeof raw === "boolean") {
    return raw;
  }
  return String(raw);
}

/**
 * Header names are trimmed. Blank headers become `Unnamed: <index>` and
 * repeated names get a `.1`, `.2` suffix so no column is lost.
 */
export function normalizeHeader(rawHeader: readonly unknown[]): string[] {
  const seen = new Map<string, number>();

  return rawHeader.map((cell, index) => {
    const text = cell === null || cell === undefined ? "" : String(cell).trim();
    const base = text === "" ? `Unnamed: ${index}` : text;

    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}.${count}`;
  });
}

export function readWorkbook(buffer: Buffer): ParsedSheet {
  if (buffer.length === 0) {
    throw new WorkbookReadError("file is empty");
  }
  if (!hasWorkbookSignature(buffer)) {
    throw new WorkbookReadError("not an .xls or .xlsx workbook");
  }

  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(buffer, { type: "buffer", cellDates: true });
  } catch (err) {
    throw new WorkbookReadError(err instanceof Error ? err.message : String(err));
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (sheetName === undefined || sheet === undefined) {
    throw new WorkbookReadError("workbook contains no sheets");
  }

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    raw: true,
    blankrows: false,
  });

  const [headerRow, ...body] = matrix;
  if (headerRow === undefined) {
    return { sheetName, columns: [], rows: [] };
  }

  const columns = normalizeHeader(headerRow);
  const rows = body.map((cells) => {
    const row: WorkbookRow = {};
    columns.forEach((column, index) => {
      row[column] = toCellValue(cells[index]);
    });
    return row;
  });

  return { sheetName, columns, rows };
}
