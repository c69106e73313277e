import * as XLSX from "xlsx";
import type { CellValue, WorkbookRow } from "../analysis.types";

export function operationalRow(overrides: WorkbookRow = {}): WorkbookRow {
  return {
    Flock: "F1",
    Date: "2024-01-01",
    "Animal Mortality": 2,
    "Animals Culled": 0,
    "Table Eggs Prod": 950,
    "Animal Feed Formula Name": "Layer Mash",
    "Supplied Feed": "Yes",
    "Feed Received (Kg)": 500,
    "Animal Feed Consumed": 480,
    "Water Consumption": 900,
    "Female Feed Formula ID": "FF-1",
    "Temperature Low": 18,
    "Ammonia Level": 5,
    "Animal Feed Inventory": 1200,
    "Female Feed Type ID": "T-2",
    "Light_Duration (HU)": 16,
    "Light intensity %": 80,
    ...overrides,
  };
}

export function careRow(overrides: WorkbookRow = {}): WorkbookRow {
  return {
    Flock: "F1",
    Date: "2024-01-02",
    Vaccination: "ND Clone",
    "Creation User ID": "u-1",
    Medication: "Amoxicillin",
    "Vacc Method": "Drinking water",
    "Vacc Type": "Live",
    VaccinevDoze: "1000",
    "Medication Batch": "B-7",
    "Concentration %": 10,
    "Record Source Type": "Manual",
    "Medication Dose": "5ml",
    "Medication Exp Date": "2025-06-30",
    "Doctor Name": "Dr. Test",
    "Doses Unit": "ml",
    "Produced PS_Nest_HE": 0,
    "Vaccine Name": "ND",
    ...overrides,
  };
}

/** Union of the row keys in first-seen order. */
export function columnsOf(rows: WorkbookRow[]): string[] {
  const columns: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!columns.includes(key)) columns.push(key);
    }
  }
  return columns;
}

export function buildWorkbook(matrix: CellValue[][], bookType: XLSX.BookType = "xlsx"): Buffer {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(matrix), "Records");
  const out: Buffer = XLSX.write(workbook, { type: "buffer", bookType });
  return out;
}

export function buildWorkbookFromRows(rows: WorkbookRow[]): Buffer {
  const columns = columnsOf(rows);
  return buildWorkbook([
    columns,
    ...rows.map((row) => columns.map((column) => row[column] ?? null)),
  ]);
}
