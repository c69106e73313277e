// src/modules/analysis/analysis.types.ts

export type CellValue = string | number | boolean | Date | null;

export type WorkbookRow = Record<string, CellValue>;

export interface ParsedSheet {
  sheetName: string;
  columns: string[];
  rows: WorkbookRow[];
}

export type OutputValue = string | number | boolean | null;

export type AnalyzedRecord = Record<string, OutputValue> & {
  "Duplicate Error": boolean;
  "Error Details": string | null;
  has_error: boolean;
};

export type AnalyzedCareRecord = AnalyzedRecord & {
  note: string;
};

export interface AnalysisResult {
  operational_data: AnalyzedRecord[];
  care_data: AnalyzedCareRecord[];
}
