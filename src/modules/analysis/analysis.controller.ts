// src/modules/analysis/analysis.controller.ts

import type { Request, Response } from "express";
import { AnalysisService } from "./analysis.service";
import { FileRequiredError, UnsupportedFileTypeError } from "./analysis.errors";
import { log } from "@/lib/observability/logger";

const EXCEL_EXTENSIONS = [".xls", ".xlsx"];

const analysisService = new AnalysisService();

export function isExcelFilename(filename: string): boolean {
  const lower = filename.toLowerCase();
  return EXCEL_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

/**
 * POST /analyze
 * multipart/form-data, field `file`
 */
export function handleAnalyze(req: Request, res: Response) {
  const file = req.file;
  if (!file) {
    throw new FileRequiredError();
  }

  if (!isExcelFilename(file.originalname)) {
    throw new UnsupportedFileTypeError(file.originalname);
  }

  const result = analysisService.analyzeWorkbook(file.buffer);

  log("INFO", "WORKBOOK_ANALYZED", {
    filename: file.originalname,
    sizeBytes: file.size,
    operationalRows: result.operational_data.length,
    careRows: result.care_data.length,
    operationalErrors: result.operational_data.filter((r) => r.has_error).length,
    careErrors: result.care_data.filter((r) => r.has_error).length,
  });

  return res.status(200).json(result);
}
