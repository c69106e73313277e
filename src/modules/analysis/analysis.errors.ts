// src/modules/analysis/analysis.errors.ts

import { DomainError } from "@/lib/errors/domain-error";

export class FileRequiredError extends DomainError {
  constructor() {
    super("An Excel file must be uploaded in the 'file' field.", 422, "FILE_REQUIRED");
    this.name = "FileRequiredError";
  }
}

export class UnsupportedFileTypeError extends DomainError {
  constructor(public readonly filename: string) {
    super("Only Excel files allowed.", 400, "UNSUPPORTED_FILE_TYPE");
    this.name = "UnsupportedFileTypeError";
  }
}

export class WorkbookReadError extends DomainError {
  constructor(reason: string) {
    super(`Failed to read Excel file: ${reason}`, 400, "WORKBOOK_UNREADABLE");
    this.name = "WorkbookReadError";
  }
}

export class FileTooLargeError extends DomainError {
  constructor(public readonly limitBytes: number) {
    super(`Uploaded file exceeds ${limitBytes} bytes.`, 413, "FILE_TOO_LARGE");
    this.name = "FileTooLargeError";
  }
}

export class UnexpectedUploadError extends DomainError {
  constructor(message: string) {
    super(message, 400, "UPLOAD_REJECTED");
    this.name = "UnexpectedUploadError";
  }
}
