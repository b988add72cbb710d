// src/errors.ts
import { REQUIRED_FIELDS } from "./rawRow";

export type RowErrorKind = "missing_field" | "invalid_date" | "unknown_diet_type" | "not_numeric";

/**
 * The source as a whole lacks a mandatory field (CSV header or any JSON object).
 */
export class InvalidSourceError extends Error {
  readonly format: string;

  constructor(format: string, message?: string) {
    super(message ?? `Invalid ${format} format. Required fields: ${REQUIRED_FIELDS.join(", ")}`);
    this.name = "InvalidSourceError";
    this.format = format;
  }
}

/**
 * One row could not be converted. rowIndex is 0-based and only set when the row
 * came from a batch.
 */
export class RowConversionError extends Error {
  readonly kind: RowErrorKind;
  readonly field: string;
  readonly rowIndex: number | null;

  constructor(kind: RowErrorKind, field: string, message: string, rowIndex: number | null = null) {
    super(rowIndex === null ? message : `Row ${rowIndex + 1}: ${message}`);
    this.name = "RowConversionError";
    this.kind = kind;
    this.field = field;
    this.rowIndex = rowIndex;
  }

  atRow(rowIndex: number): RowConversionError {
    const base = this.rowIndex === null ? this.message : this.message.replace(/^Row \d+: /, "");
    return new RowConversionError(this.kind, this.field, base, rowIndex);
  }
}

export class UnsupportedFormatError extends Error {
  readonly filePath: string;

  constructor(filePath: string, reason = "Unsupported file format") {
    super(`${reason}: ${filePath}`);
    this.name = "UnsupportedFormatError";
    this.filePath = filePath;
  }
}
