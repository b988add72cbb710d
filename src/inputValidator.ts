// src/inputValidator.ts
import fs from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { InvalidSourceError } from "./errors";
import { hasRequiredFields, isPlainObject, RawRow, toRawRow } from "./rawRow";

const IMAGE_EXTENSIONS = new Set([".png", ".jpg", ".jpeg"]);

function parseCsvMatrix(text: string): string[][] {
  const records: unknown = parse(text, {
    bom: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });

  if (!Array.isArray(records)) throw new Error("CSV parser returned no records");
  return records.map((r: unknown) => {
    if (!Array.isArray(r)) throw new Error("CSV parser returned a non-array record");
    return r.map((cell: unknown) => String(cell));
  });
}

/**
 * Only the header row is inspected. Any parse failure counts as invalid.
 */
export function validateCsvText(text: string): boolean {
  try {
    const rows = parseCsvMatrix(text);
    return rows.length > 0 && hasRequiredFields(rows[0]);
  } catch {
    return false;
  }
}

/**
 * Valid when the document is an array and every element is an object with all
 * mandatory keys. One bad element invalidates the whole source.
 */
export function validateJsonText(text: string): boolean {
  try {
    const data: unknown = JSON.parse(text);
    if (!Array.isArray(data)) return false;
    return data.every((item: unknown) => isPlainObject(item) && hasRequiredFields(Object.keys(item)));
  } catch {
    return false;
  }
}

function readTextOrNull(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, "utf8");
  } catch {
    return null;
  }
}

export function validateCsv(filePath: string): boolean {
  const text = readTextOrNull(filePath);
  return text !== null && validateCsvText(text);
}

export function validateJson(filePath: string): boolean {
  const text = readTextOrNull(filePath);
  return text !== null && validateJsonText(text);
}

export function isImagePath(filePath: string): boolean {
  return IMAGE_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

/**
 * Header-keyed rows. A short row still carries every header key; its missing
 * trailing cells are empty strings. Cells beyond the header are dropped.
 */
export function readCsvRows(text: string): RawRow[] {
  const [header, ...lines] = parseCsvMatrix(text);
  if (!header) return [];

  return lines.map((cells) => {
    const row: Record<string, string> = {};
    header.forEach((name, i) => {
      row[name] = i < cells.length ? cells[i] : "";
    });
    return row;
  });
}

export function readJsonRows(text: string): RawRow[] {
  const data: unknown = JSON.parse(text);
  if (!Array.isArray(data)) {
    throw new InvalidSourceError("JSON", "Invalid JSON format: expected an array of objects");
  }
  return data.map((item: unknown, i) => {
    if (!isPlainObject(item)) {
      throw new InvalidSourceError("JSON", `Invalid JSON format: element ${i + 1} is not an object`);
    }
    return toRawRow(item);
  });
}

/**
 * Text from an image: JSON array first, CSV (header + data lines) otherwise.
 */
export function rowsFromExtractedText(text: string): RawRow[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    data = undefined;
  }

  if (data !== undefined) {
    if (!validateJsonText(text)) throw new InvalidSourceError("JSON");
    return readJsonRows(text);
  }

  if (!validateCsvText(text)) throw new InvalidSourceError("CSV");
  return readCsvRows(text);
}
