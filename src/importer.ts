// src/importer.ts
import fs from "node:fs/promises";
import path from "node:path";
import { BatchResult, CarbonCalculator, RowErrorMode } from "./carbonCalculator";
import { EmissionHistory } from "./emissionHistory";
import { InvalidSourceError, UnsupportedFormatError } from "./errors";
import { TextExtractor } from "./imageTextExtractor";
import { isImagePath, readCsvRows, readJsonRows, rowsFromExtractedText, validateCsvText, validateJsonText } from "./inputValidator";
import { RawRow } from "./rawRow";

export type SourceFormat = "csv" | "json" | "image";

export type ImportResult = BatchResult & {
  filePath: string;
  format: SourceFormat;
};

export type ImportOptions = {
  calculator: CarbonCalculator;
  history: EmissionHistory;
  extractor?: TextExtractor | null;
  rowErrorMode?: RowErrorMode;
};

export function detectFormat(filePath: string): SourceFormat {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".csv") return "csv";
  if (ext === ".json") return "json";
  if (isImagePath(filePath)) return "image";
  throw new UnsupportedFormatError(filePath);
}

/** Trimmed path from an interactive answer; null when blank (ends the session). */
export function promptedPath(answer: unknown): string | null {
  const target = typeof answer === "string" ? answer.trim() : "";
  return target || null;
}

async function readText(filePath: string, format: "CSV" | "JSON"): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new InvalidSourceError(format, `Could not read ${format} file ${filePath}: ${msg}`);
  }
}

async function loadRows(filePath: string, format: SourceFormat, extractor: TextExtractor | null): Promise<RawRow[]> {
  switch (format) {
    case "csv": {
      const text = await readText(filePath, "CSV");
      if (!validateCsvText(text)) throw new InvalidSourceError("CSV");
      return readCsvRows(text);
    }
    case "json": {
      const text = await readText(filePath, "JSON");
      if (!validateJsonText(text)) throw new InvalidSourceError("JSON");
      return readJsonRows(text);
    }
    case "image": {
      if (!extractor) {
        throw new UnsupportedFormatError(filePath, "Image import needs OPENAI_API_KEY in .env");
      }
      return rowsFromExtractedText(await extractor.extractText(filePath));
    }
  }
}

/**
 * read -> validate -> convert every row -> append the batch to history.
 * In abort mode a bad row throws and history is left untouched.
 */
export async function importFile(filePath: string, opts: ImportOptions): Promise<ImportResult> {
  const format = detectFormat(filePath);
  const rows = await loadRows(filePath, format, opts.extractor ?? null);

  const result = opts.calculator.convertRows(rows, opts.rowErrorMode ?? "abort");
  opts.history.append(result.breakdowns);

  return { filePath, format, ...result };
}
