// src/rawRow.ts

export const REQUIRED_FIELDS = ["date", "diet_type", "energy_kwh"] as const;
export const OPTIONAL_FIELDS = ["car_km", "bus_km", "waste_kg", "meals"] as const;

export type RawValue = string | number;

/** One unvalidated input record (CSV line, JSON object or extracted text). */
export type RawRow = Readonly<Record<string, RawValue | undefined>>;

export function hasRequiredFields(keys: Iterable<string>): boolean {
  const set = new Set(keys);
  return REQUIRED_FIELDS.every((f) => set.has(f));
}

export function isPlainObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

/**
 * JSON values -> RawRow. Anything that is neither string nor number (null
 * included) is kept as its JSON text, so conversion reports it as non-numeric
 * instead of falling back to a default.
 */
export function toRawRow(obj: Record<string, unknown>): RawRow {
  const row: Record<string, RawValue> = {};
  for (const [key, value] of Object.entries(obj)) {
    row[key] = typeof value === "string" || typeof value === "number" ? value : JSON.stringify(value);
  }
  return row;
}
