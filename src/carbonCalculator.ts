// src/carbonCalculator.ts
import { DEFAULT_FACTORS, EmissionFactors, isDietType, round2 } from "./emissionFactors";
import { RowConversionError } from "./errors";
import { RawRow, RawValue } from "./rawRow";

export interface EmissionBreakdown {
  readonly date: Date;
  readonly transport: number;
  readonly diet: number;
  readonly energy: number;
  readonly waste: number;
  readonly total: number;
}

export type RowErrorMode = "abort" | "collect";

export type RowFailure = {
  rowIndex: number;
  field: string;
  kind: RowConversionError["kind"];
  message: string;
};

export type BatchResult = {
  breakdowns: EmissionBreakdown[];
  errors: RowFailure[];
};

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// Only a key that is not there at all is absent; "" and "null" are present values.
function isAbsent(v: RawValue | undefined): v is undefined {
  return v === undefined;
}

function parseIsoDate(value: RawValue | undefined): Date {
  if (isAbsent(value)) {
    throw new RowConversionError("missing_field", "date", "Missing required field: date");
  }

  const text = String(value).trim();
  const m = ISO_DATE.exec(text);
  if (!m) {
    throw new RowConversionError("invalid_date", "date", `Invalid date "${text}", expected YYYY-MM-DD`);
  }

  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const date = new Date(Date.UTC(year, month - 1, day));

  // Date.UTC rolls 2023-02-30 over into March
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    throw new RowConversionError("invalid_date", "date", `Invalid date "${text}", no such calendar day`);
  }
  return date;
}

function toNumber(field: string, value: RawValue): number {
  let n = Number.NaN;
  if (typeof value === "number") {
    n = value;
  } else if (DECIMAL.test(value.trim())) {
    n = Number(value.trim());
  }
  if (!Number.isFinite(n)) {
    throw new RowConversionError("not_numeric", field, `Field ${field} must be a number, got "${value}"`);
  }
  return n;
}

function requiredNumber(row: RawRow, field: string): number {
  const value = row[field];
  if (isAbsent(value)) {
    throw new RowConversionError("missing_field", field, `Missing required field: ${field}`);
  }
  return toNumber(field, value);
}

function optionalNumber(row: RawRow, field: string, fallback: number): number {
  const value = row[field];
  return isAbsent(value) ? fallback : toNumber(field, value);
}

/**
 * Converts raw activity rows into per-category kgCO2 figures.
 * Holds no state besides the factor table; see EmissionHistory for accumulation.
 */
export class CarbonCalculator {
  readonly factors: EmissionFactors;

  constructor(factors: EmissionFactors = DEFAULT_FACTORS) {
    this.factors = factors;
  }

  convertRow(row: RawRow): EmissionBreakdown {
    const date = parseIsoDate(row.date);

    const transport =
      optionalNumber(row, "car_km", 0) * this.factors.transport.car +
      optionalNumber(row, "bus_km", 0) * this.factors.transport.bus;

    const dietRaw = row.diet_type;
    if (isAbsent(dietRaw)) {
      throw new RowConversionError("missing_field", "diet_type", "Missing required field: diet_type");
    }
    const dietType = String(dietRaw).trim();
    if (!isDietType(dietType)) {
      throw new RowConversionError(
        "unknown_diet_type",
        "diet_type",
        `Unknown diet_type "${dietType}" (expected one of: ${Object.keys(this.factors.diet).join(", ")})`
      );
    }
    const diet = this.factors.diet[dietType] * optionalNumber(row, "meals", 1);

    const energy = requiredNumber(row, "energy_kwh") * this.factors.energy;
    const waste = optionalNumber(row, "waste_kg", 0) * this.factors.waste;

    const rounded = {
      transport: round2(transport),
      diet: round2(diet),
      energy: round2(energy),
      waste: round2(waste),
    };

    return Object.freeze({
      date,
      ...rounded,
      total: round2(rounded.transport + rounded.diet + rounded.energy + rounded.waste),
    });
  }

  /**
   * abort: the first bad row throws (with its index) and nothing is returned.
   * collect: bad rows are skipped and reported in errors.
   */
  convertRows(rows: readonly RawRow[], mode: RowErrorMode = "abort"): BatchResult {
    const breakdowns: EmissionBreakdown[] = [];
    const errors: RowFailure[] = [];

    rows.forEach((row, i) => {
      try {
        breakdowns.push(this.convertRow(row));
      } catch (e) {
        if (!(e instanceof RowConversionError)) throw e;
        const located = e.atRow(i);
        if (mode === "abort") throw located;
        errors.push({ rowIndex: i, field: located.field, kind: located.kind, message: located.message });
      }
    });

    return { breakdowns, errors };
  }
}
