// src/sampleFormats.ts
import fs from "node:fs";
import path from "node:path";

export const SAMPLES_DIR = path.resolve(__dirname, "..", "samples");

export const INSTRUCTIONS = [
  "1. Prepare your data file in CSV or JSON format",
  "2. Required fields: date (YYYY-MM-DD), diet_type (meat/vegan/mixed), energy_kwh",
  "3. Optional fields: car_km, bus_km, waste_kg, meals",
  "4. For images: include the same table as text (JSON or CSV); needs OPENAI_API_KEY",
].join("\n");

export function sampleText(format: "csv" | "json"): string {
  return fs.readFileSync(path.join(SAMPLES_DIR, `activity.${format}`), "utf8");
}
