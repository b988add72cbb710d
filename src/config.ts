// src/config.ts
import { RowErrorMode } from "./carbonCalculator";
import { CategoryTotals, DEFAULT_BASELINE } from "./emissionFactors";

export type AppConfig = {
  openaiApiKey: string | null;
  openaiModel: string;
  rowErrorMode: RowErrorMode;
  baseline: CategoryTotals;
};

type Env = Record<string, string | undefined>;

const DEFAULT_MODEL = "gpt-4o-mini-2024-07-18";

const BASELINE_ENV: Record<keyof CategoryTotals, string> = {
  transport: "BASELINE_TRANSPORT_KG",
  diet: "BASELINE_DIET_KG",
  energy: "BASELINE_ENERGY_KG",
  waste: "BASELINE_WASTE_KG",
};

function envOrNull(env: Env, name: string): string | null {
  const v = (env[name] ?? "").trim();
  return v ? v : null;
}

function numFromEnv(env: Env, name: string, fallback: number): number {
  const raw = envOrNull(env, name);
  if (raw === null) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new Error(`Invalid ${name} in .env: "${raw}" is not a number`);
  return n;
}

function rowErrorModeFromEnv(env: Env): RowErrorMode {
  const raw = envOrNull(env, "ROW_ERROR_MODE");
  if (raw === null) return "abort";
  if (raw === "abort" || raw === "collect") return raw;
  throw new Error(`Invalid ROW_ERROR_MODE in .env: "${raw}" (use abort or collect)`);
}

/**
 * Reads settings from the environment. The CLI loads .env via dotenv first.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    openaiApiKey: envOrNull(env, "OPENAI_API_KEY"),
    openaiModel: envOrNull(env, "OPENAI_MODEL") ?? DEFAULT_MODEL,
    rowErrorMode: rowErrorModeFromEnv(env),
    baseline: {
      transport: numFromEnv(env, BASELINE_ENV.transport, DEFAULT_BASELINE.transport),
      diet: numFromEnv(env, BASELINE_ENV.diet, DEFAULT_BASELINE.diet),
      energy: numFromEnv(env, BASELINE_ENV.energy, DEFAULT_BASELINE.energy),
      waste: numFromEnv(env, BASELINE_ENV.waste, DEFAULT_BASELINE.waste),
    },
  };
}
