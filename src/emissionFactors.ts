// src/emissionFactors.ts

export const CATEGORIES = ["transport", "diet", "energy", "waste"] as const;
export type Category = (typeof CATEGORIES)[number];

export const DIET_TYPES = ["meat", "vegan", "mixed"] as const;
export type DietType = (typeof DIET_TYPES)[number];

export type CategoryTotals = Record<Category, number>;

export type EmissionFactors = {
  transport: { car: number; bus: number; train: number };
  diet: Record<DietType, number>;
  energy: number; // kgCO2 per kWh
  waste: number; // kgCO2 per kg
};

// kgCO2 per unit. train is listed but no input field reads it.
export const DEFAULT_FACTORS: EmissionFactors = {
  transport: { car: 0.2, bus: 0.08, train: 0.05 },
  diet: { meat: 2.5, vegan: 1.0, mixed: 1.5 },
  energy: 0.5,
  waste: 0.2,
};

// Illustrative "world average" per-category values, kgCO2
export const DEFAULT_BASELINE: CategoryTotals = {
  transport: 50,
  diet: 40,
  energy: 30,
  waste: 20,
};

export const MONTHLY_GOAL_KG = 1000;

export const SUGGESTIONS: Record<Category, string> = {
  transport: "Consider using public transport, carpooling, or cycling to reduce transport emissions.",
  diet: "Try reducing meat consumption and incorporating more plant-based meals.",
  energy: "Use energy-efficient appliances and consider renewable energy sources.",
  waste: "Reduce waste by recycling, composting, and avoiding single-use plastics.",
};

export function isDietType(x: string): x is DietType {
  return DIET_TYPES.some((d) => d === x);
}

export function zeroTotals(): CategoryTotals {
  return { transport: 0, diet: 0, energy: 0, waste: 0 };
}

/**
 * Rounds to 2 decimals, ties to the even cent. A binary double is an exact
 * half-cent only when n * 8 is an integer (0.125, 0.375, ...); every other
 * value rounds to nearest.
 */
export function round2(n: number): number {
  const scaled = n * 100;
  const floor = Math.floor(scaled);
  if (scaled - floor === 0.5 && Number.isInteger(n * 8)) {
    return (floor % 2 === 0 ? floor : floor + 1) / 100;
  }
  return Math.round(scaled) / 100;
}
