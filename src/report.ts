// src/report.ts
import { EmissionBreakdown, RowFailure } from "./carbonCalculator";
import { Comparison } from "./comparison";
import { CATEGORIES, CategoryTotals } from "./emissionFactors";

export function fmtCo2(n: number, digits = 2) {
  if (!Number.isFinite(n)) return "0";
  return `${n.toFixed(digits)} kgCO2`;
}

export function fmtDate(d: Date) {
  return d.toISOString().slice(0, 10);
}

export function sectionLines(title: string): string[] {
  return [`\n${title}`, "-".repeat(Math.min(80, title.length))];
}

export function recordLines(breakdowns: readonly EmissionBreakdown[]): string[] {
  if (!breakdowns.length) return ["(none)"];
  return breakdowns.map(
    (b) =>
      `- ${fmtDate(b.date)}  transport=${b.transport.toFixed(2)}  diet=${b.diet.toFixed(2)}  ` +
      `energy=${b.energy.toFixed(2)}  waste=${b.waste.toFixed(2)}  total=${fmtCo2(b.total)}`
  );
}

export function totalsLines(totals: CategoryTotals, baseline: CategoryTotals): string[] {
  const lines = CATEGORIES.map(
    (cat) => `${`${cat}:`.padEnd(11)}${fmtCo2(totals[cat])}  (average ${fmtCo2(baseline[cat])})`
  );
  const sum = CATEGORIES.reduce<number>((acc, cat) => acc + totals[cat], 0);
  lines.push(`${"total:".padEnd(11)}${fmtCo2(sum)}`);
  return lines;
}

export function failureLines(errors: readonly RowFailure[]): string[] {
  return errors.map((e) => `[WARN] ${e.message} (skipped, field=${e.field})`);
}

/** Plain-data shape for --json output; dates as YYYY-MM-DD. */
export function toJsonReport(args: {
  breakdowns: readonly EmissionBreakdown[];
  errors: readonly RowFailure[];
  totals: CategoryTotals;
  baseline: CategoryTotals;
  comparison: Comparison;
}) {
  return {
    records: args.breakdowns.map((b) => ({ ...b, date: fmtDate(b.date) })),
    errors: args.errors,
    totals: args.totals,
    baseline: args.baseline,
    differences: args.comparison.differences,
    total_difference: args.comparison.totalDifference,
    exceeded: args.comparison.exceeded,
    summary: args.comparison.summaryText,
    advice: args.comparison.adviceText,
  };
}
