// src/comparison.ts
import { EmissionBreakdown } from "./carbonCalculator";
import { CATEGORIES, Category, CategoryTotals, round2, SUGGESTIONS, zeroTotals } from "./emissionFactors";

export type Comparison = {
  differences: CategoryTotals;
  totalDifference: number;
  exceeded: Category[];
  summaryText: string;
  adviceText: string;
};

function capitalize(s: string) {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

function sumValues(t: CategoryTotals): number {
  return CATEGORIES.reduce<number>((acc, cat) => acc + t[cat], 0);
}

/**
 * Per-category sums. Each sum is rounded to 2 decimals, which also makes the
 * result independent of input order.
 */
export function aggregate(breakdowns: readonly EmissionBreakdown[]): CategoryTotals {
  const totals = zeroTotals();
  for (const b of breakdowns) {
    for (const cat of CATEGORIES) totals[cat] += b[cat];
  }
  for (const cat of CATEGORIES) totals[cat] = round2(totals[cat]);
  return totals;
}

export function compare(totals: CategoryTotals, baseline: CategoryTotals): Comparison {
  const differences = zeroTotals();
  const exceeded: Category[] = [];

  let summary = "Comparison with World Averages:\n";
  let advice = "\nSuggestions for Improvement:\n";

  for (const cat of CATEGORIES) {
    const diff = totals[cat] - baseline[cat];
    differences[cat] = diff;

    if (diff > 0) {
      exceeded.push(cat);
      summary += `- ${capitalize(cat)}: You emit ${diff.toFixed(2)} kgCO2 more than the average.\n`;
      advice += `- ${SUGGESTIONS[cat]}\n`;
    } else {
      summary += `- ${capitalize(cat)}: You emit ${(-diff).toFixed(2)} kgCO2 less than the average.\n`;
    }
  }

  const totalDifference = sumValues(totals) - sumValues(baseline);

  if (totalDifference > 0) {
    summary += `\nOverall, you emit ${totalDifference.toFixed(2)} kgCO2 more than the world average.`;
    advice += "\n- Overall, focus on reducing emissions in the areas where you exceed the average.";
  } else {
    summary += `\nOverall, you emit ${(-totalDifference).toFixed(2)} kgCO2 less than the world average.`;
    advice += "\n- Great job! Keep maintaining or improving your low carbon footprint.";
  }

  return { differences, totalDifference, exceeded, summaryText: summary, adviceText: advice };
}
