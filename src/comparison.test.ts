import path from "node:path";
import fs from "node:fs";
import { describe, expect, it } from "vitest";
import { CarbonCalculator, EmissionBreakdown } from "./carbonCalculator";
import { aggregate, compare } from "./comparison";
import { CATEGORIES, DEFAULT_BASELINE } from "./emissionFactors";
import { readCsvRows } from "./inputValidator";

const sampleCsv = fs.readFileSync(path.resolve(__dirname, "..", "samples", "activity.csv"), "utf8");
const sample: EmissionBreakdown[] = new CarbonCalculator().convertRows(readCsvRows(sampleCsv)).breakdowns;

describe("aggregate", () => {
  it("returns zeros for an empty batch", () => {
    expect(aggregate([])).toEqual({ transport: 0, diet: 0, energy: 0, waste: 0 });
  });

  it("sums each category of the sample file", () => {
    expect(sample.map((b) => b.total)).toEqual([12.09, 6.98, 7.51]);
    expect(aggregate(sample)).toEqual({ transport: 5.88, diet: 5, energy: 15.6, waste: 0.1 });
  });

  it("does not depend on input order", () => {
    const [a, b, c] = sample;
    const expected = aggregate([a, b, c]);
    for (const perm of [[a, c, b], [b, a, c], [b, c, a], [c, a, b], [c, b, a]]) {
      expect(aggregate(perm)).toEqual(expected);
    }
  });
});

describe("compare", () => {
  it("reports every category under the default baseline", () => {
    const result = compare(aggregate(sample), DEFAULT_BASELINE);

    expect(result.exceeded).toEqual([]);
    expect(result.totalDifference).toBeCloseTo(-113.42, 10);
    expect(result.summaryText).toBe(
      "Comparison with World Averages:\n" +
        "- Transport: You emit 44.12 kgCO2 less than the average.\n" +
        "- Diet: You emit 35.00 kgCO2 less than the average.\n" +
        "- Energy: You emit 14.40 kgCO2 less than the average.\n" +
        "- Waste: You emit 19.90 kgCO2 less than the average.\n" +
        "\nOverall, you emit 113.42 kgCO2 less than the world average."
    );
    expect(result.adviceText).toBe(
      "\nSuggestions for Improvement:\n\n- Great job! Keep maintaining or improving your low carbon footprint."
    );
  });

  it("adds one suggestion per exceeded category", () => {
    const result = compare({ transport: 80, diet: 45, energy: 30, waste: 10 }, DEFAULT_BASELINE);

    expect(result.differences).toEqual({ transport: 30, diet: 5, energy: 0, waste: -10 });
    expect(result.totalDifference).toBe(25);
    expect(result.exceeded).toEqual(["transport", "diet"]);
    expect(result.summaryText).toBe(
      "Comparison with World Averages:\n" +
        "- Transport: You emit 30.00 kgCO2 more than the average.\n" +
        "- Diet: You emit 5.00 kgCO2 more than the average.\n" +
        "- Energy: You emit 0.00 kgCO2 less than the average.\n" +
        "- Waste: You emit 10.00 kgCO2 less than the average.\n" +
        "\nOverall, you emit 25.00 kgCO2 more than the world average."
    );
    expect(result.adviceText).toBe(
      "\nSuggestions for Improvement:\n" +
        "- Consider using public transport, carpooling, or cycling to reduce transport emissions.\n" +
        "- Try reducing meat consumption and incorporating more plant-based meals.\n" +
        "\n- Overall, focus on reducing emissions in the areas where you exceed the average."
    );
  });

  it("stays consistent with aggregate for any baseline", () => {
    const totals = aggregate(sample);
    const baseline = { transport: 1.5, diet: 7.25, energy: 0, waste: 100 };
    const { differences } = compare(totals, baseline);
    for (const cat of CATEGORIES) {
      expect(differences[cat] + baseline[cat]).toBeCloseTo(totals[cat], 10);
    }
  });
});
