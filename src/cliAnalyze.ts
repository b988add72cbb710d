#!/usr/bin/env node
/**
 * CLI: import activity files (CSV / JSON / image) and print per-record emissions,
 * category totals and a comparison with the average baseline.
 *
 * Run:
 *   npm run analyze -- --file samples/activity.csv
 *   npm run analyze -- --file data.json --collect-errors --json
 *   npm run analyze -- --sample
 *   npm run analyze                      (interactive; history accumulates per session)
 *
 * Env (.env): see .env.example
 */
import "dotenv/config";
import prompts from "prompts";
import { CarbonCalculator, RowErrorMode } from "./carbonCalculator";
import { aggregate, compare } from "./comparison";
import { AppConfig, loadConfig } from "./config";
import { CategoryTotals } from "./emissionFactors";
import { EmissionHistory } from "./emissionHistory";
import { InvalidSourceError } from "./errors";
import { OpenAiTextExtractor } from "./imageTextExtractor";
import { importFile, ImportResult, promptedPath } from "./importer";
import { failureLines, fmtCo2, recordLines, sectionLines, toJsonReport, totalsLines } from "./report";
import { INSTRUCTIONS, sampleText } from "./sampleFormats";

function getArg(name: string): string | null {
  const i = process.argv.indexOf(name);
  return i === -1 ? null : (process.argv[i + 1] ?? null);
}

function hasFlag(name: string): boolean {
  return process.argv.includes(name);
}

function printSection(title: string) {
  for (const line of sectionLines(title)) console.log(line);
}

function printReport(result: ImportResult, baseline: CategoryTotals) {
  printSection(`Records (${result.breakdowns.length}) from ${result.filePath}`);
  for (const line of recordLines(result.breakdowns)) console.log(line);
  for (const line of failureLines(result.errors)) console.log(line);

  if (!result.breakdowns.length) return;

  const totals = aggregate(result.breakdowns);
  printSection("Category totals");
  for (const line of totalsLines(totals, baseline)) console.log(line);

  const comparison = compare(totals, baseline);
  console.log(`\n${comparison.summaryText}`);
  console.log(comparison.adviceText);
}

function printSession(history: EmissionHistory) {
  const totals = history.totals();
  const sum = totals.transport + totals.diet + totals.energy + totals.waste;
  printSection("Session");
  console.log(`Records:      ${history.size}`);
  console.log(`Total:        ${fmtCo2(sum)}`);
  console.log(`Monthly goal: ${fmtCo2(history.goalKg)}`);
}

function buildExtractor(config: AppConfig) {
  return config.openaiApiKey ? OpenAiTextExtractor.fromApiKey(config.openaiApiKey, config.openaiModel) : null;
}

async function runOnce(filePath: string, config: AppConfig, mode: RowErrorMode, asJson: boolean) {
  const calculator = new CarbonCalculator();
  const history = new EmissionHistory();

  const result = await importFile(filePath, {
    calculator,
    history,
    extractor: buildExtractor(config),
    rowErrorMode: mode,
  });

  if (asJson) {
    const totals = aggregate(result.breakdowns);
    const report = toJsonReport({
      breakdowns: result.breakdowns,
      errors: result.errors,
      totals,
      baseline: config.baseline,
      comparison: compare(totals, config.baseline),
    });
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  printReport(result, config.baseline);
  console.log(`\n[OK] Successfully loaded ${result.breakdowns.length} records`);
}

async function runInteractive(config: AppConfig, mode: RowErrorMode) {
  const calculator = new CarbonCalculator();
  const history = new EmissionHistory();
  const extractor = buildExtractor(config);

  printSection("Instructions");
  console.log(INSTRUCTIONS);

  for (;;) {
    const { filePath } = await prompts(
      {
        type: "text",
        name: "filePath",
        message: "Data file (CSV / JSON / PNG / JPG), empty to finish",
      },
      { onCancel: () => process.exit(0) }
    );

    const target = promptedPath(filePath);
    if (target === null) break;

    try {
      const result = await importFile(target, { calculator, history, extractor, rowErrorMode: mode });
      printReport(result, config.baseline);
      console.log(`\n[OK] Successfully loaded ${result.breakdowns.length} records`);
    } catch (e) {
      // a failed import leaves the session as it was; keep prompting
      console.log(`[FAIL] ${e instanceof Error ? e.message : String(e)}`);
    }

    printSession(history);

    const { again } = await prompts(
      {
        type: "toggle",
        name: "again",
        message: "Import another file?",
        initial: true,
        active: "yes",
        inactive: "no",
      },
      { onCancel: () => process.exit(0) }
    );
    if (!again) break;
  }
}

async function main() {
  const config = loadConfig();

  if (hasFlag("--sample")) {
    printSection("CSV format");
    console.log(sampleText("csv"));
    printSection("JSON format");
    console.log(sampleText("json"));
    return;
  }

  const mode: RowErrorMode = hasFlag("--collect-errors") ? "collect" : config.rowErrorMode;
  const filePath = getArg("--file");

  if (filePath) {
    await runOnce(filePath, config, mode, hasFlag("--json"));
  } else {
    await runInteractive(config, mode);
  }
}

main().catch((e: unknown) => {
  console.error("[FAIL]", e instanceof Error ? e.message : e);
  if (e instanceof InvalidSourceError) {
    console.error("Run with --sample to see the expected file layout.");
  }
  process.exit(1);
});
