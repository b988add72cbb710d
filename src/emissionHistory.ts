// src/emissionHistory.ts
import { EmissionBreakdown } from "./carbonCalculator";
import { aggregate } from "./comparison";
import { CategoryTotals, MONTHLY_GOAL_KG } from "./emissionFactors";

/**
 * Session-lifetime, append-only list of breakdowns. Never deduplicated, never
 * persisted. append() is synchronous, so one batch lands as a unit even when
 * several imports are awaiting I/O at the same time.
 */
export class EmissionHistory {
  private readonly entries: EmissionBreakdown[] = [];

  // Recorded only; nothing compares against it yet.
  readonly goalKg: number;

  constructor(goalKg: number = MONTHLY_GOAL_KG) {
    this.goalKg = goalKg;
  }

  append(batch: readonly EmissionBreakdown[]): void {
    this.entries.push(...batch);
  }

  get size(): number {
    return this.entries.length;
  }

  records(): readonly EmissionBreakdown[] {
    return [...this.entries];
  }

  totals(): CategoryTotals {
    return aggregate(this.entries);
  }
}
