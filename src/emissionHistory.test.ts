import { describe, expect, it } from "vitest";
import { CarbonCalculator } from "./carbonCalculator";
import { EmissionHistory } from "./emissionHistory";

const calc = new CarbonCalculator();

describe("EmissionHistory", () => {
  it("starts empty with the monthly goal recorded", () => {
    const history = new EmissionHistory();
    expect(history.size).toBe(0);
    expect(history.goalKg).toBe(1000);
    expect(history.totals()).toEqual({ transport: 0, diet: 0, energy: 0, waste: 0 });
  });

  it("appends batches in order without deduplicating", () => {
    const history = new EmissionHistory();
    const first = calc.convertRow({ date: "2023-08-01", diet_type: "vegan", energy_kwh: 2 });
    const second = calc.convertRow({ date: "2023-08-02", diet_type: "meat", energy_kwh: 2 });

    history.append([first, second]);
    history.append([first]);

    expect(history.size).toBe(3);
    expect(history.records()).toEqual([first, second, first]);
    expect(history.totals()).toEqual({ transport: 0, diet: 4.5, energy: 3, waste: 0 });
  });

  it("leaves converted rows alone until append is called", () => {
    const history = new EmissionHistory();
    calc.convertRows([{ date: "2023-08-01", diet_type: "vegan", energy_kwh: 2 }]);
    expect(history.size).toBe(0);
  });
});
