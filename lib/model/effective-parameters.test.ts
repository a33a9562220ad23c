import { describe, it, expect } from "vitest";
import { getEffectiveParameters } from "./effective-parameters";
import { getEscalatingCostScenario, withMachine } from "@/fixtures/scenarios";

describe("getEffectiveParameters", () => {
  it("resolves gradients and schedules to per-year values", () => {
    const effective = getEffectiveParameters(getEscalatingCostScenario());

    expect(effective.existingMachine).toEqual({
      purchaseCost: 0,
      operatingCostByServiceYear: [9000, 11000, 13000, 15000, 17000],
      salvageByAge: [6000, 4000, 2000, 0, 0, 0],
      maxServiceYears: 3,
    });
    expect(effective.newMachine.salvageByAge).toEqual([22000, 19000, 16000, 12000, 8000, 4000]);
    expect(effective.newMachine.maxServiceYears).toBeNull();
    expect(effective.operatingCostTiming).toBe("BEGINNING_OF_YEAR");
  });

  it("tabulates salvage supplied as a function", () => {
    const params = withMachine(getEscalatingCostScenario({ horizonYears: 2 }), "newMachine", {
      salvageValue: (age) => 20000 - 5000 * age,
    });
    expect(getEffectiveParameters(params).newMachine.salvageByAge).toEqual([20000, 15000, 10000]);
  });
});
