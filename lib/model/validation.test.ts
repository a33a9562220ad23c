import { describe, it, expect } from "vitest";
import { parseEconomicParameters, validateParameters } from "./validation";
import { ConfigurationError } from "./errors";
import {
  getEscalatingCostScenario,
  getFlatCostScenario,
  withMachine,
} from "@/fixtures/scenarios";

const minimalInput = {
  existingMachine: {
    annualOperatingCost: 1000,
    salvageValue: { kind: "CONSTANT", value: 0 },
  },
  newMachine: {
    purchaseCost: 4000,
    annualOperatingCost: 600,
    salvageValue: { kind: "CONSTANT", value: 1500 },
  },
};

function parseIssues(input: unknown): { code: string; message: string }[] {
  try {
    parseEconomicParameters(input);
  } catch (error) {
    if (error instanceof ConfigurationError) return error.issues;
    throw error;
  }
  return [];
}

describe("parseEconomicParameters", () => {
  it("applies default rate, horizon, timing and existing purchase cost", () => {
    const params = parseEconomicParameters(minimalInput);

    expect(params.interestRate).toBe(0.1);
    expect(params.horizonYears).toBe(5);
    expect(params.operatingCostTiming).toBe("END_OF_YEAR");
    expect(params.existingMachine.purchaseCost).toBe(0);
  });

  it("returns a frozen value", () => {
    expect(Object.isFrozen(parseEconomicParameters(minimalInput))).toBe(true);
  });

  it("reports shape problems with their path", () => {
    const issues = parseIssues({ ...minimalInput, interestRate: "ten" });
    expect(issues).toEqual([
      { code: "SCHEMA", message: "interestRate: Expected number, received string" },
    ]);
  });

  it("reports a missing machine", () => {
    const issues = parseIssues({ existingMachine: minimalInput.existingMachine });
    expect(issues).toEqual([{ code: "SCHEMA", message: "newMachine: Required" }]);
  });

  it("runs range checks after parsing", () => {
    const issues = parseIssues({ ...minimalInput, horizonYears: 2.5 });
    expect(issues).toEqual([
      {
        code: "INVALID_HORIZON",
        message: "Horizon must be a whole number of years from 1 to 20 (got 2.5)",
      },
    ]);
  });

  it("throws ConfigurationError with a readable message", () => {
    expect(() => parseEconomicParameters({ ...minimalInput, horizonYears: 0 })).toThrow(
      "Invalid analysis configuration: Horizon must be a whole number of years from 1 to 20 (got 0)"
    );
  });
});

describe("validateParameters", () => {
  it("passes the fixture scenarios cleanly", () => {
    expect(validateParameters(getFlatCostScenario())).toEqual({ errors: [], warnings: [] });
    expect(validateParameters(getEscalatingCostScenario())).toEqual({
      errors: [],
      warnings: [],
    });
  });

  it("rejects negative rates above -100% separately from rates at or below it", () => {
    const codes = (rate: number) =>
      validateParameters(getFlatCostScenario({ interestRate: rate })).errors.map((e) => e.code);

    expect(codes(-0.05)).toEqual(["NEGATIVE_INTEREST_RATE"]);
    expect(codes(-1)).toEqual(["INVALID_INTEREST_RATE"]);
    expect(codes(Number.NaN)).toEqual(["INVALID_INTEREST_RATE"]);
  });

  it("rejects a negative purchase cost", () => {
    const params = withMachine(getFlatCostScenario(), "newMachine", { purchaseCost: -1 });
    expect(validateParameters(params).errors).toEqual([
      { code: "NEGATIVE_COST", message: "New machine purchase cost must be non-negative (got -1)" },
    ]);
  });

  it("rejects negative salvage from a table", () => {
    const params = withMachine(getFlatCostScenario(), "existingMachine", {
      salvageValue: { kind: "TABLE", values: [100, -50] },
    });
    expect(validateParameters(params).errors).toEqual([
      {
        code: "NEGATIVE_SALVAGE",
        message: "Existing machine salvage value at age 1 must be non-negative (got -50)",
      },
    ]);
  });

  it("rejects salvage functions that return non-numbers", () => {
    const params = withMachine(getFlatCostScenario(), "newMachine", {
      salvageValue: () => Number.NaN,
    });
    expect(validateParameters(params).errors).toEqual([
      { code: "INVALID_SALVAGE", message: "New machine salvage value at age 0 is not a number" },
    ]);
  });

  it("rejects a fractional or negative service cap", () => {
    const params = withMachine(getEscalatingCostScenario(), "existingMachine", {
      maxServiceYears: -1,
    });
    expect(validateParameters(params).errors.map((e) => e.code)).toEqual([
      "INVALID_MAX_SERVICE_YEARS",
    ]);
  });

  it("rejects a horizon longer than 20 years", () => {
    expect(validateParameters(getFlatCostScenario({ horizonYears: 20 })).errors).toEqual([]);
    expect(validateParameters(getFlatCostScenario({ horizonYears: 21 })).errors).toEqual([
      {
        code: "INVALID_HORIZON",
        message: "Horizon must be a whole number of years from 1 to 20 (got 21)",
      },
    ]);
    expect(
      validateParameters(getFlatCostScenario({ horizonYears: 1e6 })).errors.map((e) => e.code)
    ).toEqual(["INVALID_HORIZON"]);
  });

  it("rejects a depreciation schedule on the existing machine", () => {
    const params = withMachine(getFlatCostScenario(), "existingMachine", {
      salvageValue: { kind: "DEPRECIATION", schedule: [500] },
    });
    expect(validateParameters(params).errors).toEqual([
      {
        code: "UNSUPPORTED_SALVAGE_SCHEDULE",
        message:
          "Existing machine salvage cannot be a depreciation schedule; use STRAIGHT_LINE, TABLE or CONSTANT from its current value",
      },
    ]);
  });

  it("accepts a depreciation schedule on the new machine", () => {
    expect(validateParameters(getEscalatingCostScenario()).errors).toEqual([]);
  });

  it("rejects service caps that leave no feasible strategy", () => {
    // Existing lasts at most 1 year, new at most 2: no k covers 5 years
    const params = withMachine(getEscalatingCostScenario(), "existingMachine", {
      maxServiceYears: 1,
    });
    const capped = withMachine(params, "newMachine", { maxServiceYears: 2 });

    expect(validateParameters(capped).errors).toEqual([
      {
        code: "NO_FEASIBLE_STRATEGY",
        message: "No keep-then-replace strategy fits the service caps within a 5-year horizon",
      },
    ]);
    const input = {
      existingMachine: { ...minimalInput.existingMachine, maxServiceYears: 1 },
      newMachine: { ...minimalInput.newMachine, maxServiceYears: 2 },
    };
    expect(parseIssues(input).map((i) => i.code)).toEqual(["NO_FEASIBLE_STRATEGY"]);
  });

  it("only checks operating costs the horizon can reach", () => {
    // Goes negative in service year 4, beyond a 3-year horizon
    const params = withMachine(getFlatCostScenario({ horizonYears: 3 }), "existingMachine", {
      annualOperatingCost: { first: 1000, increasePerYear: -400 },
      salvageValue: { kind: "CONSTANT", value: 0 },
    });
    expect(validateParameters(params).errors).toEqual([]);
  });

  it("warns on sunk cost and very high rates", () => {
    const params = withMachine(getFlatCostScenario({ interestRate: 0.6 }), "existingMachine", {
      purchaseCost: 500,
    });
    const { errors, warnings } = validateParameters(params);

    expect(errors).toEqual([]);
    expect(warnings.map((w) => w.code)).toEqual(["HIGH_INTEREST_RATE", "SUNK_COST_INCLUDED"]);
  });
});
