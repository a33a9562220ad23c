/**
 * Scenario fixtures shared by engine, export and store tests.
 */

import type { EconomicParameters, MachineProfile } from "@/lib/types/zod";

/**
 * Flat-cost case over 5 years at 10%, costs at end of year.
 * Existing: $1,000/yr, salvage 500·(5 − k). New: $4,000, $600/yr, $1,500 salvage.
 */
export function getFlatCostScenario(overrides?: Partial<EconomicParameters>): EconomicParameters {
  return {
    interestRate: 0.1,
    horizonYears: 5,
    operatingCostTiming: "END_OF_YEAR",
    existingMachine: {
      purchaseCost: 0,
      annualOperatingCost: 1000,
      salvageValue: { kind: "TABLE", values: [2500, 2000, 1500, 1000, 500, 0] },
    },
    newMachine: {
      purchaseCost: 4000,
      annualOperatingCost: 600,
      salvageValue: { kind: "CONSTANT", value: 1500 },
    },
    ...overrides,
  };
}

/**
 * Escalating-cost case, costs at beginning of year. The existing machine can
 * serve at most 3 more years, so k = 4 and k = 5 are infeasible.
 */
export function getEscalatingCostScenario(
  overrides?: Partial<EconomicParameters>
): EconomicParameters {
  return {
    interestRate: 0.1,
    horizonYears: 5,
    operatingCostTiming: "BEGINNING_OF_YEAR",
    existingMachine: {
      purchaseCost: 0,
      annualOperatingCost: { first: 9000, increasePerYear: 2000 },
      salvageValue: { kind: "STRAIGHT_LINE", initialValue: 6000, lossPerYear: 2000 },
      maxServiceYears: 3,
    },
    newMachine: {
      purchaseCost: 22000,
      annualOperatingCost: { first: 6000, increasePerYear: 1000 },
      salvageValue: { kind: "DEPRECIATION", schedule: [3000, 3000, 4000] },
    },
    ...overrides,
  };
}

/** Replace one machine's fields on a scenario. */
export function withMachine(
  params: EconomicParameters,
  key: "existingMachine" | "newMachine",
  patch: Partial<MachineProfile>
): EconomicParameters {
  const machine: MachineProfile = { ...params[key], ...patch };
  return key === "existingMachine"
    ? { ...params, existingMachine: machine }
    : { ...params, newMachine: machine };
}
