/**
 * Resolve a MachineProfile's operating-cost and salvage inputs to plain numbers.
 * Service years are 1-based; salvage age is whole years in service (0 = today).
 */

import type { EconomicParameters, MachineProfile, OperatingCost } from "@/lib/types/zod";

/** Operating cost for service year `serviceYear` (1-based). Arrays repeat their last entry. */
export function operatingCostForServiceYear(
  cost: OperatingCost,
  serviceYear: number
): number {
  if (typeof cost === "number") return cost;
  if (Array.isArray(cost)) {
    return cost[Math.min(serviceYear - 1, cost.length - 1)] ?? 0;
  }
  return cost.first + (serviceYear - 1) * cost.increasePerYear;
}

/** Residual value of the machine after `age` years in service. */
export function salvageAtAge(machine: MachineProfile, age: number): number {
  const salvage = machine.salvageValue;
  if (typeof salvage === "function") return salvage(age);

  switch (salvage.kind) {
    case "CONSTANT":
      return salvage.value;
    case "TABLE":
      return salvage.values[Math.min(age, salvage.values.length - 1)] ?? 0;
    case "STRAIGHT_LINE":
      return Math.max(salvage.initialValue - salvage.lossPerYear * age, 0);
    case "DEPRECIATION": {
      let depreciation = 0;
      for (let year = 0; year < age; year++) {
        depreciation +=
          salvage.schedule[Math.min(year, salvage.schedule.length - 1)] ?? 0;
      }
      return Math.max(machine.purchaseCost - depreciation, 0);
    }
  }
}

/** Whether the machine may stay in service for `years` more years. */
export function canServe(machine: MachineProfile, years: number): boolean {
  return machine.maxServiceYears == null || years <= machine.maxServiceYears;
}

/**
 * Strategy k is feasible when the existing machine can serve k years and,
 * if it is replaced, the new machine can serve the remaining horizon - k.
 */
export function isStrategyFeasible(params: EconomicParameters, k: number): boolean {
  if (!canServe(params.existingMachine, k)) return false;
  return k === params.horizonYears || canServe(params.newMachine, params.horizonYears - k);
}
