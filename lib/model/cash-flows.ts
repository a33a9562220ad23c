/**
 * Year-by-year cash flows for one keep-then-replace strategy.
 *
 * Strategy k keeps the existing machine for k years, then replaces it with the
 * new machine for the rest of the horizon. Purchases and salvage sit on year
 * boundaries t = 0..horizon. The operating cost of service year n of a machine
 * in service from t0 is recognized at t0 + n (END_OF_YEAR) or t0 + n - 1
 * (BEGINNING_OF_YEAR), the same way for both machines and every k.
 *
 * Costs are positive; salvage recovery is negative.
 */

import type { EconomicParameters, OperatingCostTiming } from "@/lib/types/zod";
import { StrategyRangeError } from "./errors";
import { operatingCostForServiceYear, salvageAtAge } from "./machine-profile";
import { assertValidParameters } from "./validation";

export type MachineRole = "EXISTING" | "NEW";
export type CashFlowKind = "PURCHASE" | "OPERATING" | "SALVAGE";

export interface CashFlowComponent {
  readonly machine: MachineRole;
  readonly kind: CashFlowKind;
  readonly amount: number;
}

export interface CashFlowEntry {
  readonly year: number;
  /** Net of all components for the year. */
  readonly amount: number;
  readonly components: readonly CashFlowComponent[];
}

function operatingCostYear(
  inServiceFrom: number,
  serviceYear: number,
  timing: OperatingCostTiming
): number {
  return timing === "END_OF_YEAR"
    ? inServiceFrom + serviceYear
    : inServiceFrom + serviceYear - 1;
}

/**
 * Build cash flows without validating. Callers must have checked params and k;
 * StrategyEvaluator does so once per analysis.
 */
export function buildStrategyCashFlows(
  params: EconomicParameters,
  k: number
): CashFlowEntry[] {
  const { horizonYears, operatingCostTiming, existingMachine, newMachine } = params;
  const byYear: CashFlowComponent[][] = Array.from(
    { length: horizonYears + 1 },
    () => []
  );
  const add = (year: number, component: CashFlowComponent) => {
    byYear[year]?.push(component);
  };

  // Sunk cost: same in every strategy
  if (existingMachine.purchaseCost > 0) {
    add(0, { machine: "EXISTING", kind: "PURCHASE", amount: existingMachine.purchaseCost });
  }

  for (let serviceYear = 1; serviceYear <= k; serviceYear++) {
    add(operatingCostYear(0, serviceYear, operatingCostTiming), {
      machine: "EXISTING",
      kind: "OPERATING",
      amount: operatingCostForServiceYear(existingMachine.annualOperatingCost, serviceYear),
    });
  }

  // Disposed at k, or at the horizon when never replaced (k === horizonYears)
  const existingSalvage = salvageAtAge(existingMachine, k);
  if (existingSalvage !== 0) {
    add(k, { machine: "EXISTING", kind: "SALVAGE", amount: -existingSalvage });
  }

  if (k < horizonYears) {
    add(k, { machine: "NEW", kind: "PURCHASE", amount: newMachine.purchaseCost });

    const serviceYears = horizonYears - k;
    for (let serviceYear = 1; serviceYear <= serviceYears; serviceYear++) {
      add(operatingCostYear(k, serviceYear, operatingCostTiming), {
        machine: "NEW",
        kind: "OPERATING",
        amount: operatingCostForServiceYear(newMachine.annualOperatingCost, serviceYear),
      });
    }

    const newSalvage = salvageAtAge(newMachine, serviceYears);
    if (newSalvage !== 0) {
      add(horizonYears, { machine: "NEW", kind: "SALVAGE", amount: -newSalvage });
    }
  }

  return byYear.map((components, year) => ({
    year,
    amount: components.reduce((sum, c) => sum + c.amount, 0),
    components,
  }));
}

/**
 * Cash flows for strategy k, one entry per year 0..horizonYears.
 * Throws ConfigurationError for invalid params and StrategyRangeError for k
 * outside [0, horizonYears].
 */
export function buildCashFlows(params: EconomicParameters, k: number): CashFlowEntry[] {
  assertValidParameters(params);
  if (!Number.isInteger(k) || k < 0 || k > params.horizonYears) {
    throw new StrategyRangeError(k, params.horizonYears);
  }
  return buildStrategyCashFlows(params, k);
}
