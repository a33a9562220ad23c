/**
 * Resolve parameters to the plain per-year values the engine uses.
 * Used for export so third-party validators see exactly what was evaluated,
 * including salvage supplied as a function.
 */

import type {
  EconomicParameters,
  MachineProfile,
  OperatingCostTiming,
} from "@/lib/types/zod";
import { operatingCostForServiceYear, salvageAtAge } from "./machine-profile";

export interface EffectiveMachineProfile {
  purchaseCost: number;
  /** Index 0 = service year 1. */
  operatingCostByServiceYear: number[];
  /** Index = age in years, 0..horizon. */
  salvageByAge: number[];
  maxServiceYears: number | null;
}

export interface EffectiveParameters {
  interestRate: number;
  horizonYears: number;
  operatingCostTiming: OperatingCostTiming;
  existingMachine: EffectiveMachineProfile;
  newMachine: EffectiveMachineProfile;
}

function resolveMachine(
  machine: MachineProfile,
  horizonYears: number
): EffectiveMachineProfile {
  const operatingCostByServiceYear: number[] = [];
  for (let serviceYear = 1; serviceYear <= horizonYears; serviceYear++) {
    operatingCostByServiceYear.push(
      operatingCostForServiceYear(machine.annualOperatingCost, serviceYear)
    );
  }
  const salvageByAge: number[] = [];
  for (let age = 0; age <= horizonYears; age++) {
    salvageByAge.push(salvageAtAge(machine, age));
  }
  return {
    purchaseCost: machine.purchaseCost,
    operatingCostByServiceYear,
    salvageByAge,
    maxServiceYears: machine.maxServiceYears ?? null,
  };
}

export function getEffectiveParameters(params: EconomicParameters): EffectiveParameters {
  return {
    interestRate: params.interestRate,
    horizonYears: params.horizonYears,
    operatingCostTiming: params.operatingCostTiming,
    existingMachine: resolveMachine(params.existingMachine, params.horizonYears),
    newMachine: resolveMachine(params.newMachine, params.horizonYears),
  };
}
