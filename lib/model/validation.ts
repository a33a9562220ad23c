/**
 * Validation and guardrails for replacement analysis parameters.
 */

import {
  EconomicParametersSchema,
  type EconomicParameters,
  type MachineProfile,
} from "@/lib/types/zod";
import { HIGH_INTEREST_RATE_THRESHOLD, MAX_HORIZON_YEARS } from "./constants";
import { ConfigurationError } from "./errors";
import {
  isStrategyFeasible,
  operatingCostForServiceYear,
  salvageAtAge,
} from "./machine-profile";

export interface ValidationError {
  code: string;
  message: string;
}

export interface ValidationWarning {
  code: string;
  message: string;
}

export interface ValidationResult {
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

const MACHINE_LABELS = {
  existingMachine: "Existing machine",
  newMachine: "New machine",
} as const;

function validateMachine(
  label: string,
  machine: MachineProfile,
  horizonYears: number,
  errors: ValidationError[]
): void {
  if (!Number.isFinite(machine.purchaseCost) || machine.purchaseCost < 0) {
    errors.push({
      code: "NEGATIVE_COST",
      message: `${label} purchase cost must be non-negative (got ${machine.purchaseCost})`,
    });
  }

  // Only the years the horizon can reach matter
  for (let serviceYear = 1; serviceYear <= horizonYears; serviceYear++) {
    const cost = operatingCostForServiceYear(machine.annualOperatingCost, serviceYear);
    if (!Number.isFinite(cost) || cost < 0) {
      errors.push({
        code: "NEGATIVE_COST",
        message: `${label} operating cost in service year ${serviceYear} must be non-negative (got ${cost})`,
      });
      break;
    }
  }

  for (let age = 0; age <= horizonYears; age++) {
    const salvage = salvageAtAge(machine, age);
    if (!Number.isFinite(salvage)) {
      errors.push({
        code: "INVALID_SALVAGE",
        message: `${label} salvage value at age ${age} is not a number`,
      });
      break;
    }
    if (salvage < 0) {
      errors.push({
        code: "NEGATIVE_SALVAGE",
        message: `${label} salvage value at age ${age} must be non-negative (got ${salvage})`,
      });
      break;
    }
  }

  if (
    machine.maxServiceYears != null &&
    (!Number.isInteger(machine.maxServiceYears) || machine.maxServiceYears < 0)
  ) {
    errors.push({
      code: "INVALID_MAX_SERVICE_YEARS",
      message: `${label} max service years must be a whole number ≥ 0 (got ${machine.maxServiceYears})`,
    });
  }
}

function hasFeasibleStrategy(params: EconomicParameters): boolean {
  for (let k = 0; k <= params.horizonYears; k++) {
    if (isStrategyFeasible(params, k)) return true;
  }
  return false;
}

/**
 * Validate parameters for an engine run.
 * Hard errors block evaluation; soft warnings allow it.
 */
export function validateParameters(params: EconomicParameters): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];
  const { interestRate, horizonYears } = params;

  const horizonValid =
    Number.isInteger(horizonYears) && horizonYears >= 1 && horizonYears <= MAX_HORIZON_YEARS;
  if (!horizonValid) {
    errors.push({
      code: "INVALID_HORIZON",
      message: `Horizon must be a whole number of years from 1 to ${MAX_HORIZON_YEARS} (got ${horizonYears})`,
    });
  }

  if (!Number.isFinite(interestRate) || interestRate <= -1) {
    errors.push({
      code: "INVALID_INTEREST_RATE",
      message: `Interest rate must be greater than -100% (got ${interestRate * 100}%)`,
    });
  } else if (interestRate < 0) {
    errors.push({
      code: "NEGATIVE_INTEREST_RATE",
      message: `Interest rate must not be negative (got ${interestRate * 100}%)`,
    });
  } else if (interestRate > HIGH_INTEREST_RATE_THRESHOLD) {
    warnings.push({
      code: "HIGH_INTEREST_RATE",
      message: `Interest rate above ${HIGH_INTEREST_RATE_THRESHOLD * 100}% heavily discounts later years`,
    });
  }

  // Machine checks walk the horizon, so skip them when it is unusable
  if (horizonValid) {
    for (const key of ["existingMachine", "newMachine"] as const) {
      validateMachine(MACHINE_LABELS[key], params[key], horizonYears, errors);
    }

    // Depreciation counts down from purchase cost, which is 0 for a machine already owned
    const existingSalvage = params.existingMachine.salvageValue;
    if (typeof existingSalvage !== "function" && existingSalvage.kind === "DEPRECIATION") {
      errors.push({
        code: "UNSUPPORTED_SALVAGE_SCHEDULE",
        message:
          "Existing machine salvage cannot be a depreciation schedule; use STRAIGHT_LINE, TABLE or CONSTANT from its current value",
      });
    }

    const capsValid = errors.every((e) => e.code !== "INVALID_MAX_SERVICE_YEARS");
    if (capsValid && !hasFeasibleStrategy(params)) {
      errors.push({
        code: "NO_FEASIBLE_STRATEGY",
        message: `No keep-then-replace strategy fits the service caps within a ${horizonYears}-year horizon`,
      });
    }
  }

  if (params.existingMachine.purchaseCost > 0) {
    warnings.push({
      code: "SUNK_COST_INCLUDED",
      message:
        "Existing machine has a purchase cost; it is charged at year 0 in every strategy and does not change the ranking",
    });
  }

  const { newMachine } = params;
  if (horizonValid && newMachine.purchaseCost >= 0) {
    for (let age = 0; age <= horizonYears; age++) {
      if (salvageAtAge(newMachine, age) > newMachine.purchaseCost) {
        warnings.push({
          code: "SALVAGE_EXCEEDS_PURCHASE",
          message: `New machine salvage at age ${age} exceeds its purchase cost—is that intentional?`,
        });
        break;
      }
    }
  }

  return { errors, warnings };
}

/** Throw ConfigurationError when params carry any hard error; return the warnings otherwise. */
export function assertValidParameters(params: EconomicParameters): ValidationWarning[] {
  const { errors, warnings } = validateParameters(params);
  if (errors.length > 0) throw new ConfigurationError(errors);
  return warnings;
}

/**
 * Parse raw input (form values, JSON) into EconomicParameters, applying defaults.
 * Throws ConfigurationError on shape or range problems.
 */
export function parseEconomicParameters(input: unknown): EconomicParameters {
  const parsed = EconomicParametersSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => ({
        code: "SCHEMA",
        message: issue.path.length
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message,
      }))
    );
  }
  assertValidParameters(parsed.data);
  return parsed.data;
}
