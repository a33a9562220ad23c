/**
 * Zod schemas for replacement analysis input.
 * Parsing applies the model defaults; range checks live in lib/model/validation.
 */

import { z } from "zod";
import {
  DEFAULT_HORIZON_YEARS,
  DEFAULT_INTEREST_RATE,
  DEFAULT_OPERATING_COST_TIMING,
} from "@/lib/model/constants";

const finite = () => z.number().finite();

/** Escalating cost: `first` in service year 1, then `increasePerYear` more each year. */
export const OperatingCostGradientSchema = z.object({
  first: finite(),
  increasePerYear: finite(),
});
export type OperatingCostGradient = z.infer<typeof OperatingCostGradientSchema>;

/** Constant per year, one value per service year (last repeats), or a gradient. */
export const OperatingCostSchema = z.union([
  finite(),
  z.array(finite()).min(1, "Operating cost schedule needs at least one year"),
  OperatingCostGradientSchema,
]);
export type OperatingCost = z.infer<typeof OperatingCostSchema>;

/**
 * Residual value by service age. TABLE and DEPRECIATION repeat their last entry
 * once the list runs out; DEPRECIATION subtracts cumulative depreciation from
 * the machine's purchase cost, so it only applies to the new machine.
 */
export const SalvageScheduleSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("CONSTANT"), value: finite() }),
  z.object({
    kind: z.literal("TABLE"),
    values: z.array(finite()).min(1, "Salvage table needs at least one entry"),
  }),
  z.object({
    kind: z.literal("STRAIGHT_LINE"),
    initialValue: finite(),
    lossPerYear: finite(),
  }),
  z.object({
    kind: z.literal("DEPRECIATION"),
    schedule: z.array(finite()).min(1, "Depreciation schedule needs at least one year"),
  }),
]);
export type SalvageSchedule = z.infer<typeof SalvageScheduleSchema>;

export const MachineProfileSchema = z.object({
  /** 0 for a machine already owned. */
  purchaseCost: finite().default(0),
  annualOperatingCost: OperatingCostSchema,
  salvageValue: SalvageScheduleSchema,
  /** Longest the machine can stay in service (from now, or from purchase for the new machine). */
  maxServiceYears: z.number().optional(),
});
export type MachineProfileInput = z.input<typeof MachineProfileSchema>;

export const OperatingCostTimingSchema = z.enum(["END_OF_YEAR", "BEGINNING_OF_YEAR"]);
export type OperatingCostTiming = z.infer<typeof OperatingCostTimingSchema>;

export const EconomicParametersSchema = z
  .object({
    interestRate: finite().default(DEFAULT_INTEREST_RATE),
    /** Range-checked (1..MAX_HORIZON_YEARS) by validateParameters. */
    horizonYears: z.number().default(DEFAULT_HORIZON_YEARS),
    operatingCostTiming: OperatingCostTimingSchema.default(DEFAULT_OPERATING_COST_TIMING),
    existingMachine: MachineProfileSchema,
    newMachine: MachineProfileSchema,
  })
  .readonly();
export type EconomicParametersInput = z.input<typeof EconomicParametersSchema>;

/** Salvage as a function of service age, for callers that compute it themselves. */
export type SalvageFunction = (age: number) => number;

export interface MachineProfile {
  readonly purchaseCost: number;
  readonly annualOperatingCost: OperatingCost;
  readonly salvageValue: SalvageSchedule | SalvageFunction;
  readonly maxServiceYears?: number;
}

/** Immutable input bundle for one analysis run. */
export interface EconomicParameters {
  readonly interestRate: number;
  readonly horizonYears: number;
  readonly operatingCostTiming: OperatingCostTiming;
  readonly existingMachine: MachineProfile;
  readonly newMachine: MachineProfile;
}
