/**
 * Replacement analysis engine.
 * Evaluates every keep-then-replace strategy k = 0..horizon, discounts each
 * cash-flow sequence to a present worth cost (PWC) and ranks them.
 */

import type { EconomicParameters } from "@/lib/types/zod";
import {
  buildStrategyCashFlows,
  type CashFlowComponent,
  type CashFlowEntry,
} from "./cash-flows";
import { PWC_TIE_TOLERANCE } from "./constants";
import { isStrategyFeasible } from "./machine-profile";
import { assertValidParameters, type ValidationWarning } from "./validation";

export interface DiscountedCashFlowEntry extends CashFlowEntry {
  readonly discountFactor: number;
  readonly presentValue: number;
}

export interface StrategyResult {
  /** Years the existing machine is kept before replacement. */
  readonly k: number;
  /** False when either machine would exceed its maxServiceYears under this k. */
  readonly feasible: boolean;
  /** 1-based position in the ranking. */
  readonly rank: number;
  readonly cashFlows: readonly DiscountedCashFlowEntry[];
  /** Discounted costs net of discounted salvage. Lower is better. */
  readonly presentWorthCost: number;
  /** Discounted costs only (purchases and operating costs). */
  readonly presentWorthOfCosts: number;
  /** Discounted salvage recovered, as a positive number. */
  readonly presentWorthOfSalvage: number;
  /** Signed with inflows positive: -presentWorthCost. */
  readonly netPresentValue: number;
  readonly undiscountedTotal: number;
}

export interface StrategyEvaluation {
  readonly parameters: EconomicParameters;
  /** One result per k, in k order. */
  readonly strategies: readonly StrategyResult[];
  /** Same results ranked: feasible by ascending PWC (ties → smaller k), then infeasible by k. */
  readonly ranked: readonly StrategyResult[];
  /** Recommended strategy: the top-ranked result. */
  readonly best: StrategyResult;
  readonly warnings: readonly ValidationWarning[];
}

/** 1 / (1 + rate)^year */
export function discountFactor(year: number, rate: number): number {
  return 1 / Math.pow(1 + rate, year);
}

/** Present value at t = 0 of `amount` occurring at `year`. */
export function presentWorth(amount: number, year: number, rate: number): number {
  return amount / Math.pow(1 + rate, year);
}

function sumComponents(
  entries: readonly CashFlowEntry[],
  rate: number,
  include: (c: CashFlowComponent) => boolean
): number {
  let total = 0;
  for (const entry of entries) {
    for (const c of entry.components) {
      if (include(c)) total += presentWorth(c.amount, entry.year, rate);
    }
  }
  return total;
}

type UnrankedResult = Omit<StrategyResult, "rank">;

function discountStrategy(
  params: EconomicParameters,
  k: number,
  entries: CashFlowEntry[]
): UnrankedResult {
  const rate = params.interestRate;
  const cashFlows = entries.map((entry) => ({
    ...entry,
    discountFactor: discountFactor(entry.year, rate),
    presentValue: presentWorth(entry.amount, entry.year, rate),
  }));
  const presentWorthCost = cashFlows.reduce((sum, e) => sum + e.presentValue, 0);

  return {
    k,
    feasible: isStrategyFeasible(params, k),
    cashFlows,
    presentWorthCost,
    presentWorthOfCosts: sumComponents(entries, rate, (c) => c.kind !== "SALVAGE"),
    presentWorthOfSalvage: -sumComponents(entries, rate, (c) => c.kind === "SALVAGE"),
    netPresentValue: -presentWorthCost,
    undiscountedTotal: entries.reduce((sum, e) => sum + e.amount, 0),
  };
}

/** True when two PWCs are equal up to float noise at their magnitude. */
export function isPresentWorthTie(a: number, b: number): boolean {
  return Math.abs(a - b) <= PWC_TIE_TOLERANCE * Math.max(Math.abs(a), Math.abs(b), 1);
}

function compareStrategies(a: UnrankedResult, b: UnrankedResult): number {
  if (a.feasible !== b.feasible) return a.feasible ? -1 : 1;
  if (a.feasible && !isPresentWorthTie(a.presentWorthCost, b.presentWorthCost)) {
    return a.presentWorthCost - b.presentWorthCost;
  }
  return a.k - b.k;
}

/**
 * Evaluate all strategies k = 0..horizonYears.
 * Throws ConfigurationError before building anything if params are invalid.
 */
export function evaluateStrategies(params: EconomicParameters): StrategyEvaluation {
  const warnings = [...assertValidParameters(params)];

  const unranked: UnrankedResult[] = [];
  for (let k = 0; k <= params.horizonYears; k++) {
    unranked.push(discountStrategy(params, k, buildStrategyCashFlows(params, k)));
  }

  const order = [...unranked].sort(compareStrategies);
  const rankByK = new Map(order.map((r, i) => [r.k, i + 1]));
  const strategies: StrategyResult[] = unranked.map((r) => ({
    ...r,
    rank: rankByK.get(r.k) ?? order.length,
  }));
  const ranked = [...strategies].sort((a, b) => a.rank - b.rank);

  // Validation rejects inputs with no feasible k, so ranked[0] is feasible
  const best = ranked[0];
  if (!best) {
    throw new Error("Evaluation produced no strategies");
  }

  for (const r of strategies) {
    if (r.presentWorthCost < 0) {
      warnings.push({
        code: "NEGATIVE_PRESENT_WORTH_COST",
        message: `Strategy k=${r.k} recovers more than it spends (PWC ${r.presentWorthCost.toFixed(2)})—check salvage inputs`,
      });
    }
  }

  return { parameters: params, strategies, ranked, best, warnings };
}

/** Strategy result for a given k, or null when k is outside the horizon. */
export function getStrategy(
  evaluation: StrategyEvaluation,
  k: number
): StrategyResult | null {
  return evaluation.strategies.find((r) => r.k === k) ?? null;
}
