/**
 * Export an evaluation as JSON for third-party verification.
 * Parameters are resolved to effective per-year values so the export matches
 * exactly what evaluateStrategies used, salvage functions included.
 */

import type { StrategyEvaluation } from "@/lib/model/engine";
import {
  getEffectiveParameters,
  type EffectiveParameters,
} from "@/lib/model/effective-parameters";
import { buildRecommendation } from "@/lib/copy/recommendation";

export interface EvaluationExport {
  exportedAt: string;
  assumptions: EffectiveParameters;
  recommendation: string;
  bestK: number;
  strategies: {
    k: number;
    rank: number;
    feasible: boolean;
    presentWorthCost: number;
    netPresentValue: number;
    cashFlows: { year: number; amount: number; presentValue: number }[];
  }[];
  warnings: { code: string; message: string }[];
}

export function buildEvaluationExport(
  evaluation: StrategyEvaluation,
  exportedAt: Date = new Date()
): EvaluationExport {
  return {
    exportedAt: exportedAt.toISOString(),
    assumptions: getEffectiveParameters(evaluation.parameters),
    recommendation: buildRecommendation(evaluation).sentence,
    bestK: evaluation.best.k,
    strategies: evaluation.strategies.map((r) => ({
      k: r.k,
      rank: r.rank,
      feasible: r.feasible,
      presentWorthCost: r.presentWorthCost,
      netPresentValue: r.netPresentValue,
      cashFlows: r.cashFlows.map(({ year, amount, presentValue }) => ({
        year,
        amount,
        presentValue,
      })),
    })),
    warnings: evaluation.warnings.map(({ code, message }) => ({ code, message })),
  };
}

export function evaluationToJson(
  evaluation: StrategyEvaluation,
  exportedAt?: Date
): string {
  return JSON.stringify(buildEvaluationExport(evaluation, exportedAt), null, 2);
}
