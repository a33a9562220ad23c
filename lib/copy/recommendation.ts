/**
 * Plain-language recommendation derived from the top-ranked strategy.
 */

import type { StrategyEvaluation } from "@/lib/model/engine";
import { formatCurrency, formatPercent } from "@/lib/utils/format";

export type RecommendationKind = "REPLACE_NOW" | "KEEP_THEN_REPLACE" | "KEEP";

export interface Recommendation {
  k: number;
  kind: RecommendationKind;
  presentWorthCost: number;
  sentence: string;
}

export function buildRecommendation(evaluation: StrategyEvaluation): Recommendation {
  const { best, parameters } = evaluation;
  const { k, presentWorthCost } = best;
  const rate = formatPercent(parameters.interestRate);
  const cost = `(present worth cost ≈ ${formatCurrency(presentWorthCost, { cents: true })})`;

  if (k === 0) {
    return {
      k,
      kind: "REPLACE_NOW",
      presentWorthCost,
      sentence: `At an interest rate of ${rate}, sell the existing machine now and purchase a new one immediately ${cost}.`,
    };
  }
  if (k >= parameters.horizonYears) {
    return {
      k,
      kind: "KEEP",
      presentWorthCost,
      sentence: `At an interest rate of ${rate}, keep the existing machine for the full ${parameters.horizonYears}-year horizon without replacing it ${cost}.`,
    };
  }
  return {
    k,
    kind: "KEEP_THEN_REPLACE",
    presentWorthCost,
    sentence: `At an interest rate of ${rate}, keep the existing machine for ${k} year(s) and purchase a new machine at the beginning of year ${k + 1} ${cost}.`,
  };
}
