/**
 * Export strategy results to CSV.
 * Summary: one row per strategy in rank order. Detail: one row per year of a strategy.
 */

import type { StrategyEvaluation, StrategyResult } from "@/lib/model/engine";

/** Escape a CSV field (wrap in quotes if it contains comma, newline, or quote). */
function escapeCsvField(value: string): string {
  if (/[",\n\r]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function toCsv(headers: string[], rows: (number | string)[][]): string {
  const lines = [headers.map(escapeCsvField).join(",")];
  for (const row of rows) {
    lines.push(
      row.map((c) => (typeof c === "number" ? String(c) : escapeCsvField(c))).join(",")
    );
  }
  return lines.join("\n");
}

const SUMMARY_HEADERS = [
  "Rank",
  "Keep existing (years) k",
  "Present worth cost",
  "Net present value",
  "PW of costs",
  "PW of salvage",
  "Feasible",
];

/** Serialize the ranked summary. Raw numbers for spreadsheet compatibility. */
export function strategiesSummaryToCsv(evaluation: StrategyEvaluation): string {
  return toCsv(
    SUMMARY_HEADERS,
    evaluation.ranked.map((r) => [
      r.rank,
      r.k,
      r.presentWorthCost,
      r.netPresentValue,
      r.presentWorthOfCosts,
      r.presentWorthOfSalvage,
      r.feasible ? "yes" : "no",
    ])
  );
}

const DETAIL_HEADERS = ["Year", "Cash flow", "Discount factor", "Present value"];

/** Serialize one strategy's year-by-year cash flows (costs +, salvage −). */
export function cashFlowsToCsv(result: StrategyResult): string {
  return toCsv(
    DETAIL_HEADERS,
    result.cashFlows.map((e) => [e.year, e.amount, e.discountFactor, e.presentValue])
  );
}

/** Detail tables for every strategy, each preceded by a "Strategy k = n" line. */
export function allCashFlowsToCsv(evaluation: StrategyEvaluation): string {
  return evaluation.strategies
    .map((r) => `Strategy k = ${r.k}\n${cashFlowsToCsv(r)}`)
    .join("\n\n");
}
