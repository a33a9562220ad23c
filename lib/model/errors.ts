/**
 * Errors raised by the replacement analysis engine.
 * Both are deterministic given the same inputs; nothing here is retryable.
 */

import type { ValidationError } from "./validation";

/** The whole analysis was rejected before any strategy was built. */
export class ConfigurationError extends Error {
  readonly code = "CONFIGURATION_ERROR" as const;
  readonly issues: ValidationError[];

  constructor(issues: ValidationError[]) {
    super(
      issues.length === 1
        ? `Invalid analysis configuration: ${issues[0]?.message}`
        : `Invalid analysis configuration (${issues.length} issues): ${issues
            .map((i) => i.message)
            .join("; ")}`
    );
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/** A keep-duration outside [0, horizonYears] was requested of the cash-flow builder. */
export class StrategyRangeError extends RangeError {
  readonly code = "STRATEGY_RANGE_ERROR" as const;

  constructor(
    readonly k: number,
    readonly horizonYears: number
  ) {
    super(`Strategy k=${k} is outside the range 0..${horizonYears}`);
    this.name = "StrategyRangeError";
  }
}
