/**
 * Default constants for the replacement analysis model.
 */

/** Discount (interest) rate per year, decimal. Default 10%. */
export const DEFAULT_INTEREST_RATE = 0.1;

/** Planning horizon in years over which all strategies are compared. */
export const DEFAULT_HORIZON_YEARS = 5;

/** Longest horizon accepted; evaluation work grows with its square. */
export const MAX_HORIZON_YEARS = 20;

/** When operating costs are recognized within each service year. */
export const DEFAULT_OPERATING_COST_TIMING = "END_OF_YEAR" as const;

/** Rates above this are accepted but flagged. */
export const HIGH_INTEREST_RATE_THRESHOLD = 0.5;

/**
 * Relative tolerance for PWC ties: a and b tie when
 * |a - b| <= PWC_TIE_TOLERANCE * max(|a|, |b|, 1).
 */
export const PWC_TIE_TOLERANCE = 1e-12;
