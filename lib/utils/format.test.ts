import { describe, it, expect } from "vitest";
import { formatCurrency, formatPercent } from "./format";

describe("format", () => {
  it("formats whole dollars by default and cents on request", () => {
    expect(formatCurrency(43759.858678)).toBe("$43,760");
    expect(formatCurrency(43759.858678, { cents: true })).toBe("$43,759.86");
    expect(formatCurrency(-900, { cents: true })).toBe("-$900.00");
  });

  it("formats rates with one decimal", () => {
    expect(formatPercent(0.1)).toBe("10.0%");
    expect(formatPercent(0.075)).toBe("7.5%");
  });
});
