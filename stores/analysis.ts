/**
 * Zustand store for analysis inputs and the computed evaluation.
 * Every input change re-runs the pure engine; nothing else is cached.
 * Each call to createAnalysisStore owns its own state.
 */

import { createStore } from "zustand/vanilla";
import type { EconomicParametersInput, MachineProfileInput } from "@/lib/types/zod";
import { evaluateStrategies, type StrategyEvaluation } from "@/lib/model/engine";
import { ConfigurationError } from "@/lib/model/errors";
import { parseEconomicParameters, type ValidationError } from "@/lib/model/validation";
import { DEFAULT_HORIZON_YEARS, DEFAULT_INTEREST_RATE } from "@/lib/model/constants";

// --- Defaults ---

/** Worked case: 3-year-old machine vs. a $22k replacement with escalating costs. */
export function createDefaultInput(): EconomicParametersInput {
  return {
    interestRate: DEFAULT_INTEREST_RATE,
    horizonYears: DEFAULT_HORIZON_YEARS,
    operatingCostTiming: "BEGINNING_OF_YEAR",
    existingMachine: {
      purchaseCost: 0,
      annualOperatingCost: { first: 9000, increasePerYear: 2000 },
      salvageValue: { kind: "STRAIGHT_LINE", initialValue: 6000, lossPerYear: 2000 },
      maxServiceYears: 3,
    },
    newMachine: {
      purchaseCost: 22000,
      annualOperatingCost: { first: 6000, increasePerYear: 1000 },
      salvageValue: { kind: "DEPRECIATION", schedule: [3000, 3000, 4000] },
    },
  };
}

// --- Store state ---

export interface AnalysisState {
  input: EconomicParametersInput;
  evaluation: StrategyEvaluation | null;
  /** Issues from the last rejected evaluation; empty when it succeeded. */
  errors: ValidationError[];
  /** Evaluation before the last input change; used to show what changed. */
  previousEvaluation: StrategyEvaluation | null;
}

export interface AnalysisActions {
  setInput: (input: EconomicParametersInput) => void;
  updateInput: (
    patch: Partial<Omit<EconomicParametersInput, "existingMachine" | "newMachine">>
  ) => void;
  updateExistingMachine: (patch: Partial<MachineProfileInput>) => void;
  updateNewMachine: (patch: Partial<MachineProfileInput>) => void;
  resetToDefaults: () => void;
  recompute: () => void;
}

export type AnalysisStore = AnalysisState & AnalysisActions;

export function createAnalysisStore(initialInput: EconomicParametersInput = createDefaultInput()) {
  const store = createStore<AnalysisStore>()((set, get) => ({
    input: initialInput,
    evaluation: null,
    errors: [],
    previousEvaluation: null,

    setInput: (input) => {
      set({ input });
      get().recompute();
    },

    updateInput: (patch) => {
      set((state) => ({ input: { ...state.input, ...patch } }));
      get().recompute();
    },

    updateExistingMachine: (patch) => {
      set((state) => ({
        input: {
          ...state.input,
          existingMachine: { ...state.input.existingMachine, ...patch },
        },
      }));
      get().recompute();
    },

    updateNewMachine: (patch) => {
      set((state) => ({
        input: {
          ...state.input,
          newMachine: { ...state.input.newMachine, ...patch },
        },
      }));
      get().recompute();
    },

    resetToDefaults: () => {
      set({ input: createDefaultInput(), evaluation: null, previousEvaluation: null });
      get().recompute();
    },

    recompute: () => {
      const { input, evaluation } = get();
      try {
        const next = evaluateStrategies(parseEconomicParameters(input));
        set({
          evaluation: next,
          errors: [],
          previousEvaluation: evaluation ?? get().previousEvaluation,
        });
      } catch (error) {
        if (!(error instanceof ConfigurationError)) throw error;
        console.error("[Analysis] Evaluation rejected:", error.message);
        set({
          evaluation: null,
          errors: error.issues,
          previousEvaluation: evaluation ?? get().previousEvaluation,
        });
      }
    },
  }));

  store.getState().recompute();
  return store;
}
