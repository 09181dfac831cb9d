/**
 * Zustand store acting as the parameter source: parameters, display options and the
 * projection computed from them. Each caller creates its own store; the engine never
 * reads store state.
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import type { ZodError } from "zod";
import type { DisplayOptions, PolicyParameters } from "@/lib/types/zod";
import { DisplayOptionsSchema, PolicyParametersSchema } from "@/lib/types/zod";
import { simulatePolicy, type MonthRow, type PolicyProjection } from "@/lib/model/engine";
import {
  InvalidParametersError,
  type ValidationError,
  type ValidationResult,
} from "@/lib/model/validation";
import { summarizeProjection, type ProjectionSummary } from "@/lib/model/summary";
import {
  DEFAULT_ACCUMULATION_RATE,
  DEFAULT_ACCUMULATION_YEARS,
  DEFAULT_CURRENT_AGE,
  DEFAULT_DECUMULATION_GROWTH_RATE,
  DEFAULT_INITIAL_WITHDRAWAL_RATE,
  DEFAULT_MONTHLY_BENEFIT,
  DEFAULT_PAYOUT_GROWTH_RATE,
  DEFAULT_POLICY_END_AGE,
} from "@/lib/model/constants";
import { getTableRows } from "@/lib/export/projectionToCsv";
import { diffParameters, type ParameterChange } from "@/lib/utils/parameter-diff";

// --- Defaults ---

export function createDefaultParameters(): PolicyParameters {
  return PolicyParametersSchema.parse({
    currentAge: DEFAULT_CURRENT_AGE,
    policyEndAge: DEFAULT_POLICY_END_AGE,
    monthlyBenefit: DEFAULT_MONTHLY_BENEFIT,
    accumulationYears: DEFAULT_ACCUMULATION_YEARS,
    accumulationAnnualRate: DEFAULT_ACCUMULATION_RATE,
    decumulationAnnualGrowthRate: DEFAULT_DECUMULATION_GROWTH_RATE,
    initialWithdrawalRate: DEFAULT_INITIAL_WITHDRAWAL_RATE,
    payoutGrowthRate: DEFAULT_PAYOUT_GROWTH_RATE,
  });
}

const EMPTY_VALIDATION: ValidationResult = { errors: [], warnings: [] };

/** Map zod issues to INVALID_INPUT errors and log the rejection. */
function rejectInput(error: ZodError): ValidationError[] {
  const errors = error.issues.map((issue) => ({
    code: "INVALID_INPUT",
    message: `${issue.path.join(".")}: ${issue.message}`,
  }));
  console.warn("[Projection] Rejected parameter input:", errors.map((e) => e.message));
  return errors;
}

// --- Store state ---

export interface PolicyState {
  /** Last accepted parameters; rejected input never replaces them. */
  parameters: PolicyParameters;
  displayOptions: DisplayOptions;
  /** Null while validation errors block a run, including rejected input. */
  projection: PolicyProjection | null;
  summary: ProjectionSummary | null;
  validation: ValidationResult;
  /** Parameters/summary before the last change; used for the What Changed panel. */
  previousParameters: PolicyParameters | null;
  previousSummary: ProjectionSummary | null;
}

export interface PolicyActions {
  setParameters: (patch: Partial<PolicyParameters>) => void;
  resetParameters: () => void;
  setDisplayOptions: (patch: Partial<DisplayOptions>) => void;
  clearComparison: () => void;
  recomputeProjection: () => void;
}

export type PolicyStore = PolicyState & PolicyActions;

export function createPolicyStore(
  initialParameters?: Partial<PolicyParameters>
): StoreApi<PolicyStore> {
  const initial = PolicyParametersSchema.safeParse({
    ...createDefaultParameters(),
    ...initialParameters,
  });
  const initialErrors = initial.success ? [] : rejectInput(initial.error);

  const store = createStore<PolicyStore>()((set, get) => ({
    parameters: initial.success ? initial.data : createDefaultParameters(),
    displayOptions: DisplayOptionsSchema.parse({}),
    projection: null,
    summary: null,
    validation: EMPTY_VALIDATION,
    previousParameters: null,
    previousSummary: null,

    setParameters: (patch) => {
      const parsed = PolicyParametersSchema.safeParse({
        ...get().parameters,
        ...patch,
      });
      if (!parsed.success) {
        set({
          projection: null,
          summary: null,
          validation: { errors: rejectInput(parsed.error), warnings: [] },
        });
        return;
      }

      const { parameters, summary } = get();
      set({
        previousParameters: parameters,
        previousSummary: summary,
        parameters: parsed.data,
        projection: null,
        summary: null,
      });
      get().recomputeProjection();
    },

    resetParameters: () => {
      get().setParameters(createDefaultParameters());
    },

    setDisplayOptions: (patch) => {
      set((state) => ({
        displayOptions: DisplayOptionsSchema.parse({
          ...state.displayOptions,
          ...patch,
        }),
      }));
    },

    clearComparison: () => {
      set({ previousParameters: null, previousSummary: null });
    },

    recomputeProjection: () => {
      const { parameters } = get();
      try {
        const projection = simulatePolicy(parameters);
        set({
          projection,
          summary: summarizeProjection(projection),
          validation: { errors: [], warnings: projection.warnings },
        });
      } catch (err) {
        if (err instanceof InvalidParametersError) {
          console.warn(
            "[Projection] Invalid parameters:",
            err.errors.map((e) => e.code).join(", ")
          );
          set({
            projection: null,
            summary: null,
            validation: { errors: err.errors, warnings: [] },
          });
          return;
        }
        console.error("[Projection] Simulation failed:", err);
        throw err;
      }
    },
  }));

  if (initialErrors.length > 0) {
    store.setState({ validation: { errors: initialErrors, warnings: [] } });
  } else {
    store.getState().recomputeProjection();
  }
  return store;
}

// --- Selectors ---

/** Rows for the detailed table honoring the showFullTable option. */
export function selectTableRows(state: PolicyState): MonthRow[] {
  if (!state.projection) return [];
  return getTableRows(state.projection, state.displayOptions);
}

/** Parameter changes since the previous run; empty when there is nothing to compare. */
export function selectParameterChanges(state: PolicyState): ParameterChange[] {
  if (!state.previousParameters) return [];
  return diffParameters(state.previousParameters, state.parameters);
}
