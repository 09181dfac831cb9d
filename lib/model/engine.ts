/**
 * Hybrid policy projection engine.
 * Monthly simulation of two scenarios over the policy term:
 *  - primary: the survival benefit is received as income every month;
 *  - hybrid: the benefit is invested (SIP) during accumulation, then the corpus funds an
 *    escalating systematic withdrawal (SWP) while the benefit keeps being received.
 * Monthly rates are annual / 12 (simple division) in both phases.
 */

import type { PolicyParameters, PolicyPhase } from "@/lib/types/zod";
import { MONTHS_PER_YEAR } from "@/lib/model/constants";
import {
  assertValidPolicyParameters,
  type ValidationWarning,
} from "@/lib/model/validation";

export interface MonthRow {
  /** 0-based month of the policy term. */
  monthIndex: number;
  /** Age at the start of the month (fractional years). */
  age: number;
  policyYear: number;
  /** 1–12. */
  monthInPolicyYear: number;
  phase: PolicyPhase;
  primaryMonthlyIncome: number;
  primaryCumulativeIncome: number;
  benefitReceived: number;
  /** Amount invested this month; 0 once withdrawals start. */
  contribution: number;
  /** End-of-month accumulation balance. Frozen at its final value after the transition. */
  accumulationBalance: number;
  /** Withdrawal corpus at month start, after any transfer and before growth. 0 during accumulation. */
  openingWithdrawalBalance: number;
  withdrawalPayout: number;
  /** End-of-month withdrawal corpus. 0 during accumulation. */
  withdrawalBalance: number;
  hybridMonthlyIncome: number;
  hybridCumulativeIncome: number;
  /** Withdrawal year (1 from the transition month). 0 during accumulation. */
  withdrawalYear: number;
  /** Contracted monthly payout for the current withdrawal year. 0 during accumulation. */
  targetPayout: number;
}

export interface PolicyProjection {
  parameters: PolicyParameters;
  totalMonths: number;
  accumulationMonths: number;
  /** Month the corpus moved into withdrawal; null when accumulation spans the whole term. */
  transitionMonthIndex: number | null;
  /** First month a payout exhausted the corpus; null when it never ran out. */
  depletionMonthIndex: number | null;
  monthRows: MonthRow[];
  warnings: ValidationWarning[];
}

interface AccumulatingState {
  phase: "accumulation";
  accumulationBalance: number;
}

interface WithdrawingState {
  phase: "withdrawal";
  /** Final accumulation balance, kept for reporting. */
  accumulationBalance: number;
  withdrawalBalance: number;
  targetPayout: number;
  lastScheduledPayout: number;
  withdrawalYear: number;
  /** Set once a payout empties the corpus; it is never refilled. */
  depleted: boolean;
}

type HybridState = AccumulatingState | WithdrawingState;

interface MonthlyRates {
  accumulation: number;
  decumulation: number;
}

interface HybridStep {
  state: HybridState;
  contribution: number;
  openingWithdrawalBalance: number;
  payout: number;
  /** True when this month's payout emptied the corpus. */
  exhausted: boolean;
}

/** Annual rate to monthly rate by simple division. */
export function toMonthlyRate(annualRate: number): number {
  return annualRate / MONTHS_PER_YEAR;
}

/** Interest is credited on the opening balance before the contribution lands. */
function accumulate(
  state: AccumulatingState,
  contribution: number,
  monthlyRate: number
): AccumulatingState {
  const interest = state.accumulationBalance * monthlyRate;
  return {
    phase: "accumulation",
    accumulationBalance: state.accumulationBalance + interest + contribution,
  };
}

/** One-time transfer of the accumulated balance into the withdrawal corpus. */
function beginWithdrawal(
  state: AccumulatingState,
  initialWithdrawalRate: number
): WithdrawingState {
  const corpus = state.accumulationBalance;
  const targetPayout = (corpus * initialWithdrawalRate) / MONTHS_PER_YEAR;
  return {
    phase: "withdrawal",
    accumulationBalance: corpus,
    withdrawalBalance: corpus,
    targetPayout,
    lastScheduledPayout: targetPayout,
    withdrawalYear: 1,
    depleted: false,
  };
}

/** Anniversary escalation. Applies to a depleted corpus as well; the payout simply stays 0. */
function escalatePayout(
  state: WithdrawingState,
  payoutGrowthRate: number
): WithdrawingState {
  const targetPayout = state.lastScheduledPayout * (1 + payoutGrowthRate);
  return {
    ...state,
    targetPayout,
    lastScheduledPayout: targetPayout,
    withdrawalYear: state.withdrawalYear + 1,
  };
}

/** Grow the corpus one month, then pay the target or whatever is left. */
function withdraw(
  state: WithdrawingState,
  monthlyRate: number
): { state: WithdrawingState; payout: number; exhausted: boolean } {
  if (state.depleted || state.withdrawalBalance <= 0) {
    return { state: { ...state, withdrawalBalance: 0 }, payout: 0, exhausted: false };
  }

  const grown = state.withdrawalBalance + state.withdrawalBalance * monthlyRate;
  if (state.targetPayout >= grown) {
    return {
      state: { ...state, withdrawalBalance: 0, depleted: true },
      payout: grown,
      exhausted: true,
    };
  }

  const remaining = grown - state.targetPayout;
  return {
    state: { ...state, withdrawalBalance: Math.max(0, remaining) },
    payout: state.targetPayout,
    exhausted: false,
  };
}

/** Advance the hybrid scenario by one month. */
function stepHybrid(
  state: HybridState,
  monthIndex: number,
  accumulationMonths: number,
  params: PolicyParameters,
  rates: MonthlyRates
): HybridStep {
  if (state.phase === "accumulation" && monthIndex < accumulationMonths) {
    return {
      state: accumulate(state, params.monthlyBenefit, rates.accumulation),
      contribution: params.monthlyBenefit,
      openingWithdrawalBalance: 0,
      payout: 0,
      exhausted: false,
    };
  }

  let withdrawing =
    state.phase === "accumulation"
      ? beginWithdrawal(state, params.initialWithdrawalRate)
      : state;

  const monthsIntoWithdrawal = monthIndex - accumulationMonths;
  if (monthsIntoWithdrawal > 0 && monthsIntoWithdrawal % MONTHS_PER_YEAR === 0) {
    withdrawing = escalatePayout(withdrawing, params.payoutGrowthRate);
  }

  const openingWithdrawalBalance = withdrawing.withdrawalBalance;
  const result = withdraw(withdrawing, rates.decumulation);
  return {
    state: result.state,
    contribution: 0,
    openingWithdrawalBalance,
    payout: result.payout,
    exhausted: result.exhausted,
  };
}

/**
 * Run the month-by-month projection.
 * Throws InvalidParametersError before simulating when the parameter set is unusable.
 */
export function simulatePolicy(params: PolicyParameters): PolicyProjection {
  const warnings = assertValidPolicyParameters(params);

  const totalMonths = (params.policyEndAge - params.currentAge) * MONTHS_PER_YEAR;
  const accumulationMonths = params.accumulationYears * MONTHS_PER_YEAR;
  const rates: MonthlyRates = {
    accumulation: toMonthlyRate(params.accumulationAnnualRate),
    decumulation: toMonthlyRate(params.decumulationAnnualGrowthRate),
  };

  const monthRows: MonthRow[] = [];
  let primaryCumulativeIncome = 0;
  let hybridCumulativeIncome = 0;
  let depletionMonthIndex: number | null = null;
  let state: HybridState = { phase: "accumulation", accumulationBalance: 0 };

  for (let monthIndex = 0; monthIndex < totalMonths; monthIndex++) {
    const primaryMonthlyIncome = params.monthlyBenefit;
    primaryCumulativeIncome += primaryMonthlyIncome;

    const step = stepHybrid(state, monthIndex, accumulationMonths, params, rates);
    state = step.state;
    if (step.exhausted && depletionMonthIndex === null) {
      depletionMonthIndex = monthIndex;
    }

    const hybridMonthlyIncome = params.monthlyBenefit + step.payout;
    hybridCumulativeIncome += hybridMonthlyIncome;

    monthRows.push({
      monthIndex,
      age: params.currentAge + monthIndex / MONTHS_PER_YEAR,
      policyYear: Math.floor(monthIndex / MONTHS_PER_YEAR) + 1,
      monthInPolicyYear: (monthIndex % MONTHS_PER_YEAR) + 1,
      phase: state.phase,
      primaryMonthlyIncome,
      primaryCumulativeIncome,
      benefitReceived: params.monthlyBenefit,
      contribution: step.contribution,
      accumulationBalance: state.accumulationBalance,
      openingWithdrawalBalance: step.openingWithdrawalBalance,
      withdrawalPayout: step.payout,
      withdrawalBalance: state.phase === "withdrawal" ? state.withdrawalBalance : 0,
      hybridMonthlyIncome,
      hybridCumulativeIncome,
      withdrawalYear: state.phase === "withdrawal" ? state.withdrawalYear : 0,
      targetPayout: state.phase === "withdrawal" ? state.targetPayout : 0,
    });
  }

  return {
    parameters: { ...params },
    totalMonths,
    accumulationMonths,
    transitionMonthIndex: accumulationMonths < totalMonths ? accumulationMonths : null,
    depletionMonthIndex,
    monthRows,
    warnings,
  };
}
