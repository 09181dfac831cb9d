/**
 * Golden parameter sets for engine, export and store tests.
 * Rates of 0 keep the arithmetic exact so expected values can be written by hand.
 */

import type { PolicyParameters } from "@/lib/types/zod";
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

function createParameters(overrides?: Partial<PolicyParameters>): PolicyParameters {
  return {
    currentAge: DEFAULT_CURRENT_AGE,
    policyEndAge: DEFAULT_POLICY_END_AGE,
    monthlyBenefit: DEFAULT_MONTHLY_BENEFIT,
    accumulationYears: DEFAULT_ACCUMULATION_YEARS,
    accumulationAnnualRate: DEFAULT_ACCUMULATION_RATE,
    decumulationAnnualGrowthRate: DEFAULT_DECUMULATION_GROWTH_RATE,
    initialWithdrawalRate: DEFAULT_INITIAL_WITHDRAWAL_RATE,
    payoutGrowthRate: DEFAULT_PAYOUT_GROWTH_RATE,
    ...overrides,
  };
}

/** Long-horizon defaults: 45-year term, 12 years of SIP. */
export function getDefaultScenario(): PolicyParameters {
  return createParameters();
}

/** One-year term with no accumulation: the corpus starts empty and never pays. */
export function getNoAccumulationScenario(): PolicyParameters {
  return createParameters({
    policyEndAge: 41,
    accumulationYears: 0,
    accumulationAnnualRate: 0,
    decumulationAnnualGrowthRate: 0,
    initialWithdrawalRate: 0.12,
    payoutGrowthRate: 0,
  });
}

/** Accumulation spans the whole one-year term at 1% a month. */
export function getAccumulationOnlyScenario(): PolicyParameters {
  return createParameters({
    policyEndAge: 41,
    monthlyBenefit: 100,
    accumulationYears: 1,
    accumulationAnnualRate: 0.12,
  });
}

/**
 * Three-year term, one year of SIP at 0%: 12,000 transferred, 120/month in withdrawal
 * year 1, escalated by 50% to 180/month in year 2.
 */
export function getEscalationScenario(): PolicyParameters {
  return createParameters({
    policyEndAge: 43,
    monthlyBenefit: 1_000,
    accumulationYears: 1,
    accumulationAnnualRate: 0,
    decumulationAnnualGrowthRate: 0,
    initialWithdrawalRate: 0.12,
    payoutGrowthRate: 0.5,
  });
}

/**
 * Three-year term, 12,000 transferred, 900/month in year 1 leaves 1,200. The year-2
 * target of 1,350 exceeds it, so month 24 pays the remaining 1,200 and depletes the corpus.
 */
export function getDepletionScenario(): PolicyParameters {
  return createParameters({
    policyEndAge: 43,
    monthlyBenefit: 1_000,
    accumulationYears: 1,
    accumulationAnnualRate: 0,
    decumulationAnnualGrowthRate: 0,
    initialWithdrawalRate: 0.9,
    payoutGrowthRate: 0.5,
  });
}
