/**
 * Validation and guardrails for a policy parameter set.
 * Hard errors block the simulation; soft warnings allow it.
 */

import type { PolicyParameters } from "@/lib/types/zod";
import {
  AGGRESSIVE_RATE_THRESHOLD,
  MAX_AGE,
  MIN_AGE,
  MAX_GROWTH_RATE,
  MAX_POLICY_YEARS,
  MIN_GROWTH_RATE,
  MONTHS_PER_YEAR,
} from "@/lib/model/constants";
import { formatPercent } from "@/lib/utils/format";

export interface ValidationError {
  code: string;
  message: string;
}

export interface ValidationWarning {
  code: string;
  message: string;
}

export interface ValidationResult {
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

/** Thrown by the engine when a parameter set fails validation. */
export class InvalidParametersError extends Error {
  readonly errors: ValidationError[];

  constructor(errors: ValidationError[]) {
    super(
      `Invalid policy parameters: ${errors.map((e) => e.message).join("; ")}`
    );
    this.name = "InvalidParametersError";
    this.errors = errors;
  }
}

function isWholeNumber(value: number): boolean {
  return Number.isInteger(value);
}

function inRange(value: number, min: number, max: number): boolean {
  return Number.isFinite(value) && value >= min && value <= max;
}

/**
 * Validate a parameter set for an engine run.
 */
export function validatePolicyParameters(
  params: PolicyParameters
): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  const agesValid =
    isWholeNumber(params.currentAge) &&
    isWholeNumber(params.policyEndAge) &&
    inRange(params.currentAge, MIN_AGE, MAX_AGE) &&
    inRange(params.policyEndAge, MIN_AGE, MAX_AGE);
  if (!agesValid) {
    errors.push({
      code: "INVALID_AGE",
      message: `Ages must be whole years between ${MIN_AGE} and ${MAX_AGE} (got ${params.currentAge} to ${params.policyEndAge})`,
    });
  }

  const termYears = params.policyEndAge - params.currentAge;
  if (agesValid && termYears <= 0) {
    errors.push({
      code: "INVALID_POLICY_TERM",
      message: `Policy end age (${params.policyEndAge}) must be after current age (${params.currentAge})`,
    });
  } else if (agesValid && termYears > MAX_POLICY_YEARS) {
    errors.push({
      code: "POLICY_TERM_TOO_LONG",
      message: `Policy term of ${termYears} years exceeds the ${MAX_POLICY_YEARS}-year limit`,
    });
  }

  const accumulationValid =
    isWholeNumber(params.accumulationYears) && params.accumulationYears >= 0;
  if (!accumulationValid) {
    errors.push({
      code: "INVALID_ACCUMULATION_YEARS",
      message: `Accumulation duration must be a whole number of years, 0 or more (got ${params.accumulationYears})`,
    });
  } else if (agesValid && termYears > 0 && params.accumulationYears > termYears) {
    errors.push({
      code: "ACCUMULATION_EXCEEDS_TERM",
      message: `Accumulation duration (${params.accumulationYears} years) is longer than the policy term (${termYears} years)`,
    });
  }

  if (!Number.isFinite(params.monthlyBenefit) || params.monthlyBenefit < 0) {
    errors.push({
      code: "INVALID_BENEFIT",
      message: `Monthly benefit must be 0 or more (got ${params.monthlyBenefit})`,
    });
  }

  if (
    !inRange(params.accumulationAnnualRate, MIN_GROWTH_RATE, MAX_GROWTH_RATE) ||
    !inRange(params.decumulationAnnualGrowthRate, MIN_GROWTH_RATE, MAX_GROWTH_RATE)
  ) {
    errors.push({
      code: "INVALID_GROWTH_RATES",
      message: `Accumulation return and corpus growth must be between ${formatPercent(MIN_GROWTH_RATE)} and ${formatPercent(MAX_GROWTH_RATE)}`,
    });
  }

  if (
    !inRange(params.initialWithdrawalRate, 0, 1) ||
    !inRange(params.payoutGrowthRate, 0, 1)
  ) {
    errors.push({
      code: "INVALID_WITHDRAWAL_RATES",
      message: "Initial withdrawal rate and payout growth must be between 0% and 100%",
    });
  }

  if (errors.length > 0) {
    return { errors, warnings };
  }

  const totalMonths = termYears * MONTHS_PER_YEAR;
  const accumulationMonths = params.accumulationYears * MONTHS_PER_YEAR;

  if (accumulationMonths === totalMonths) {
    warnings.push({
      code: "NO_WITHDRAWAL_PHASE",
      message: "Accumulation lasts the whole policy term: no withdrawals will be paid",
    });
  } else if (accumulationMonths === 0) {
    warnings.push({
      code: "NO_ACCUMULATION_PHASE",
      message: "No accumulation years: the withdrawal corpus starts empty and pays nothing",
    });
  }

  if (params.monthlyBenefit === 0) {
    warnings.push({
      code: "ZERO_BENEFIT",
      message: "Monthly benefit is 0: both scenarios produce no income",
    });
  }

  if (params.initialWithdrawalRate > params.decumulationAnnualGrowthRate) {
    warnings.push({
      code: "WITHDRAWAL_EXCEEDS_GROWTH",
      message: `Initial withdrawal rate (${formatPercent(params.initialWithdrawalRate)}) exceeds corpus growth (${formatPercent(params.decumulationAnnualGrowthRate)}); the corpus will shrink`,
    });
  }

  if (
    params.accumulationAnnualRate > AGGRESSIVE_RATE_THRESHOLD ||
    params.decumulationAnnualGrowthRate > AGGRESSIVE_RATE_THRESHOLD
  ) {
    warnings.push({
      code: "AGGRESSIVE_RETURNS",
      message: `Returns above ${formatPercent(AGGRESSIVE_RATE_THRESHOLD)} are aggressive; consider a conservative case`,
    });
  }

  return { errors, warnings };
}

/** Validate and throw when the parameter set cannot be simulated. */
export function assertValidPolicyParameters(
  params: PolicyParameters
): ValidationWarning[] {
  const { errors, warnings } = validatePolicyParameters(params);
  if (errors.length > 0) {
    throw new InvalidParametersError(errors);
  }
  return warnings;
}
