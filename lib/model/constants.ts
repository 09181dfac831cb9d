/**
 * Default constants for the hybrid policy model.
 */

/** Starting age, years. */
export const DEFAULT_CURRENT_AGE = 40;

/** Policy end age, years. */
export const DEFAULT_POLICY_END_AGE = 85;

/** Monthly survival benefit. */
export const DEFAULT_MONTHLY_BENEFIT = 10_000;

/** Length of the accumulation (SIP) phase, years. */
export const DEFAULT_ACCUMULATION_YEARS = 12;

/** Accumulation return, decimal. Default 15%. */
export const DEFAULT_ACCUMULATION_RATE = 0.15;

/** Withdrawal corpus growth, decimal. Default 15%. */
export const DEFAULT_DECUMULATION_GROWTH_RATE = 0.15;

/** First-year withdrawal rate on the transferred corpus, decimal. Default 12%. */
export const DEFAULT_INITIAL_WITHDRAWAL_RATE = 0.12;

/** Annual payout escalation, decimal. Default 5%. */
export const DEFAULT_PAYOUT_GROWTH_RATE = 0.05;

export const MONTHS_PER_YEAR = 12;

/** Longest policy term accepted by the engine, years. */
export const MAX_POLICY_YEARS = 100;

/** Age bounds accepted for either end of the policy. */
export const MIN_AGE = 1;
export const MAX_AGE = 120;

/** Growth rates (accumulation, corpus) must fall within these bounds. */
export const MIN_GROWTH_RATE = -0.5;
export const MAX_GROWTH_RATE = 1;

/** Growth rates above this produce an AGGRESSIVE_RETURNS warning. */
export const AGGRESSIVE_RATE_THRESHOLD = 0.2;

/** Rows shown in the detailed table when the full table is not requested (two policy years). */
export const TABLE_PREVIEW_MONTHS = 24;
