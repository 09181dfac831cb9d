/**
 * Zod schemas for the hybrid policy planner.
 * Shapes only; range guardrails live in lib/model/validation.ts.
 */

import { z } from "zod";

export const PolicyParametersSchema = z.object({
  /** Age (whole years) at the first simulated month. */
  currentAge: z.number(),
  /** Age (whole years) at which the policy stops paying. */
  policyEndAge: z.number(),
  /** Survival benefit paid every month in both scenarios. */
  monthlyBenefit: z.number(),
  /** Whole years the benefit is invested before withdrawals start. */
  accumulationYears: z.number(),
  /** Annual return on the accumulation (SIP) balance, decimal. */
  accumulationAnnualRate: z.number(),
  /** Annual growth of the withdrawal (SWP) corpus, decimal. */
  decumulationAnnualGrowthRate: z.number(),
  /** Share of the transferred corpus paid out in the first withdrawal year, decimal. */
  initialWithdrawalRate: z.number(),
  /** Escalation of the target payout at each withdrawal anniversary, decimal. */
  payoutGrowthRate: z.number(),
});
export type PolicyParameters = z.infer<typeof PolicyParametersSchema>;

export const PolicyPhaseSchema = z.enum(["accumulation", "withdrawal"]);
export type PolicyPhase = z.infer<typeof PolicyPhaseSchema>;

/** Caller-supplied presentation settings. Never read by the engine. */
export const DisplayOptionsSchema = z.object({
  /** Show every month in the detailed table instead of the two-year preview. */
  showFullTable: z.boolean().default(false),
});
export type DisplayOptions = z.infer<typeof DisplayOptionsSchema>;
