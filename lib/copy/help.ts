/**
 * Centralized help content for parameters and metrics.
 * Plain-language descriptions for non-experts.
 * Format: { title, description, example? }
 */

import type { PolicyParameters } from "@/lib/types/zod";

export type HelpEntry = {
  title: string;
  description: string;
  example?: string;
};

/** Format HelpEntry for tooltip content (description + optional example). */
export function formatHelpEntry(entry: HelpEntry): string {
  return entry.example
    ? `${entry.description} Example: ${entry.example}.`
    : entry.description;
}

/** Parameter help, one entry per input. */
export const HELP_PARAMETERS: Record<keyof PolicyParameters, HelpEntry> = {
  currentAge: {
    title: "Current age",
    description: "Your age in whole years when the policy starts paying the monthly benefit.",
    example: "40",
  },
  policyEndAge: {
    title: "Policy end age",
    description: "Age at which the policy stops paying. The projection runs every month up to this age.",
    example: "85",
  },
  monthlyBenefit: {
    title: "Monthly survival benefit",
    description: "Fixed amount the policy pays every month. Both scenarios receive it for the whole term.",
    example: "10,000",
  },
  accumulationYears: {
    title: "SIP duration",
    description: "Years during which the hybrid plan invests each benefit payment before withdrawals start.",
    example: "12",
  },
  accumulationAnnualRate: {
    title: "SIP annual return",
    description: "Expected yearly return on the invested benefits. Applied monthly as one twelfth of this rate.",
    example: "15%",
  },
  decumulationAnnualGrowthRate: {
    title: "SWP corpus annual growth",
    description: "Expected yearly growth of the corpus while withdrawals are being paid.",
    example: "15%",
  },
  initialWithdrawalRate: {
    title: "Initial annual withdrawal rate",
    description: "Share of the corpus paid out during the first withdrawal year, split into twelve equal monthly payouts.",
    example: "12% of a 5,000,000 corpus pays 50,000 a month",
  },
  payoutGrowthRate: {
    title: "Annual payout growth",
    description: "How much the monthly payout rises at each withdrawal anniversary. Payouts stop once the corpus runs out.",
    example: "5%",
  },
};

/** Metric help for the summary panel. */
export const HELP_METRICS = {
  primaryTotalIncome: {
    title: "Primary policy: total income",
    description: "Sum of every monthly benefit received when the benefit is simply taken as income.",
  },
  primaryFinalCorpus: {
    title: "Primary policy: final corpus",
    description: "The primary policy invests nothing, so no corpus is left at the end of the term.",
  },
  hybridTotalIncome: {
    title: "Hybrid policy: total income",
    description: "Benefits received plus every SWP payout over the policy term.",
  },
  hybridFinalCorpus: {
    title: "Hybrid policy: final corpus",
    description: "What is left in the withdrawal corpus at the end of the term. 0 when the corpus ran out.",
  },
  additionalIncome: {
    title: "Hybrid advantage",
    description: "Extra cumulative income from the hybrid plan compared with the primary policy alone, with the percentage difference.",
  },
} satisfies Record<string, HelpEntry>;
