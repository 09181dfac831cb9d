/**
 * Compare two parameter sets and produce human-readable changes for a "What changed" panel.
 */

import type { PolicyParameters } from "@/lib/types/zod";
import { HELP_PARAMETERS } from "@/lib/copy/help";
import { formatAmount, formatPercent } from "@/lib/utils/format";

export interface ParameterChange {
  key: keyof PolicyParameters;
  label: string;
  from: string;
  to: string;
}

/** Keys to compare (ordered as the inputs are laid out). */
const PARAMETER_KEYS: (keyof PolicyParameters)[] = [
  "currentAge",
  "policyEndAge",
  "monthlyBenefit",
  "accumulationYears",
  "accumulationAnnualRate",
  "decumulationAnnualGrowthRate",
  "initialWithdrawalRate",
  "payoutGrowthRate",
];

function formatValue(key: keyof PolicyParameters, value: number): string {
  switch (key) {
    case "currentAge":
    case "policyEndAge":
    case "accumulationYears":
      return `${value} years`;
    case "monthlyBenefit":
      return formatAmount(value);
    default:
      return formatPercent(value);
  }
}

/**
 * Diff two parameter sets and return the changed inputs with display labels.
 */
export function diffParameters(
  prev: PolicyParameters,
  next: PolicyParameters
): ParameterChange[] {
  const changes: ParameterChange[] = [];
  for (const key of PARAMETER_KEYS) {
    if (prev[key] === next[key]) continue;
    changes.push({
      key,
      label: HELP_PARAMETERS[key].title,
      from: formatValue(key, prev[key]),
      to: formatValue(key, next[key]),
    });
  }
  return changes;
}
