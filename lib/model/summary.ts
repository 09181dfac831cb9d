/**
 * Key metrics for the primary-vs-hybrid comparison.
 * Accepts an empty row list (everything reads as 0 / null).
 */

import type { MonthRow, PolicyProjection } from "@/lib/model/engine";
import { HELP_METRICS, formatHelpEntry } from "@/lib/copy/help";
import { formatAmount } from "@/lib/utils/format";

export interface ProjectionSummary {
  primaryTotalIncome: number;
  /** The primary policy pays everything out; nothing is left over. */
  primaryFinalCorpus: number;
  hybridTotalIncome: number;
  hybridFinalCorpus: number;
  /** hybridTotalIncome - primaryTotalIncome. */
  additionalIncome: number;
  /** additionalIncome as a percent of primaryTotalIncome; 0 when the primary total is 0. */
  additionalIncomePercent: number;
  withdrawalStartAge: number;
  /** Corpus transferred at the transition; null without a withdrawal phase. */
  corpusAtTransition: number | null;
  firstTargetPayout: number | null;
  finalTargetPayout: number | null;
  depletionMonthIndex: number | null;
  depletionAge: number | null;
}

function lastRow(rows: MonthRow[]): MonthRow | undefined {
  return rows.length > 0 ? rows[rows.length - 1] : undefined;
}

export function percentOf(part: number, whole: number): number {
  return whole !== 0 ? (part / whole) * 100 : 0;
}

export function summarizeProjection(projection: PolicyProjection): ProjectionSummary {
  const { monthRows, parameters, transitionMonthIndex, depletionMonthIndex } = projection;
  const last = lastRow(monthRows);

  const primaryTotalIncome = last?.primaryCumulativeIncome ?? 0;
  const hybridTotalIncome = last?.hybridCumulativeIncome ?? 0;
  const additionalIncome = hybridTotalIncome - primaryTotalIncome;

  const transitionRow =
    transitionMonthIndex != null ? monthRows[transitionMonthIndex] : undefined;
  const depletionRow =
    depletionMonthIndex != null ? monthRows[depletionMonthIndex] : undefined;

  return {
    primaryTotalIncome,
    primaryFinalCorpus: 0,
    hybridTotalIncome,
    hybridFinalCorpus: last?.withdrawalBalance ?? 0,
    additionalIncome,
    additionalIncomePercent: percentOf(additionalIncome, primaryTotalIncome),
    withdrawalStartAge: parameters.currentAge + parameters.accumulationYears,
    corpusAtTransition: transitionRow?.openingWithdrawalBalance ?? null,
    firstTargetPayout: transitionRow?.targetPayout ?? null,
    finalTargetPayout:
      last != null && last.phase === "withdrawal" ? last.targetPayout : null,
    depletionMonthIndex: depletionRow?.monthIndex ?? null,
    depletionAge: depletionRow?.age ?? null,
  };
}

export interface SummaryMetric {
  key: keyof typeof HELP_METRICS;
  label: string;
  value: string;
  /** Percentage delta shown under the value, e.g. "+12.50%". */
  delta?: string;
  help: string;
}

function formatDelta(percent: number): string {
  const sign = percent > 0 ? "+" : "";
  return `${sign}${percent.toFixed(2)}%`;
}

/** Metric cards for the summary panel, in display order. */
export function getSummaryMetrics(summary: ProjectionSummary): SummaryMetric[] {
  const metric = (
    key: keyof typeof HELP_METRICS,
    value: number,
    delta?: string
  ): SummaryMetric => ({
    key,
    label: HELP_METRICS[key].title,
    value: formatAmount(value),
    delta,
    help: formatHelpEntry(HELP_METRICS[key]),
  });

  return [
    metric("primaryTotalIncome", summary.primaryTotalIncome),
    metric("primaryFinalCorpus", summary.primaryFinalCorpus),
    metric("hybridTotalIncome", summary.hybridTotalIncome),
    metric("hybridFinalCorpus", summary.hybridFinalCorpus),
    metric(
      "additionalIncome",
      summary.additionalIncome,
      formatDelta(summary.additionalIncomePercent)
    ),
  ];
}
