/**
 * Chart-ready series derived from a projection, keyed by age for the x-axis.
 */

import type { MonthRow, PolicyProjection } from "@/lib/model/engine";

export interface IncomeComparisonPoint {
  age: number;
  primary: number;
  hybrid: number;
}

export interface CorpusPoint {
  age: number;
  accumulationBalance: number;
  /** null before the transition so the line starts where withdrawals begin. */
  withdrawalBalance: number | null;
}

export interface IncomeBreakdownPoint {
  age: number;
  benefit: number;
  payout: number;
  total: number;
}

export interface PolicyChartSeries {
  monthlyIncome: IncomeComparisonPoint[];
  cumulativeIncome: IncomeComparisonPoint[];
  corpus: CorpusPoint[];
  /** Withdrawal phase only; empty when withdrawals never start. */
  incomeBreakdown: IncomeBreakdownPoint[];
  /** Reference line where the SIP ends and the SWP starts. */
  withdrawalStartAge: number;
}

/** Rows at or after the transition (monthIndex >= accumulationMonths). */
export function getWithdrawalPhaseRows(projection: PolicyProjection): MonthRow[] {
  return projection.monthRows.filter(
    (row) => row.monthIndex >= projection.accumulationMonths
  );
}

export function buildChartSeries(projection: PolicyProjection): PolicyChartSeries {
  const { monthRows, parameters, accumulationMonths } = projection;

  const monthlyIncome = monthRows.map((row) => ({
    age: row.age,
    primary: row.primaryMonthlyIncome,
    hybrid: row.hybridMonthlyIncome,
  }));

  const cumulativeIncome = monthRows.map((row) => ({
    age: row.age,
    primary: row.primaryCumulativeIncome,
    hybrid: row.hybridCumulativeIncome,
  }));

  const corpus = monthRows.map((row) => ({
    age: row.age,
    accumulationBalance: row.accumulationBalance,
    withdrawalBalance:
      row.monthIndex >= accumulationMonths ? row.withdrawalBalance : null,
  }));

  const incomeBreakdown = getWithdrawalPhaseRows(projection).map((row) => ({
    age: row.age,
    benefit: row.benefitReceived,
    payout: row.withdrawalPayout,
    total: row.hybridMonthlyIncome,
  }));

  return {
    monthlyIncome,
    cumulativeIncome,
    corpus,
    incomeBreakdown,
    withdrawalStartAge: parameters.currentAge + parameters.accumulationYears,
  };
}
