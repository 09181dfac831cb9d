/**
 * Detailed month-by-month table and CSV export.
 * Amounts are written with two decimals and no grouping for spreadsheet compatibility.
 */

import type { MonthRow, PolicyProjection } from "@/lib/model/engine";
import type { DisplayOptions } from "@/lib/types/zod";
import { TABLE_PREVIEW_MONTHS } from "@/lib/model/constants";

type ColumnFormat = "integer" | "amount" | "text";

interface TableColumn {
  key: keyof MonthRow;
  header: string;
  format: ColumnFormat;
}

export const TABLE_COLUMNS: readonly TableColumn[] = [
  { key: "monthIndex", header: "Month", format: "integer" },
  { key: "age", header: "Age", format: "amount" },
  { key: "policyYear", header: "Policy year", format: "integer" },
  { key: "monthInPolicyYear", header: "Month in year", format: "integer" },
  { key: "phase", header: "Phase", format: "text" },
  { key: "primaryMonthlyIncome", header: "Primary monthly income", format: "amount" },
  { key: "primaryCumulativeIncome", header: "Primary cumulative income", format: "amount" },
  { key: "benefitReceived", header: "Benefit received", format: "amount" },
  { key: "contribution", header: "SIP investment", format: "amount" },
  { key: "accumulationBalance", header: "SIP corpus (end of month)", format: "amount" },
  { key: "withdrawalPayout", header: "SWP payout", format: "amount" },
  { key: "withdrawalBalance", header: "SWP corpus (end of month)", format: "amount" },
  { key: "hybridMonthlyIncome", header: "Hybrid monthly income", format: "amount" },
  { key: "hybridCumulativeIncome", header: "Hybrid cumulative income", format: "amount" },
  { key: "withdrawalYear", header: "SWP year", format: "integer" },
  { key: "targetPayout", header: "Target SWP payout", format: "amount" },
];

/** Escape a CSV field (wrap in quotes if it contains comma, newline, or quote). */
function escapeCsvField(value: string): string {
  if (/[",\n\r]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatCell(value: MonthRow[keyof MonthRow], format: ColumnFormat): string {
  if (typeof value === "string") return escapeCsvField(value);
  switch (format) {
    case "integer":
      return String(Math.round(value));
    case "amount":
      return value.toFixed(2);
    default:
      return String(value);
  }
}

/** Rows for the detailed table: two policy years unless the full table is requested. */
export function getTableRows(
  projection: PolicyProjection,
  options: DisplayOptions
): MonthRow[] {
  if (options.showFullTable) return projection.monthRows;
  return projection.monthRows.slice(0, TABLE_PREVIEW_MONTHS);
}

export function rowToCells(row: MonthRow): string[] {
  return TABLE_COLUMNS.map((col) => formatCell(row[col.key], col.format));
}

/**
 * Serialize a projection (or a selection of its rows) to CSV.
 */
export function projectionToCsv(
  projection: PolicyProjection,
  rows: MonthRow[] = projection.monthRows
): string {
  const lines: string[] = [
    TABLE_COLUMNS.map((col) => escapeCsvField(col.header)).join(","),
  ];
  for (const row of rows) {
    lines.push(rowToCells(row).join(","));
  }
  return lines.join("\n");
}
