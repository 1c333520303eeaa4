// loans/format.ts
// Summary rows -> display strings. Dollar columns: "$" + en-US grouping,
// whole dollars, half away from zero. Rate: two-decimal percent.

import type { DisplayRow, MetricKey, SummaryRow, SummaryTable } from "./types";

export const DOLLAR_COLUMNS = [
  "totalIssued",
  "fullyPaid",
  "current",
  "late",
  "chargedOffNet",
  "principalPaymentsReceived",
  "interestPaymentsReceived",
] as const satisfies readonly MetricKey[];

/** Column order of the rendered table. */
export const METRIC_COLUMNS: readonly MetricKey[] = [...DOLLAR_COLUMNS, "avgInterestRate"];

export const COLUMN_LABELS: Record<MetricKey, string> = {
  totalIssued: "Total Issued",
  fullyPaid: "Fully Paid",
  current: "Current",
  late: "Late",
  chargedOffNet: "Charged Off (Net)",
  principalPaymentsReceived: "Principal Payments Received",
  interestPaymentsReceived: "Interest Payments Received",
  avgInterestRate: "Avg. Interest Rate",
};

const MISSING = "—";

const wholeDollars = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

/** 1234567.4 -> "$1,234,567"; -425 -> "$-425". */
export function formatCurrency(x: number): string {
  if (!Number.isFinite(x)) return MISSING;
  const s = wholeDollars.format(x);
  // -0.4 rounds to "-0"
  return "$" + (s === "-0" ? "0" : s);
}

/** 0.1325 -> "13.25%". */
export function formatPercent(x: number): string {
  return Number.isFinite(x) ? (x * 100).toFixed(2) + "%" : MISSING;
}

export function formatRow(row: SummaryRow): DisplayRow {
  return {
    bucket: row.bucket,
    totalIssued: formatCurrency(row.totalIssued),
    fullyPaid: formatCurrency(row.fullyPaid),
    current: formatCurrency(row.current),
    late: formatCurrency(row.late),
    chargedOffNet: formatCurrency(row.chargedOffNet),
    principalPaymentsReceived: formatCurrency(row.principalPaymentsReceived),
    interestPaymentsReceived: formatCurrency(row.interestPaymentsReceived),
    avgInterestRate: formatPercent(row.avgInterestRate),
  };
}

export function formatTable(table: SummaryTable): DisplayRow[] {
  return table.rows.map(formatRow);
}
