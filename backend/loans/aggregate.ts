// loans/aggregate.ts
// Grade-bucketed loan outcome summary: seven dollar columns plus a
// principal-weighted average rate per bucket, and an "All" row last.
//
// Usage:
//   const table = aggregate(records);
//   table.rows.at(-1)  // { bucket: "All", totalIssued: ..., avgInterestRate: ... }

import type { CsvRow } from "../adapters/data/csv-feed";
import { isChargedOff, isCurrent, isFullyPaid, isLate } from "./status";
import { COLUMN_MAP, assertLoanRecord, parseGrade, toLoanRecord } from "./records";
import { ALL_BUCKET, type GradeBucket, type LoanRecord, type SummaryRow, type SummaryTable } from "./types";

/* =========================
   Helpers
   ========================= */

type Graded = LoanRecord & { grade: string };

const hasGrade = (r: LoanRecord): r is Graded => r.grade !== null;

/** Null cells are skipped, like a NaN-skipping column sum. */
function sumOf(rows: readonly LoanRecord[], pick: (r: LoanRecord) => number | null): number {
  let s = 0;
  for (const r of rows) {
    const v = pick(r);
    if (v !== null) s += v;
  }
  return s;
}

function byLabel(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** F and G share a bucket; every other grade is its own label. */
export function bucketOf(grade: string): GradeBucket {
  return grade === "F" || grade === "G" ? "FG" : grade;
}

/** Unrecovered balance: principal less payments, with interest and fees added back. */
export function chargedOffNet(r: LoanRecord): number {
  return (r.loanAmount ?? 0)
    - (r.totalPaymentsReceived ?? 0)
    + (r.totalInterestReceived ?? 0)
    + (r.totalLateFeesReceived ?? 0);
}

/** Σ(rate × amount) / Σ amount; NaN when nothing was issued. */
export function weightedRate(rows: readonly LoanRecord[]): number {
  const numerator = sumOf(rows, r =>
    r.interestRate === null || r.loanAmount === null ? null : r.interestRate * r.loanAmount);
  const denominator = sumOf(rows, r => r.loanAmount);
  return denominator === 0 ? NaN : numerator / denominator;
}

/* =========================
   Rows
   ========================= */

export function summarizeBucket(bucket: GradeBucket, rows: readonly LoanRecord[]): SummaryRow {
  const totalIssued = sumOf(rows, r => r.loanAmount);
  const fullyPaid = sumOf(rows.filter(r => isFullyPaid(r.loanStatus)), r => r.loanAmount);
  const current = sumOf(rows.filter(r => isCurrent(r.loanStatus)), r => r.outstandingPrincipal);
  const late = sumOf(rows.filter(r => isLate(r.loanStatus)), r => r.outstandingPrincipal);
  const chargedOff = sumOf(rows.filter(r => isChargedOff(r.loanStatus)), chargedOffNet);

  return {
    bucket,
    totalIssued,
    fullyPaid,
    current,
    late,
    chargedOffNet: chargedOff,
    principalPaymentsReceived: totalIssued - current - late - chargedOff,
    interestPaymentsReceived: sumOf(rows, r => r.totalInterestReceived),
    avgInterestRate: weightedRate(rows),
  };
}

/** Dollar columns add up across buckets; the rate comes from the full record set. */
export function totalRow(rows: readonly SummaryRow[], records: readonly LoanRecord[]): SummaryRow {
  const add = (pick: (r: SummaryRow) => number) => rows.reduce((s, r) => s + pick(r), 0);
  return {
    bucket: ALL_BUCKET,
    totalIssued: add(r => r.totalIssued),
    fullyPaid: add(r => r.fullyPaid),
    current: add(r => r.current),
    late: add(r => r.late),
    chargedOffNet: add(r => r.chargedOffNet),
    principalPaymentsReceived: add(r => r.principalPaymentsReceived),
    interestPaymentsReceived: add(r => r.interestPaymentsReceived),
    avgInterestRate: weightedRate(records),
  };
}

/* =========================
   Entry points
   ========================= */

export function aggregate(records: readonly LoanRecord[]): SummaryTable {
  for (const r of records) assertLoanRecord(r);
  const graded = records.filter(hasGrade);

  const groups = new Map<GradeBucket, Graded[]>();
  for (const r of graded) {
    const k = bucketOf(r.grade);
    const arr = groups.get(k);
    if (arr) arr.push(r);
    else groups.set(k, [r]);
  }

  const rows = [...groups.keys()]
    .sort(byLabel)
    .map(k => summarizeBucket(k, groups.get(k) ?? []));

  return {
    rows: [...rows, totalRow(rows, graded)],
    recordCount: graded.length,
    droppedCount: records.length - graded.length,
  };
}

/**
 * Raw CSV rows straight to a summary. Ungraded rows (footer lines in
 * exported files, for one) are dropped before any other cell is read.
 */
export function aggregateRows(rows: readonly CsvRow[], lines?: readonly number[]): SummaryTable {
  const records: LoanRecord[] = [];
  let dropped = 0;
  rows.forEach((row, i) => {
    if (parseGrade(row[COLUMN_MAP.grade]) === null) {
      dropped++;
      return;
    }
    records.push(toLoanRecord(row, lines?.[i]));
  });
  const table = aggregate(records);
  return { ...table, droppedCount: dropped };
}
