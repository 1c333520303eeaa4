// loans/records.ts
// CSV row -> LoanRecord. Blank cells become null; anything else that is
// not a plain decimal raises ParseError with the column and line.

import type { CsvRow } from "../adapters/data/csv-feed";
import { MissingColumnError, ParseError } from "../engine/errors";
import type { LoanRecord } from "./types";

/** Source column for each LoanRecord field. */
export const COLUMN_MAP = {
  grade: "grade",
  loanAmount: "loan_amnt",
  loanStatus: "loan_status",
  outstandingPrincipal: "out_prncp",
  totalPaymentsReceived: "total_pymnt",
  totalInterestReceived: "total_rec_int",
  totalLateFeesReceived: "total_rec_late_fee",
  interestRate: "int_rate",
} as const satisfies Record<keyof LoanRecord, string>;

export const REQUIRED_COLUMNS: readonly string[] = Object.values(COLUMN_MAP);

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

type CellRef = { column: string; line?: number };

function isBlank(v: string): boolean {
  return v.trim() === "";
}

function parseError(what: string, raw: string, ref: CellRef): ParseError {
  const where = ref.line !== undefined ? ` on line ${ref.line}` : "";
  return new ParseError(`Invalid ${what} "${raw}" in column ${ref.column}${where}`, {
    details: { column: ref.column, value: raw, ...(ref.line !== undefined ? { line: ref.line } : {}) },
  });
}

/** "1,000", "$5" and "1e400" are rejected; only plain finite decimals pass. */
export function parseAmount(raw: string | undefined, ref: CellRef = { column: "amount" }): number | null {
  if (raw === undefined || isBlank(raw)) return null;
  const t = raw.trim();
  const n = Number(t);
  if (!DECIMAL.test(t) || !Number.isFinite(n)) throw parseError("number", raw, ref);
  return n;
}

/** "13.5%" -> 0.135. The percent sign is optional. */
export function parsePercent(raw: string | undefined, ref: CellRef = { column: "percent" }): number | null {
  if (raw === undefined || isBlank(raw)) return null;
  const t = raw.trim().replace(/^%+|%+$/g, "").trim();
  const n = Number(t);
  if (!DECIMAL.test(t) || !Number.isFinite(n)) throw parseError("percentage", raw, ref);
  return n / 100;
}

export function parseGrade(raw: string | undefined): string | null {
  return raw === undefined || isBlank(raw) ? null : raw.trim();
}

/** Throws MissingColumnError naming every required column the header lacks. */
export function assertColumns(columns: readonly string[]): void {
  const have = new Set(columns);
  const missing = REQUIRED_COLUMNS.filter(c => !have.has(c));
  if (missing.length) throw new MissingColumnError(missing);
}

export function toLoanRecord(row: CsvRow, line?: number): LoanRecord {
  const amount = (key: Exclude<keyof typeof COLUMN_MAP, "grade" | "loanStatus" | "interestRate">) =>
    parseAmount(row[COLUMN_MAP[key]], { column: COLUMN_MAP[key], line });

  return {
    grade: parseGrade(row[COLUMN_MAP.grade]),
    loanAmount: amount("loanAmount"),
    loanStatus: (row[COLUMN_MAP.loanStatus] ?? "").trim(),
    outstandingPrincipal: amount("outstandingPrincipal"),
    totalPaymentsReceived: amount("totalPaymentsReceived"),
    totalInterestReceived: amount("totalInterestReceived"),
    totalLateFeesReceived: amount("totalLateFeesReceived"),
    interestRate: parsePercent(row[COLUMN_MAP.interestRate], { column: COLUMN_MAP.interestRate, line }),
  };
}

const NUMERIC_FIELDS = [
  "loanAmount",
  "outstandingPrincipal",
  "totalPaymentsReceived",
  "totalInterestReceived",
  "totalLateFeesReceived",
  "interestRate",
] as const satisfies ReadonlyArray<keyof LoanRecord>;

function wrongType(field: string, expected: string, v: unknown): ParseError {
  const got = v === null ? "null" : typeof v;
  return new ParseError(`Field ${field} must be ${expected}, got ${got}`, {
    details: { field, expected, got },
  });
}

/**
 * Checks a value handed in from untyped code. A field that is absent
 * altogether is a MissingColumnError; a field of the wrong type is a
 * ParseError. Null stands for an empty cell and passes everywhere but
 * loanStatus.
 */
export function assertLoanRecord(value: unknown): asserts value is LoanRecord {
  if (value === null || typeof value !== "object") {
    throw new MissingColumnError(Object.keys(COLUMN_MAP));
  }
  const obj: object = value;
  const field = (k: string): unknown => Reflect.get(obj, k);
  const missing = Object.keys(COLUMN_MAP).filter(k => !(k in obj) || field(k) === undefined);
  if (missing.length) throw new MissingColumnError(missing);

  const grade = field("grade");
  if (grade !== null && typeof grade !== "string") throw wrongType("grade", "a string or null", grade);
  const status = field("loanStatus");
  if (typeof status !== "string") throw wrongType("loanStatus", "a string", status);
  for (const k of NUMERIC_FIELDS) {
    const v = field(k);
    if (v !== null && (typeof v !== "number" || !Number.isFinite(v))) {
      throw wrongType(k, "a finite number or null", v);
    }
  }
}
