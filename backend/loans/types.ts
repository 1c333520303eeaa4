// loans/types.ts
// Shapes shared by the record parser, aggregator and formatter.

/** One loan after parsing. Numeric fields are null where the source cell was empty. */
export type LoanRecord = Readonly<{
  grade: string | null;
  loanAmount: number | null;
  loanStatus: string;
  outstandingPrincipal: number | null;
  totalPaymentsReceived: number | null;
  totalInterestReceived: number | null;
  totalLateFeesReceived: number | null;
  /** Fraction, e.g. 0.135 for "13.5%". */
  interestRate: number | null;
}>;

export const KNOWN_BUCKETS = ["A", "B", "C", "D", "E", "FG"] as const;
export type KnownBucket = (typeof KNOWN_BUCKETS)[number];

export const ALL_BUCKET = "All";

/**
 * Grouping label. Grades outside A–G pass through unchanged, so the
 * type stays open; `KNOWN_BUCKETS` lists the expected ones.
 */
export type GradeBucket = KnownBucket | (string & {});

export type SummaryRow = Readonly<{
  bucket: GradeBucket | typeof ALL_BUCKET;
  totalIssued: number;
  fullyPaid: number;
  current: number;
  late: number;
  chargedOffNet: number;
  principalPaymentsReceived: number;
  interestPaymentsReceived: number;
  /** NaN when the bucket has no issued principal. */
  avgInterestRate: number;
}>;

export type MetricKey = Exclude<keyof SummaryRow, "bucket">;

export type SummaryTable = Readonly<{
  /** Buckets in label order, "All" last. */
  rows: readonly SummaryRow[];
  /** Records that made it into a bucket. */
  recordCount: number;
  /** Records dropped for having no grade. */
  droppedCount: number;
}>;

export type DisplayRow = Readonly<{ bucket: string } & Record<MetricKey, string>>;
