// errors/boundary.ts
// Typed errors raised while turning loan files into summary reports.

export type JSONValue = string | number | boolean | null | JSONValue[] | { [k: string]: JSONValue };

export type ErrorKind =
  | "ParseError"
  | "MissingColumnError"
  | "EmptyInputError"
  | "ConfigError"
  | "UnknownError";

type ErrorOptions = { code?: string; cause?: unknown; details?: Record<string, JSONValue> };

/** Base typed error carrying a `kind` and optional metadata. */
export class ReportError extends Error {
  kind: ErrorKind;
  code?: string;
  details?: Record<string, JSONValue>;
  cause?: unknown;

  constructor(kind: ErrorKind, message: string, options?: ErrorOptions) {
    super(message);
    this.name = "ReportError";
    this.kind = kind;
    this.code = options?.code;
    this.details = options?.details;
    this.cause = options?.cause;
    Object.setPrototypeOf(this, new.target.prototype);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** A numeric or percentage cell could not be read. */
export class ParseError extends ReportError {
  constructor(message: string, opts?: ErrorOptions) {
    super("ParseError", message, opts);
    this.name = "ParseError";
    if (!this.code) this.code = "EPARSE";
  }
}

/** A required column is absent from the header or a record. */
export class MissingColumnError extends ReportError {
  readonly columns: string[];

  constructor(columns: string[], opts?: ErrorOptions) {
    super("MissingColumnError", `Missing required column(s): ${columns.join(", ")}`, opts);
    this.name = "MissingColumnError";
    this.columns = columns;
    if (!this.code) this.code = "ECOLUMN";
  }
}

export class EmptyInputError extends ReportError {
  constructor(message = "No records with a grade", opts?: ErrorOptions) {
    super("EmptyInputError", message, opts);
    this.name = "EmptyInputError";
    if (!this.code) this.code = "EEMPTY";
  }
}

export class ConfigError extends ReportError {
  constructor(message: string, opts?: ErrorOptions) {
    super("ConfigError", message, opts);
    this.name = "ConfigError";
    if (!this.code) this.code = "ECONFIG";
  }
}

/** Narrow helper to coerce unknown into an Error. */
export function asError(e: unknown): Error {
  if (e instanceof Error) return e;
  if (e === null || e === undefined) return new Error(String(e));
  return new Error(typeof e === "object" ? JSON.stringify(e) : String(e));
}

export function isReportError(e: unknown): e is ReportError {
  return e instanceof ReportError;
}

/** Kinds `wrapAs` can build from a message alone; a MissingColumnError needs its column list. */
export type WrappableKind = Exclude<ErrorKind, "MissingColumnError">;

/** Wrap unknown into a specific kind, preserving the cause. */
export function wrapAs(kind: WrappableKind, e: unknown, message?: string, details?: Record<string, JSONValue>): ReportError {
  const err = asError(e);
  const msg = message ? `${message}: ${err.message}` : err.message;
  switch (kind) {
    case "ParseError": return new ParseError(msg, { cause: err, details });
    case "EmptyInputError": return new EmptyInputError(msg, { cause: err, details });
    case "ConfigError": return new ConfigError(msg, { cause: err, details });
    case "UnknownError": return new ReportError(kind, msg, { cause: err, details });
  }
}

/** Produce a concise, single-line message for logs. */
export function toLogLine(e: unknown): string {
  if (isReportError(e)) {
    const parts = [`[${e.kind}] ${e.message}`];
    if (e.code) parts.push(`code=${e.code}`);
    if (e.details) {
      for (const [k, v] of Object.entries(e.details)) parts.push(`${k}=${JSON.stringify(v)}`);
    }
    return parts.join(" ");
  }
  return `[UnknownError] ${asError(e).message}`;
}
