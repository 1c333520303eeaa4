// errors/index.ts
// Single entry for the errors module: exports + Result helpers.

export type { ErrorKind, JSONValue, WrappableKind } from "./boundary";
export {
  ReportError,
  ParseError,
  MissingColumnError,
  EmptyInputError,
  ConfigError,
  asError,
  isReportError,
  wrapAs,
  toLogLine,
} from "./boundary";

/* ===================== Result helpers ===================== */

/** Standard Result union for safe-return APIs. */
export type Ok<T> = { ok: true; value: T };
export type Err = { ok: false; error: Error };
export type Result<T> = Ok<T> | Err;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = (error: Error): Err => ({ ok: false, error });
