// data/csv-feed.ts
// CSV parser + file loader for loan exports.
// Handles quotes, escaped quotes, newlines-in-fields, leading metadata
// lines and optional gzip. Cells stay strings; typing happens downstream.

import { promises as fsp } from "fs";
import * as path from "path";
import * as zlib from "zlib";

/* =========================
   Types
   ========================= */

/** One data record keyed by header name; cells past the record's end are undefined. */
export type CsvRow = Readonly<Record<string, string | undefined>>;

export type ParseOptions = {
  sep?: string;       // default ","
  quote?: string;     // default '"'
  /** Records dropped before the header (e.g. a "Notes offered by Prospectus" line). */
  skipRows?: number;  // default 0
  /** Skip records whose fields are all empty (default true). */
  skipEmpty?: boolean;
  /** Trim header names (default true). */
  trimHeaders?: boolean;
};

export type LoadOptions = ParseOptions & {
  /** Force gzip handling; autodetected from a .gz extension otherwise. */
  gzip?: boolean;
};

export type ParsedCsv = {
  columns: string[];
  rows: CsvRow[];
  /** 1-based physical line each row started on, parallel to `rows`. */
  lines: number[];
};

/* =========================
   Utilities
   ========================= */

const DEFAULT_SEP = ",";
const DEFAULT_QUOTE = '"';

function detectGzipByExt(p: string) {
  return /\.gz$/i.test(p);
}

/* =========================
   Core CSV parser (RFC-ish)
   ========================= */

/** Split text into raw records, tracking the line each record starts on. */
export function tokenize(
  text: string,
  opts: Pick<ParseOptions, "sep" | "quote"> = {}
): Array<{ fields: string[]; line: number }> {
  const sep = opts.sep ?? DEFAULT_SEP;
  const quote = opts.quote ?? DEFAULT_QUOTE;

  const records: Array<{ fields: string[]; line: number }> = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;
  let line = 1;
  let rowLine = 1;

  const pushField = () => { row.push(field); field = ""; };
  const pushRow = () => {
    records.push({ fields: row, line: rowLine });
    row = [];
    rowLine = line;
  };

  let i = 0;
  const N = text.length;
  while (i < N) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === quote) {
        // lookahead for escaped quote
        if (i + 1 < N && text[i + 1] === quote) {
          field += quote;
          i += 2;
          continue;
        }
        inQuotes = false;
        i++;
        continue;
      }
      if (ch === "\n") line++;
      field += ch;
      i++;
      continue;
    }

    if (ch === quote) {
      inQuotes = true;
      i++;
      continue;
    }
    if (ch === sep) {
      pushField();
      i++;
      continue;
    }
    if (ch === "\n" || ch === "\r") {
      // any of \n | \r | \r\n ends the record
      if (ch === "\r" && i + 1 < N && text[i + 1] === "\n") i++;
      line++;
      pushField();
      pushRow();
      i++;
      continue;
    }
    field += ch;
    i++;
  }

  // last record, unless the text ended on a line break
  if (field.length > 0 || row.length > 0) {
    pushField();
    pushRow();
  }
  return records;
}

export function parseCSV(text: string, opts: ParseOptions = {}): ParsedCsv {
  const skipEmpty = opts.skipEmpty !== false;
  const trimHeaders = opts.trimHeaders !== false;
  const skipRows = Math.max(0, Math.floor(opts.skipRows ?? 0));

  // strip a UTF-8 BOM so the first header name matches
  const body = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const records = tokenize(body, opts)
    .slice(skipRows)
    .filter(r => !(skipEmpty && r.fields.every(c => c === "")));

  const head = records.shift();
  if (!head) return { columns: [], rows: [], lines: [] };

  const columns = head.fields.map(h => (trimHeaders ? h.trim() : h));
  const rows: CsvRow[] = [];
  const lines: number[] = [];
  for (const rec of records) {
    const r: Record<string, string | undefined> = {};
    columns.forEach((name, c) => { r[name] = rec.fields[c]; });
    rows.push(r);
    lines.push(rec.line);
  }
  return { columns, rows, lines };
}

/* =========================
   I/O helpers
   ========================= */

/** Read a whole file (gunzipping when needed); the handle is closed before parsing. */
export async function readText(file: string, opts: LoadOptions = {}): Promise<string> {
  const abs = path.resolve(file);
  const gz = opts.gzip ?? detectGzipByExt(abs);
  const data = await fsp.readFile(abs);
  return gz ? zlib.gunzipSync(data).toString("utf8") : data.toString("utf8");
}

export async function readCSVFile(file: string, opts: LoadOptions = {}): Promise<ParsedCsv> {
  return parseCSV(await readText(file, opts), opts);
}
