// pipelines/loan-summary.ts
// One loan file end-to-end (read -> aggregate -> format -> Markdown -> write),
// plus a batch runner that drains a queue of files with N workers.
//
// Each file is independent: a failure is recorded for that file and the
// rest still run, unless `failFast` is set.

import { promises as fs } from "fs";
import * as path from "path";
import { readCSVFile } from "../adapters/data/csv-feed";
import { EmptyInputError, err, ok, toLogLine, type Result, asError } from "../engine/errors";
import { aggregateRows } from "../loans/aggregate";
import { formatTable } from "../loans/format";
import { assertColumns } from "../loans/records";
import { ALL_BUCKET, KNOWN_BUCKETS, type SummaryTable } from "../loans/types";
import { moduleLogger, type Logger } from "../observability/logger";
import { renderSummaryMarkdown } from "../reports/md";

/* ---------------- types ---------------- */

export type FileOptions = {
  /** Appended to the input path to name the report. */
  suffix?: string;        // default ".md"
  /** Lines before the CSV header. */
  skipRows?: number;      // default 1
  /** When false, a file without graded records fails with EmptyInputError. */
  allowEmpty?: boolean;   // default true
  logger?: Logger;
};

export type BatchOptions = FileOptions & {
  concurrency?: number;   // default 1
  failFast?: boolean;     // default false
};

export type FileSummary = {
  input: string;
  output: string;
  table: SummaryTable;
};

export type FileOutcome = { input: string; result: Result<FileSummary> };

/* ---------------- output ---------------- */

export function outputPathFor(input: string, suffix = ".md"): string {
  return input + suffix;
}

/** Write beside the destination, flush, then rename into place. */
export async function writeFileAtomic(dest: string, text: string): Promise<void> {
  const tmp = path.join(path.dirname(dest), `.${path.basename(dest)}.${process.pid}.tmp`);
  try {
    const handle = await fs.open(tmp, "w");
    try {
      await handle.writeFile(text, "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tmp, dest);
  } catch (e) {
    await fs.rm(tmp, { force: true });
    throw e;
  }
}

/* ---------------- single file ---------------- */

export async function summarizeFile(input: string, opts: FileOptions = {}): Promise<FileSummary> {
  const log = opts.logger ?? moduleLogger("loan-summary");

  const parsed = await readCSVFile(input, { skipRows: opts.skipRows ?? 1 });
  assertColumns(parsed.columns);

  const table = aggregateRows(parsed.rows, parsed.lines);
  if (table.recordCount === 0 && opts.allowEmpty === false) {
    throw new EmptyInputError(`No records with a grade in ${input}`, {
      details: { input, dropped: table.droppedCount },
    });
  }

  const known: readonly string[] = KNOWN_BUCKETS;
  for (const row of table.rows) {
    if (row.bucket !== ALL_BUCKET && !known.includes(row.bucket)) {
      log.warn(`Unexpected grade bucket "${row.bucket}" in ${input}`);
    }
  }

  const output = outputPathFor(input, opts.suffix);
  await writeFileAtomic(output, renderSummaryMarkdown(formatTable(table)));
  log.debug(`${input}: ${table.recordCount} graded, ${table.droppedCount} dropped`);
  return { input, output, table };
}

/* ---------------- batch ---------------- */

/** Outcomes come back in input order whatever order the workers finish in. */
export async function summarizeAll(inputs: readonly string[], opts: BatchOptions = {}): Promise<FileOutcome[]> {
  const log = opts.logger ?? moduleLogger("loan-summary");
  const conc = Math.max(1, Math.floor(opts.concurrency ?? 1));

  const outcomes: Array<FileOutcome | undefined> = new Array(inputs.length);
  const queue = inputs.map((input, i) => ({ input, i }));
  let firstError: Error | undefined;

  const workers = Array.from({ length: Math.min(conc, queue.length || 1) }, async () => {
    for (let job = queue.shift(); job; job = queue.shift()) {
      if (opts.failFast && firstError) return;
      const { input, i } = job;
      log.info(`[${i + 1}/${inputs.length}] ${input}`);
      try {
        const summary = await summarizeFile(input, { ...opts, logger: log });
        outcomes[i] = { input, result: ok(summary) };
        log.info(`  ✔ wrote ${summary.output}`);
      } catch (e) {
        const error = asError(e);
        outcomes[i] = { input, result: err(error) };
        log.error(`  ✖ ${input}: ${toLogLine(error)}`);
        firstError ??= error;
      }
    }
  });

  await Promise.all(workers);
  if (opts.failFast && firstError) throw firstError;
  return outcomes.filter((o): o is FileOutcome => o !== undefined);
}
