// reports/md.ts
// Markdown rendering for the loan summary (string-only, no deps).
//
// Usage:
//   import { renderSummaryMarkdown } from "./reports/md";
//   const md = renderSummaryMarkdown(formatTable(aggregate(records)));

import { COLUMN_LABELS, METRIC_COLUMNS } from "../loans/format";
import type { DisplayRow } from "../loans/types";

export type Cell = string | number | null | undefined;
export type Align = "left" | "right";

const escapeCell = (v: Cell) => String(v ?? "").replace(/\|/g, "\\|").replace(/\r?\n/g, " ");

const RULES: Record<Align, string> = { left: ":---", right: "---:" };

/** GitHub-flavored Markdown pipe table. */
export function mdTable(
  header: readonly string[],
  rows: ReadonlyArray<ReadonlyArray<Cell>>,
  align?: readonly Align[]
): string {
  if (!header.length) return "_(no data)_";
  const head = `| ${header.map(escapeCell).join(" | ")} |`;
  const rule = `| ${header.map((_, i) => RULES[align?.[i] ?? "left"]).join(" | ")} |`;
  const body = rows.map(r => `| ${header.map((_, i) => escapeCell(r[i])).join(" | ")} |`);
  return [head, rule, ...body].join("\n");
}

/** Bucket label in an unheaded first column, then one column per metric. */
export function renderSummaryMarkdown(rows: readonly DisplayRow[]): string {
  const header = ["", ...METRIC_COLUMNS.map(k => COLUMN_LABELS[k])];
  const body = rows.map(r => [r.bucket, ...METRIC_COLUMNS.map(k => r[k])]);
  const align: Align[] = ["left", ...METRIC_COLUMNS.map((): Align => "right")];
  return mdTable(header, body, align) + "\n";
}
