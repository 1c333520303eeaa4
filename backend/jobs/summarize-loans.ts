#!/usr/bin/env node
// jobs/summarize-loans.ts
// Batch job: write a grade summary beside every loan CSV in the data directory.
//
// Usage:
//   npm run summarize
//   LOAN_DATA_DIR=exports LOAN_CONCURRENCY=4 npm run summarize
//
// Exit code is 1 when any file failed, 0 otherwise.

import { loadConfig, type SummaryConfig } from "../config/env"
import { toLogLine } from "../engine/errors"
import { moduleLogger, type Logger } from "../observability/logger"
import { summarizeAll, type FileOutcome } from "../pipelines/loan-summary"
import { discoverFiles } from "./discover"

export type JobReport = {
  outcomes: FileOutcome[]
  failed: number
  exitCode: 0 | 1
}

export async function runJob(
  config: SummaryConfig = loadConfig(),
  log: Logger = moduleLogger("summarize-loans")
): Promise<JobReport> {
  const files = await discoverFiles(config.dataDir, config.pattern)
  log.info(`Found ${files.length} file(s) matching ${config.pattern} in ${config.dataDir}`)

  const outcomes = await summarizeAll(files, {
    suffix: config.reportSuffix,
    skipRows: config.skipRows,
    allowEmpty: config.allowEmpty,
    concurrency: config.concurrency,
    failFast: config.failFast,
    logger: log,
  })

  const failed = outcomes.filter(o => !o.result.ok).length
  log.info(`Done: ${outcomes.length - failed} written, ${failed} failed`)
  return { outcomes, failed, exitCode: failed > 0 ? 1 : 0 }
}

async function main() {
  const { exitCode } = await runJob()
  process.exitCode = exitCode
}

if (require.main === module) {
  main().catch(err => {
    moduleLogger("summarize-loans").error(`Fatal: ${toLogLine(err)}`)
    process.exitCode = 1
  })
}
