// backend/config/env.ts

import dotenv from "dotenv"
import * as path from "path"
import { ConfigError } from "../engine/errors"

dotenv.config()

export type SummaryConfig = {
  /* ---------------- Input discovery ---------------- */
  dataDir: string
  pattern: string
  skipRows: number

  /* ---------------- Output ---------------- */
  reportSuffix: string
  allowEmpty: boolean

  /* ---------------- Batch ---------------- */
  concurrency: number
  failFast: boolean
}

export const DEFAULTS: SummaryConfig = {
  dataDir: "data",
  pattern: "*.csv",
  skipRows: 1,
  reportSuffix: ".md",
  allowEmpty: true,
  concurrency: 1,
  failFast: false,
}

function intVar(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  min: number
): number {
  const raw = env[key]
  if (raw === undefined || raw.trim() === "") return fallback
  const n = Number(raw.trim())
  if (!Number.isInteger(n) || n < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}`, {
      details: { key, value: raw },
    })
  }
  return n
}

function boolVar(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: boolean
): boolean {
  const raw = env[key]
  if (raw === undefined || raw.trim() === "") return fallback
  const s = raw.trim().toLowerCase()
  if (["1", "true", "yes", "on"].includes(s)) return true
  if (["0", "false", "no", "off"].includes(s)) return false
  throw new ConfigError(`${key} must be a boolean`, {
    details: { key, value: raw },
  })
}

function strVar(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: string
): string {
  const raw = env[key]
  return raw === undefined || raw.trim() === "" ? fallback : raw.trim()
}

/** Read settings from an environment map (process.env by default). */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): SummaryConfig {
  return {
    dataDir: path.resolve(cwd, strVar(env, "LOAN_DATA_DIR", DEFAULTS.dataDir)),
    pattern: strVar(env, "LOAN_DATA_PATTERN", DEFAULTS.pattern),
    skipRows: intVar(env, "LOAN_SKIP_ROWS", DEFAULTS.skipRows, 0),
    reportSuffix: strVar(env, "LOAN_REPORT_SUFFIX", DEFAULTS.reportSuffix),
    allowEmpty: boolVar(env, "LOAN_ALLOW_EMPTY", DEFAULTS.allowEmpty),
    concurrency: intVar(env, "LOAN_CONCURRENCY", DEFAULTS.concurrency, 1),
    failFast: boolVar(env, "LOAN_FAIL_FAST", DEFAULTS.failFast),
  }
}
