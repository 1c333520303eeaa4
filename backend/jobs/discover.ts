// jobs/discover.ts
// Input discovery: files in one directory matching a `*` glob.

import { promises as fs, type Dirent } from "fs"
import * as path from "path"
import { wrapAs } from "../engine/errors"

/**
 * `*` matches any run of characters, including none; everything else is literal.
 * "*.csv", "loans_*_*.csv", "*" or an exact name.
 */
export function match(glob: string, name: string): boolean {
  const parts = glob.split("*")
  if (parts.length === 1) return name === glob
  const head = parts[0] ?? ""
  const tail = parts[parts.length - 1] ?? ""
  const end = name.length - tail.length
  if (end < head.length || !name.startsWith(head) || !name.endsWith(tail)) return false
  let pos = head.length
  for (const mid of parts.slice(1, -1)) {
    const at = name.indexOf(mid, pos)
    if (at < 0 || at + mid.length > end) return false
    pos = at + mid.length
  }
  return true
}

/** Matching regular files, sorted by name, as paths joined onto `dir`. */
export async function discoverFiles(dir: string, glob: string): Promise<string[]> {
  let entries: Dirent[]
  try {
    entries = await fs.readdir(dir, { withFileTypes: true })
  } catch (e) {
    throw wrapAs("ConfigError", e, `Cannot read input directory ${dir}`, { dir })
  }
  return entries
    .filter(d => d.isFile() && match(glob, d.name))
    .map(d => d.name)
    .sort()
    .map(name => path.join(dir, name))
}
