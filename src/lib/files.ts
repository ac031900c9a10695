/**
 * Filesystem helpers shared by discovery, validation and readiness checks
 */

import { existsSync, readdirSync, statSync } from 'fs'
import { join, relative, sep } from 'path'

const SKIPPED_DIRECTORIES = new Set(['.ipynb_checkpoints', '.git', 'node_modules', '__pycache__'])

/**
 * Recursively list files under `dir` whose name satisfies `accept`.
 * Paths are relative to `baseDir`, use forward slashes and are sorted.
 */
export function findFiles(baseDir: string, dir: string, accept: (name: string) => boolean): string[] {
  const root = join(baseDir, dir)
  if (!isDirectory(root)) return []

  const found: string[] = []
  const walk = (current: string): void => {
    for (const entry of readdirSync(current, { withFileTypes: true })) {
      const full = join(current, entry.name)
      if (entry.isDirectory()) {
        if (!SKIPPED_DIRECTORIES.has(entry.name)) walk(full)
      } else if (entry.isFile() && accept(entry.name)) {
        found.push(relative(baseDir, full).split(sep).join('/'))
      }
    }
  }
  walk(root)

  return found.sort()
}

export function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory()
}

export function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile()
}
