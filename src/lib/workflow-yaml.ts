/**
 * Structured edits on GitHub Actions workflow documents
 *
 * Edits work on the parsed `yaml` Document, so comments, key order and
 * quoting survive the round trip through `doc.toString()`.
 * Every function returns the number of nodes it changed.
 */

import { type Document, isScalar, type Pair, parseDocument, visit } from 'yaml'

export const PYTHON_VERSION_KEY = 'python-version'
export const EXECUTION_MODE_KEY = 'execution-mode'
export const POST_RUN_SCRIPT_KEY = 'post-run-script'
export const SECURITY_SCAN_KEY = 'security-scan'

export function parseWorkflow(source: string): Document {
  return parseDocument(source)
}

function keyIs(pair: Pair<unknown, unknown>, key: string): boolean {
  return isScalar(pair.key) && pair.key.value === key
}

/**
 * Replace the value of every `key:` pair, at any depth
 */
function setEveryValue(doc: Document, key: string, value: string | boolean): number {
  let changes = 0
  visit(doc, {
    Pair(_, pair) {
      if (!keyIs(pair, key)) return
      if (isScalar(pair.value)) {
        if (pair.value.value === value) return
        pair.value.value = value
      } else {
        pair.value = doc.createNode(value)
      }
      changes++
    },
  })
  return changes
}

/**
 * Replace placeholder tokens inside every string scalar
 *
 * @example
 * substitutePlaceholders(doc, { 'your-org': 'spacetelescope', 'dev-actions': 'notebook-ci-actions' })
 */
export function substitutePlaceholders(doc: Document, replacements: Record<string, string>): number {
  const tokens = Object.entries(replacements).filter(([token]) => token !== '')
  let changes = 0
  visit(doc, {
    Scalar(_, node) {
      if (typeof node.value !== 'string') return
      let text = node.value
      for (const [token, replacement] of tokens) {
        text = text.split(token).join(replacement)
      }
      if (text !== node.value) {
        node.value = text
        changes++
      }
    },
  })
  return changes
}

export function setPythonVersion(doc: Document, version: string): number {
  return setEveryValue(doc, PYTHON_VERSION_KEY, version)
}

export function setExecutionMode(doc: Document, mode: string): number {
  return setEveryValue(doc, EXECUTION_MODE_KEY, mode)
}

export function setSecurityScan(doc: Document, enabled: boolean): number {
  return setEveryValue(doc, SECURITY_SCAN_KEY, enabled)
}

/**
 * Add `post-run-script: <path>` right after every `python-version` entry.
 * A mapping that already names the script is left alone.
 */
export function addPostRunScript(doc: Document, scriptPath: string): number {
  let changes = 0
  visit(doc, {
    Map(_, map) {
      const index = map.items.findIndex((pair) => keyIs(pair, PYTHON_VERSION_KEY))
      if (index === -1) return

      const existing = map.items.find((pair) => keyIs(pair, POST_RUN_SCRIPT_KEY))
      if (existing) {
        if (isScalar(existing.value) && existing.value.value === scriptPath) return
        existing.value = doc.createNode(scriptPath)
        changes++
        return
      }

      map.items.splice(index + 1, 0, doc.createPair(POST_RUN_SCRIPT_KEY, scriptPath))
      changes++
    },
  })
  return changes
}
