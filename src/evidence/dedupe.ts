import { hashKey } from './schema'
import type { Statement } from './types'

/**
 * Integer value of an evidence count, or undefined when it is not numeric.
 * Numeric strings such as "3" are accepted.
 */
export function numericEvidenceCount(value: Statement['evidence_count']): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? Math.trunc(value) : undefined
  return /^\s*[+-]?\d+\s*$/.test(value) ? parseInt(value, 10) : undefined
}

/**
 * Keeps the first statement seen for each `stmt_hash`.
 */
export function dedupeByHash<T extends Statement>(stmts: readonly T[]): T[] {
  const seen = new Set<string>()
  const unique: T[] = []
  for (const stmt of stmts) {
    const key = hashKey(stmt.stmt_hash)
    if (seen.has(key)) continue
    seen.add(key)
    unique.push(stmt)
  }
  return unique
}

export function stripTrailingPeriod(english: string): string {
  return english.replace(/\.$/, '')
}

export function normalizeStatements<T extends Statement>(stmts: readonly T[]): T[] {
  return stmts.map((stmt) => ({ ...stmt, english: stripTrailingPeriod(stmt.english) }))
}

/**
 * Collapses statements with identical `english` into the first one seen,
 * which carries the summed evidence count. Output order is first-seen order
 * of the sentences.
 */
export function mergeByEnglish<T extends Statement>(stmts: readonly T[]): T[] {
  const groups = new Map<string, T[]>()
  for (const stmt of stmts) {
    const group = groups.get(stmt.english)
    if (group) group.push(stmt)
    else groups.set(stmt.english, [stmt])
  }

  const merged: T[] = []
  for (const group of groups.values()) {
    const counts = group.map((s) => numericEvidenceCount(s.evidence_count)).filter((c): c is number => c !== undefined)
    const representative = group[0]
    merged.push(
      counts.length > 0 ? { ...representative, evidence_count: counts.reduce((a, b) => a + b, 0) } : { ...representative }
    )
  }
  return merged
}
