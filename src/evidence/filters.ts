import { debug } from '../logger'
import { hashKey, parseCurationList } from './schema'
import type { EdgeEvidence, FilterResult, Statement, StatementFilter } from './types'

// Automated reading systems; a single piece of evidence from one of these is unreliable
export const READING_SOURCES: readonly string[] = ['eidos', 'trips', 'reach', 'sparser', 'medscan', 'rlimsp', 'isi']

// Reader that over-reports complexes
export const LOW_QUALITY_COMPLEX_SOURCE = 'sparser'

// Reader whose evidence text is private and cannot be shown
export const PRIVATE_SOURCE = 'medscan'

// "hypothesis" and "act_vs_amt" are minor issues and count as correct
export const CORRECT_CURATION_TAGS: readonly string[] = ['correct', 'hypothesis', 'act_vs_amt']

function reportLine(removed: number, reason: string) {
  return removed > 0 ? `Removed ${removed} ${reason}\n` : ''
}

function onlySource(stmt: Statement): string | undefined {
  const sources = Object.keys(stmt.source_counts)
  return sources.length === 1 ? sources[0] : undefined
}

/**
 * Returns a copy of `evidence` without the statements matching `shouldRemove`.
 */
function removeWhere(
  evidence: EdgeEvidence,
  reason: string,
  shouldRemove: (stmt: Statement, key: string) => boolean
): FilterResult {
  const filtered = structuredClone(evidence)
  const toRemove = Object.entries(filtered.stmts)
    .filter(([key, stmt]) => shouldRemove(stmt, key))
    .map(([key]) => key)
  for (const key of toRemove) delete filtered.stmts[key]
  return { evidence: filtered, report: reportLine(toRemove.length, reason) }
}

/**
 * True when the first and third words of the sentence match, as in "A binds A".
 */
export function isSelfLoopSentence(english: string): boolean {
  const tokens = english
    .replace(/\.$/, '')
    .trim()
    .split(/\s+/)
    .filter((t) => t.length > 0)
  return tokens.length >= 3 && tokens[0] === tokens[2]
}

export function selfLoopFilter(): StatementFilter {
  const reason = 'self loop statements'
  return {
    describe: () =>
      'SelfLoopStatementFilter: Iterates through evidence statements and removes any where source and target are the same',
    apply(evidence) {
      const names = new Set(evidence.edge.map((entity) => entity.name))
      if (names.size <= 1) {
        const filtered = structuredClone(evidence)
        const removed = Object.keys(filtered.stmts).length
        filtered.stmts = {}
        return { evidence: filtered, report: reportLine(removed, reason) }
      }
      return removeWhere(evidence, reason, (stmt) => isSelfLoopSentence(stmt.english))
    }
  }
}

export function singleReadingSourceFilter(): StatementFilter {
  return {
    describe: () =>
      'SingleReadingStatementFilter: Removes statements with only one evidence that originated from only a single reading system',
    apply: (evidence) =>
      removeWhere(evidence, 'statements with only single reading system source', (stmt) => {
        const source = onlySource(stmt)
        if (source === undefined || !READING_SOURCES.includes(source)) return false
        return stmt.source_counts[source] <= 1
      })
  }
}

export function lowQualityComplexSourceFilter(): StatementFilter {
  return {
    describe: () =>
      'SparserComplexStatementFilter: Removes statements for Complexes with only sparser as source of evidence',
    apply: (evidence) =>
      removeWhere(
        evidence,
        'sparser complex statements',
        (stmt) => stmt.stmt_type === 'Complex' && onlySource(stmt) === LOW_QUALITY_COMPLEX_SOURCE
      )
  }
}

export function privateSourceOnlyFilter(): StatementFilter {
  return {
    describe: () => 'MedscanStatementFilter: Removes statements with only medscan as source of evidence',
    apply: (evidence) => removeWhere(evidence, 'medscan statements', (stmt) => onlySource(stmt) === PRIVATE_SOURCE)
  }
}

/**
 * Drops statements whose curations are all negative. Curations apply to one
 * piece of evidence each, so a single correct (or minor-issue) tag keeps the
 * statement. Statements nobody curated are kept.
 *
 * The curation list is validated here, so a malformed list fails before any
 * network is touched.
 */
export function curationFilter(curations: unknown = []): StatementFilter {
  const tagsByHash = new Map<string, string[]>()
  for (const curation of parseCurationList(curations ?? [])) {
    const key = hashKey(curation.pa_hash)
    const tags = tagsByHash.get(key)
    if (tags) tags.push(curation.tag)
    else tagsByHash.set(key, [curation.tag])
  }
  debug('Curated statement hashes:', tagsByHash.size)

  return {
    describe: () => 'IncorrectStatementFilter: Removes statements that lack good curations',
    apply: (evidence) =>
      removeWhere(evidence, 'statements that lacked good curations', (_stmt, key) => {
        const tags = tagsByHash.get(hashKey(key))
        if (!tags) return false
        return !tags.some((tag) => CORRECT_CURATION_TAGS.includes(tag))
      })
  }
}

export function defaultFilterChain(curations: unknown = []): StatementFilter[] {
  return [selfLoopFilter(), curationFilter(curations), singleReadingSourceFilter(), lowQualityComplexSourceFilter()]
}

/**
 * Runs `filters` strictly left to right, each on the previous output, and
 * concatenates their reports.
 */
export function applyFilterChain(filters: readonly StatementFilter[], evidence: EdgeEvidence): FilterResult {
  let current = evidence
  let report = ''
  for (const filter of filters) {
    const res = filter.apply(current)
    current = res.evidence
    report += res.report
  }
  return { evidence: current, report }
}
