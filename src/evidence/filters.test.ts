import { describe, it, expect } from 'vitest'
import {
  applyFilterChain,
  curationFilter,
  defaultFilterChain,
  isSelfLoopSentence,
  lowQualityComplexSourceFilter,
  privateSourceOnlyFilter,
  selfLoopFilter,
  singleReadingSourceFilter
} from './filters'
import type { EdgeEvidence, Statement } from './types'

function stmt(hash: number, overrides: Partial<Statement> = {}): Statement {
  return {
    stmt_hash: hash,
    stmt_type: 'Activation',
    evidence_count: 2,
    source_counts: { reach: 2 },
    english: 'A activates B.',
    ...overrides
  }
}

function evidence(stmts: Statement[], names: string[] = ['A', 'B']): EdgeEvidence {
  return {
    edge: names.map((name) => ({ name })),
    stmts: Object.fromEntries(stmts.map((s) => [String(s.stmt_hash), s]))
  }
}

describe('filter descriptions', () => {
  it('lists the default chain in application order', () => {
    expect(defaultFilterChain().map((f) => f.describe())).toEqual([
      'SelfLoopStatementFilter: Iterates through evidence statements and removes any where source and target are the same',
      'IncorrectStatementFilter: Removes statements that lack good curations',
      'SingleReadingStatementFilter: Removes statements with only one evidence that originated from only a single reading system',
      'SparserComplexStatementFilter: Removes statements for Complexes with only sparser as source of evidence'
    ])
  })

  it('describes the medscan filter', () => {
    expect(privateSourceOnlyFilter().describe()).toBe(
      'MedscanStatementFilter: Removes statements with only medscan as source of evidence'
    )
  })
})

describe('self loop filter', () => {
  it('matches first and third words', () => {
    expect(isSelfLoopSentence('A binds A.')).toBe(true)
    expect(isSelfLoopSentence('A binds B.')).toBe(false)
    expect(isSelfLoopSentence('A A')).toBe(false)
    expect(isSelfLoopSentence('')).toBe(false)
  })

  it('removes self loop sentences from a two-node entry', () => {
    const res = selfLoopFilter().apply(
      evidence([stmt(1, { english: 'A binds A.' }), stmt(2, { english: 'A binds B.' }), stmt(3, { english: 'A B' })])
    )
    expect(Object.keys(res.evidence.stmts)).toEqual(['2', '3'])
    expect(res.report).toBe('Removed 1 self loop statements\n')
  })

  it('empties entries whose endpoints are the same node', () => {
    const same = selfLoopFilter().apply(evidence([stmt(1), stmt(2, { english: 'A inhibits B.' })], ['A', 'A']))
    expect(same.evidence.stmts).toEqual({})
    expect(same.report).toBe('Removed 2 self loop statements\n')

    const single = selfLoopFilter().apply(evidence([stmt(1)], ['A']))
    expect(single.evidence.stmts).toEqual({})
  })
})

describe('single reading source filter', () => {
  it('removes single-evidence statements from one reader only', () => {
    const res = singleReadingSourceFilter().apply(
      evidence([
        stmt(1, { source_counts: { reach: 1 } }),
        stmt(2, { source_counts: { reach: 2 } }),
        stmt(3, { source_counts: { signor: 1 } }),
        stmt(4, { source_counts: { reach: 1, sparser: 1 } })
      ])
    )
    expect(Object.keys(res.evidence.stmts)).toEqual(['2', '3', '4'])
    expect(res.report).toBe('Removed 1 statements with only single reading system source\n')
  })

  it.each(['eidos', 'trips', 'reach', 'sparser', 'medscan', 'rlimsp', 'isi'])('treats %s as a reading system', (reader) => {
    const res = singleReadingSourceFilter().apply(
      evidence([stmt(1, { source_counts: { [reader]: 1 } }), stmt(2, { source_counts: { [reader]: 2 } })])
    )
    expect(Object.keys(res.evidence.stmts)).toEqual(['2'])
  })
})

describe('sparser complex filter', () => {
  it('removes complexes supported by sparser alone', () => {
    const res = lowQualityComplexSourceFilter().apply(
      evidence([
        stmt(1, { stmt_type: 'Complex', source_counts: { sparser: 3 } }),
        stmt(2, { stmt_type: 'Complex', source_counts: { sparser: 1, reach: 1 } }),
        stmt(3, { stmt_type: 'Activation', source_counts: { sparser: 3 } })
      ])
    )
    expect(Object.keys(res.evidence.stmts)).toEqual(['2', '3'])
    expect(res.report).toBe('Removed 1 sparser complex statements\n')
  })
})

describe('medscan filter', () => {
  it('removes statements with medscan as the only source', () => {
    const res = privateSourceOnlyFilter().apply(
      evidence([stmt(1, { source_counts: { medscan: 4 } }), stmt(2, { source_counts: { medscan: 1, reach: 1 } })])
    )
    expect(Object.keys(res.evidence.stmts)).toEqual(['2'])
    expect(res.report).toBe('Removed 1 medscan statements\n')
  })
})

describe('curation filter', () => {
  const curations = [
    { pa_hash: 111, tag: 'grounding' },
    { pa_hash: '222', tag: 'correct' },
    { pa_hash: 333, tag: 'wrong_relation' },
    { pa_hash: 333, tag: 'hypothesis' }
  ]

  it('removes statements whose curations are all negative', () => {
    const res = curationFilter(curations).apply(evidence([stmt(111), stmt(222), stmt(333), stmt(444)]))
    expect(Object.keys(res.evidence.stmts)).toEqual(['222', '333', '444'])
    expect(res.report).toBe('Removed 1 statements that lacked good curations\n')
  })

  it('tells apart 64-bit hashes that differ past double precision', () => {
    const res = curationFilter([{ pa_hash: 18861998898188965n, tag: 'grounding' }]).apply(
      evidence([stmt(1, { stmt_hash: 18861998898188963n }), stmt(2, { stmt_hash: '18861998898188965' })])
    )
    expect(Object.keys(res.evidence.stmts)).toEqual(['18861998898188963'])
    expect(res.report).toBe('Removed 1 statements that lacked good curations\n')
  })

  it('keeps everything without curations', () => {
    const res = curationFilter().apply(evidence([stmt(111)]))
    expect(Object.keys(res.evidence.stmts)).toEqual(['111'])
    expect(res.report).toBe('')
  })

  it('rejects a malformed curation list', () => {
    expect(() => curationFilter([{ tag: 'correct' }])).toThrow('Malformed curation list: 0.pa_hash: Required')
  })
})

describe('filter chain', () => {
  it('applies filters in order and concatenates reports', () => {
    const input = evidence([
      stmt(1, { english: 'A binds A.' }),
      stmt(2, { source_counts: { reach: 1 } }),
      stmt(3, { stmt_type: 'Complex', source_counts: { sparser: 2 } }),
      stmt(4)
    ])
    const res = applyFilterChain(defaultFilterChain(), input)
    expect(Object.keys(res.evidence.stmts)).toEqual(['4'])
    expect(res.report).toBe(
      'Removed 1 self loop statements\n' +
        'Removed 1 statements with only single reading system source\n' +
        'Removed 1 sparser complex statements\n'
    )
  })

  it('is idempotent and leaves its input untouched', () => {
    const input = evidence([stmt(1, { source_counts: { reach: 1 } }), stmt(2)])
    const once = applyFilterChain(defaultFilterChain(), input)
    const twice = applyFilterChain(defaultFilterChain(), once.evidence)
    expect(twice.evidence).toEqual(once.evidence)
    expect(twice.report).toBe('')
    expect(Object.keys(input.stmts)).toEqual(['1', '2'])
  })

  it('handles an entry without statements', () => {
    const res = applyFilterChain(defaultFilterChain(), evidence([]))
    expect(res.evidence.stmts).toEqual({})
    expect(res.report).toBe('')
  })
})
