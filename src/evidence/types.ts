import type { EdgeEvidence, Statement } from './schema'

export type { Curation, EdgeEvidence, Entity, EvidencePayload, Statement } from './schema'

export interface FilterResult {
  evidence: EdgeEvidence
  report: string // '' when nothing was removed
}

export interface StatementFilter {
  describe(): string
  apply(evidence: EdgeEvidence): FilterResult
}

// Statement placed into a canonical pair pool
export type PooledStatement = Statement & {
  sourceNode: string
  targetNode: string
  sourceNodeId: number
  targetNodeId: number
  isReversed: boolean
}

export interface PairKey {
  key: string
  isReversed: boolean
}

export interface StatementPool {
  key: string
  sourceId: number // smaller id
  targetId: number
  statements: PooledStatement[]
}

export interface EvidenceEntry {
  text: string
  count: number
}

export interface PairSummary {
  statements: PooledStatement[] // deduplicated and merged
  forwardCount: number
  reverseCount: number
  totalEvidence: number
  relationships: string
}
