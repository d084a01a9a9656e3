import type { AnnotatorConfig } from '../config'
import { debug, warn } from '../logger'
import type { Network } from '../network/types'
import { dedupeByHash, mergeByEnglish, normalizeStatements, numericEvidenceCount } from './dedupe'
import { allEvidenceLink, statementEvidenceLink } from './links'
import { orderEvidenceEntries } from './ordering'
import type { EdgeEvidence, EvidenceEntry, PairKey, PairSummary, PooledStatement, StatementPool } from './types'

/**
 * Order-independent key for a node pair, smaller id first. `isReversed` is
 * true when the ids had to be swapped.
 */
export function canonicalPairKey(srcId: number, targetId: number): PairKey {
  if (srcId <= targetId) return { key: `${srcId}_${targetId}`, isReversed: false }
  return { key: `${targetId}_${srcId}`, isReversed: true }
}

/**
 * Pools the statements of every entry whose endpoints are both in the
 * network, keyed by canonical pair so forward and reverse entries share one
 * pool. Entries naming nodes outside the network are skipped.
 */
export function poolStatements(edges: readonly EdgeEvidence[], nameToId: ReadonlyMap<string, number>): StatementPool[] {
  const pools = new Map<string, StatementPool>()
  for (const evidence of edges) {
    const srcName = evidence.edge[0].name
    // a single entity is a self loop
    const targetName = (evidence.edge[1] ?? evidence.edge[0]).name
    const srcId = nameToId.get(srcName)
    const targetId = nameToId.get(targetName)
    if (srcId === undefined || targetId === undefined) {
      debug(`Skipping ${srcName} => ${targetName}: not in network`)
      continue
    }

    const { key, isReversed } = canonicalPairKey(srcId, targetId)
    for (const [stmtKey, stmt] of Object.entries(evidence.stmts)) {
      debug(`${stmtKey} > ${srcName} => ${targetName} (${stmt.stmt_type})`)
      let pool = pools.get(key)
      if (!pool) {
        pool = { key, sourceId: Math.min(srcId, targetId), targetId: Math.max(srcId, targetId), statements: [] }
        pools.set(key, pool)
      }
      pool.statements.push({
        ...stmt,
        sourceNode: srcName,
        targetNode: targetName,
        sourceNodeId: srcId,
        targetNodeId: targetId,
        isReversed
      })
    }
  }
  return Array.from(pools.values())
}

/**
 * Dedupes, merges and orders a pool's statements and composes the
 * relationships HTML for its edge.
 */
export function summarizeStatements(stmts: readonly PooledStatement[], cfg: AnnotatorConfig): PairSummary {
  const merged = mergeByEnglish(normalizeStatements(dedupeByHash(stmts)))

  let forwardCount = 0
  let reverseCount = 0
  let totalEvidence = 0
  const entries: EvidenceEntry[] = []
  for (const stmt of merged) {
    if (!cfg.nonDirectionalTypes.includes(stmt.stmt_type)) {
      if (stmt.isReversed) reverseCount++
      else forwardCount++
    }

    const count = numericEvidenceCount(stmt.evidence_count)
    const link = statementEvidenceLink(stmt.evidence_count, stmt.sourceNode, stmt.targetNode, stmt.stmt_type, cfg)
    entries.push({ text: `${stmt.english}(${link})`, count: count ?? 0 })
    if (count === undefined) {
      warn(`Expected a number for evidence_count in this statement, but got: ${stmt.evidence_count} full statement:`, stmt)
    } else {
      totalEvidence += count
    }
  }

  const last = merged.at(-1)
  const allLink = allEvidenceLink(totalEvidence, last?.sourceNode ?? '', last?.targetNode ?? '', cfg)
  const relationships = `All Evidences (${allLink})<ul><li/>${orderEvidenceEntries(entries).join('<li/>')}</ul>`

  return { statements: merged, forwardCount, reverseCount, totalEvidence, relationships }
}

/**
 * Creates the single edge for a pool and writes its attributes. Returns the
 * new edge id.
 */
export function addPairEdge(network: Network, pool: StatementPool, cfg: AnnotatorConfig): number {
  const names = cfg.edgeAttributes
  const edgeId = network.createEdge(pool.sourceId, pool.targetId, cfg.interaction)
  const summary = summarizeStatements(pool.statements, cfg)

  network.setEdgeAttribute(edgeId, names.relationships, summary.relationships, 'string')
  network.setEdgeAttribute(edgeId, names.source, cfg.edgeSourceValue)
  if (summary.totalEvidence > 0) {
    network.setEdgeAttribute(edgeId, names.relationshipScore, Math.log(summary.totalEvidence), 'double')
  } else {
    warn(`Edge ${pool.key} has no countable evidence, leaving ${names.relationshipScore} unset`)
  }
  network.setEdgeAttribute(edgeId, names.directed, summary.forwardCount > 0, 'boolean')
  network.setEdgeAttribute(edgeId, names.reverseDirected, summary.reverseCount > 0, 'boolean')
  return edgeId
}
