import defaultConfig from '../config'
import type { AnnotatorConfig } from '../config'
import { debug, info } from '../logger'
import { nodeNameToIdMap, removeEdgeWithAttributes } from '../network/lookup'
import type { Network } from '../network/types'
import { querySubgraph } from './client'
import type { QueryOptions, SubgraphResponse } from './client'
import { addPairEdge, poolStatements } from './edges'
import { applyFilterChain, defaultFilterChain } from './filters'
import { parseEvidencePayload } from './schema'
import type { EvidencePayload, StatementFilter } from './types'

export interface ApplyOptions {
  config?: AnnotatorConfig
  filters?: readonly StatementFilter[] // defaults to the standard chain without curations
  netPrefix?: string
  removeOriginalEdges?: boolean
  sourceValue?: string // stamped on pre-existing edges that have no edge source
  queryTimeSeconds?: number
}

export interface AnnotateOptions extends Omit<ApplyOptions, 'queryTimeSeconds'> {
  payload?: unknown // cached or pre-fetched payload; skips the subgraph query
  query?: (network: Network, opts: QueryOptions) => Promise<SubgraphResponse>
}

export interface AnnotateResult {
  network: Network
  payload: EvidencePayload
  report: string
  edgesAdded: number
}

export function removeOriginalEdges(network: Network) {
  info('Removing original edges')
  for (const edge of network.getEdges()) removeEdgeWithAttributes(network, edge.id)
}

export function addSourceToExistingEdges(network: Network, sourceValue: string | undefined, cfg: AnnotatorConfig = defaultConfig) {
  if (sourceValue === undefined) return
  for (const edge of network.getEdges()) {
    if (network.getEdgeAttribute(edge.id, cfg.edgeAttributes.source) === undefined) {
      network.setEdgeAttribute(edge.id, cfg.edgeAttributes.source, sourceValue)
    }
  }
}

function describeRun(existing: unknown, cfg: AnnotatorConfig) {
  const desc = existing === undefined || existing === null ? '' : String(existing)
  return (
    `${desc}\n\n<b>Additional edges added by ${cfg.toolName} (version: ${cfg.version})</b>` +
    ` using <a href="${cfg.serviceUrl}" target="${cfg.browserTarget}">${cfg.serviceLabel}</a><br/>`
  )
}

/**
 * Adds one evidence edge per node pair in `payload` to `network` and writes
 * the run's network attributes. Mutates `network`; `payload` is left as is.
 */
export function applyEvidence(network: Network, payload: EvidencePayload, opts: ApplyOptions = {}): AnnotateResult {
  const cfg = opts.config ?? defaultConfig
  const filters = opts.filters ?? defaultFilterChain()

  if (opts.removeOriginalEdges) removeOriginalEdges(network)

  const nameToId = nodeNameToIdMap(network)
  let report = ''
  const filtered = payload.edges.map((raw) => {
    const res = applyFilterChain(filters, raw)
    report += res.report
    return res.evidence
  })

  const pools = poolStatements(filtered, nameToId)
  for (const pool of pools) {
    debug(`${pool.key} # of statements: ${pool.statements.length}`)
    addPairEdge(network, pool, cfg)
  }

  const attrs = cfg.networkAttributes
  network.setNetworkAttribute(attrs.queryTime, String(opts.queryTimeSeconds ?? 0))
  network.setNetworkAttribute(attrs.description, describeRun(network.getNetworkAttribute(attrs.description)?.value, cfg))
  network.setNetworkAttribute(attrs.parameters, { 'Remove Original Edges': opts.removeOriginalEdges ?? false })
  network.setName(`${opts.netPrefix ?? cfg.netPrefix}${network.getName()}`)

  addSourceToExistingEdges(network, opts.sourceValue, cfg)

  if (report) info(`Filter report for ${network.getName()}:\n${report.trimEnd()}`)
  return { network, payload, report, edgesAdded: pools.length }
}

/**
 * Annotates `network` with evidence from the subgraph service, or from
 * `opts.payload` when one is supplied. The validated payload is returned so
 * the caller can cache it.
 */
export async function annotateNetwork(network: Network, opts: AnnotateOptions = {}): Promise<AnnotateResult> {
  const cfg = opts.config ?? defaultConfig
  let raw = opts.payload
  let queryTimeSeconds = 0
  if (raw === undefined) {
    const query = opts.query ?? querySubgraph
    const res = await query(network, { endpoint: cfg.subgraphEndpoint, timeoutSeconds: cfg.timeoutSeconds })
    raw = res.body
    queryTimeSeconds = res.elapsedSeconds
  }
  const payload = parseEvidencePayload(raw)
  return applyEvidence(network, payload, { ...opts, config: cfg, queryTimeSeconds })
}
