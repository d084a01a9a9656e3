import { EvidenceLoaderError } from '../errors'
import { parseJson } from '../interfaces/json'
import { debug } from '../logger'
import { getFamilyMembers } from '../network/lookup'
import type { Network } from '../network/types'

export interface SubgraphQueryNode {
  name: string
  namespace: string
  identifier: string
  lookup: null
}

export interface SubgraphQuery {
  nodes: SubgraphQueryNode[]
}

export interface SubgraphResponse {
  body: unknown
  elapsedSeconds: number
}

export interface QueryOptions {
  endpoint: string
  timeoutSeconds: number
}

function queryNode(name: string): SubgraphQueryNode {
  return { name, namespace: '0', identifier: '0', lookup: null }
}

/**
 * Every node name, followed by the members of family nodes, in node order.
 */
export function buildSubgraphQuery(network: Network): SubgraphQuery {
  const nodes: SubgraphQueryNode[] = []
  for (const node of network.getNodes()) {
    nodes.push(queryNode(node.name))
    for (const member of getFamilyMembers(network, node.id)) nodes.push(queryNode(member))
  }
  return { nodes }
}

export async function querySubgraph(network: Network, opts: QueryOptions): Promise<SubgraphResponse> {
  const query = buildSubgraphQuery(network)
  debug('Subgraph query', opts.endpoint, `${query.nodes.length} nodes`)

  const start = Math.floor(Date.now() / 1000)
  let res: Response
  try {
    res = await fetch(opts.endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(query),
      signal: AbortSignal.timeout(opts.timeoutSeconds * 1000)
    })
  } catch (err) {
    throw new EvidenceLoaderError(`Subgraph query to ${opts.endpoint} failed: ${String(err)}`, { cause: err })
  }
  const text = await res.text()
  const elapsedSeconds = Math.floor(Date.now() / 1000) - start
  debug('Subgraph status', res.status, `${text.length} bytes in ${elapsedSeconds}s`)

  if (!res.ok) {
    throw new EvidenceLoaderError(`Caught non 200 http code from query : ${res.status} : ${text}`)
  }
  try {
    return { body: parseJson(text), elapsedSeconds }
  } catch (err) {
    throw new EvidenceLoaderError(`Caught Exception attempting to parse json from query ${String(err)}`, { cause: err })
  }
}
