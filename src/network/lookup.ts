import type { Network } from './types'

export const MEMBER_ATTRIBUTE = 'member'
export const MEMBER_PREFIX = 'hgnc.symbol:'

/**
 * Names listed in a family node's `member` attribute, with the namespace
 * prefix removed. Non-family nodes give an empty list.
 */
export function getFamilyMembers(network: Network, nodeId: number): string[] {
  const attr = network.getNodeAttribute(nodeId, MEMBER_ATTRIBUTE)
  if (!attr || !Array.isArray(attr.value)) return []
  return attr.value
    .filter((entry): entry is string => typeof entry === 'string')
    .map((entry) => (entry.startsWith(MEMBER_PREFIX) ? entry.slice(MEMBER_PREFIX.length) : entry))
}

export function isFamilyNode(network: Network, nodeId: number): boolean {
  return getFamilyMembers(network, nodeId).length > 0
}

/**
 * Name → node id for every node and every family member. Later entries
 * overwrite earlier ones and a node's name is set after its members.
 */
export function nodeNameToIdMap(network: Network): Map<string, number> {
  const lookup = new Map<string, number>()
  for (const node of network.getNodes()) {
    for (const member of getFamilyMembers(network, node.id)) lookup.set(member, node.id)
    lookup.set(node.name, node.id)
  }
  return lookup
}

export function nodeIdToNameMap(network: Network): Map<number, string> {
  return new Map(network.getNodes().map((node) => [node.id, node.name]))
}

export function removeEdgeWithAttributes(network: Network, edgeId: number) {
  for (const attr of network.getEdgeAttributes(edgeId)) network.removeEdgeAttribute(edgeId, attr.name)
  network.removeEdge(edgeId)
}
