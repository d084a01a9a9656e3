export type AttributeType = 'string' | 'boolean' | 'double' | 'integer' | 'long' | 'list_of_string'

export type AttributeValue = string | number | boolean | string[] | { [key: string]: unknown }

export interface Attribute {
  name: string
  value: unknown
  type?: string // CX data type; absent means string
}

export interface NetworkNode {
  id: number
  name: string
  represents?: string
}

export interface NetworkEdge {
  id: number
  source: number
  target: number
  interaction?: string
}

/**
 * Capabilities the annotator needs from a network. {@link CxNetwork} is the
 * in-memory implementation used by the loader and the tests.
 */
export interface Network {
  getName(): string
  setName(name: string): void

  getNodes(): NetworkNode[]
  getNodeAttribute(nodeId: number, name: string): Attribute | undefined

  getEdges(): NetworkEdge[]
  createEdge(source: number, target: number, interaction: string): number
  removeEdge(edgeId: number): void
  getEdgeAttribute(edgeId: number, name: string): Attribute | undefined
  getEdgeAttributes(edgeId: number): Attribute[]
  setEdgeAttribute(edgeId: number, name: string, value: AttributeValue, type?: AttributeType): void
  removeEdgeAttribute(edgeId: number, name: string): void

  getNetworkAttribute(name: string): Attribute | undefined
  setNetworkAttribute(name: string, value: AttributeValue, type?: AttributeType): void
}
