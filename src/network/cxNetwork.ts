import { z } from 'zod'
import { EvidenceLoaderError } from '../errors'
import { formatIssues } from '../evidence/schema'
import type { Attribute, AttributeType, AttributeValue, Network, NetworkEdge, NetworkNode } from './types'

const CxNodeSchema = z.object({ '@id': z.number().int(), n: z.string().nullish(), r: z.string().nullish() }).passthrough()
const CxEdgeSchema = z
  .object({ '@id': z.number().int(), s: z.number().int(), t: z.number().int(), i: z.string().nullish() })
  .passthrough()
const CxElementAttributeSchema = z.object({ po: z.number().int(), n: z.string(), v: z.unknown(), d: z.string().optional() })
const CxNetworkAttributeSchema = z.object({ n: z.string(), v: z.unknown(), d: z.string().optional() })
const CxDocumentSchema = z.array(z.record(z.array(z.unknown())))

// regenerated on every write
const GENERATED_ASPECTS = new Set(['numberVerification', 'metaData', 'status'])
const CORE_ASPECTS = new Set(['nodes', 'edges', 'nodeAttributes', 'edgeAttributes', 'networkAttributes'])

type CxFragment = Record<string, unknown[]>

function parseAspect<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, aspect: string, entries: unknown[]): T[] {
  const res = z.array(schema).safeParse(entries)
  if (!res.success) throw new EvidenceLoaderError(`Malformed CX ${aspect} aspect: ${formatIssues(res.error)}`)
  return res.data
}

function toAttribute(name: string, value: unknown, type?: string): Attribute {
  return type === undefined ? { name, value } : { name, value, type }
}

function fromAttribute(attr: Attribute) {
  return attr.type === undefined || attr.type === 'string' ? { n: attr.name, v: attr.value } : { n: attr.name, v: attr.value, d: attr.type }
}

/**
 * In-memory network backed by the CX aspect model. Aspects it does not
 * interpret (layout, visual properties, provenance) are kept and written back.
 */
export class CxNetwork implements Network {
  private nodes = new Map<number, NetworkNode>()
  private edges = new Map<number, NetworkEdge>()
  private nodeAttributes = new Map<number, Map<string, Attribute>>()
  private edgeAttributes = new Map<number, Map<string, Attribute>>()
  private networkAttributes = new Map<string, Attribute>()
  private opaqueAspects: CxFragment[] = []
  private nextNodeId = 0
  private nextEdgeId = 0

  static fromCx(raw: unknown): CxNetwork {
    const doc = CxDocumentSchema.safeParse(raw)
    if (!doc.success) throw new EvidenceLoaderError(`Malformed CX document: ${formatIssues(doc.error)}`)

    const net = new CxNetwork()
    for (const fragment of doc.data) {
      for (const [aspect, entries] of Object.entries(fragment)) {
        if (aspect === 'nodes') {
          for (const n of parseAspect(CxNodeSchema, aspect, entries)) net.addNode(n['@id'], n.n ?? '', n.r ?? undefined)
        } else if (aspect === 'edges') {
          for (const e of parseAspect(CxEdgeSchema, aspect, entries)) {
            net.edges.set(e['@id'], { id: e['@id'], source: e.s, target: e.t, interaction: e.i ?? undefined })
            net.nextEdgeId = Math.max(net.nextEdgeId, e['@id'] + 1)
          }
        } else if (aspect === 'nodeAttributes') {
          for (const a of parseAspect(CxElementAttributeSchema, aspect, entries)) {
            attributesFor(net.nodeAttributes, a.po).set(a.n, toAttribute(a.n, a.v, a.d))
          }
        } else if (aspect === 'edgeAttributes') {
          for (const a of parseAspect(CxElementAttributeSchema, aspect, entries)) {
            attributesFor(net.edgeAttributes, a.po).set(a.n, toAttribute(a.n, a.v, a.d))
          }
        } else if (aspect === 'networkAttributes') {
          for (const a of parseAspect(CxNetworkAttributeSchema, aspect, entries)) {
            net.networkAttributes.set(a.n, toAttribute(a.n, a.v, a.d))
          }
        } else if (!GENERATED_ASPECTS.has(aspect)) {
          net.opaqueAspects.push({ [aspect]: entries })
        }
      }
    }
    return net
  }

  toCx(): CxFragment[] {
    const nodeAttrs = Array.from(this.nodeAttributes.entries()).flatMap(([po, attrs]) =>
      Array.from(attrs.values()).map((a) => ({ po, ...fromAttribute(a) }))
    )
    const edgeAttrs = Array.from(this.edgeAttributes.entries()).flatMap(([po, attrs]) =>
      Array.from(attrs.values()).map((a) => ({ po, ...fromAttribute(a) }))
    )
    const core: CxFragment[] = [
      {
        nodes: Array.from(this.nodes.values()).map((n) =>
          n.represents === undefined ? { '@id': n.id, n: n.name } : { '@id': n.id, n: n.name, r: n.represents }
        )
      },
      {
        edges: Array.from(this.edges.values()).map((e) =>
          e.interaction === undefined ? { '@id': e.id, s: e.source, t: e.target } : { '@id': e.id, s: e.source, t: e.target, i: e.interaction }
        )
      },
      { nodeAttributes: nodeAttrs },
      { edgeAttributes: edgeAttrs },
      { networkAttributes: Array.from(this.networkAttributes.values()).map(fromAttribute) }
    ]
    const body = [...core, ...this.opaqueAspects].filter((fragment) => {
      const [aspect, entries] = Object.entries(fragment)[0]
      return CORE_ASPECTS.has(aspect) ? entries.length > 0 : true
    })
    const metaData = body.map((fragment) => {
      const [aspect, entries] = Object.entries(fragment)[0]
      const meta: Record<string, unknown> = { name: aspect, elementCount: entries.length, version: '1.0', consistencyGroup: 1 }
      if (aspect === 'nodes') meta.idCounter = this.nextNodeId
      if (aspect === 'edges') meta.idCounter = this.nextEdgeId
      return meta
    })
    return [
      { numberVerification: [{ longNumber: 281474976710655 }] },
      { metaData },
      ...body,
      { status: [{ error: '', success: true }] }
    ]
  }

  getName(): string {
    const value = this.networkAttributes.get('name')?.value
    return typeof value === 'string' ? value : ''
  }

  setName(name: string) {
    this.networkAttributes.set('name', { name: 'name', value: name })
  }

  createNode(name: string): number {
    const id = this.nextNodeId
    this.addNode(id, name)
    return id
  }

  private addNode(id: number, name: string, represents?: string) {
    this.nodes.set(id, represents === undefined ? { id, name } : { id, name, represents })
    this.nextNodeId = Math.max(this.nextNodeId, id + 1)
  }

  getNodes(): NetworkNode[] {
    return Array.from(this.nodes.values(), (n) => ({ ...n }))
  }

  getNodeAttribute(nodeId: number, name: string): Attribute | undefined {
    return this.nodeAttributes.get(nodeId)?.get(name)
  }

  setNodeAttribute(nodeId: number, name: string, value: AttributeValue, type?: AttributeType) {
    attributesFor(this.nodeAttributes, nodeId).set(name, toAttribute(name, value, type))
  }

  getEdges(): NetworkEdge[] {
    return Array.from(this.edges.values(), (e) => ({ ...e }))
  }

  createEdge(source: number, target: number, interaction: string): number {
    if (!this.nodes.has(source) || !this.nodes.has(target)) {
      throw new EvidenceLoaderError(`Cannot create edge ${source} -> ${target}: unknown node`)
    }
    const id = this.nextEdgeId++
    this.edges.set(id, { id, source, target, interaction })
    return id
  }

  removeEdge(edgeId: number) {
    this.edges.delete(edgeId)
    this.edgeAttributes.delete(edgeId)
  }

  getEdgeAttribute(edgeId: number, name: string): Attribute | undefined {
    return this.edgeAttributes.get(edgeId)?.get(name)
  }

  getEdgeAttributes(edgeId: number): Attribute[] {
    return Array.from(this.edgeAttributes.get(edgeId)?.values() ?? [])
  }

  setEdgeAttribute(edgeId: number, name: string, value: AttributeValue, type?: AttributeType) {
    attributesFor(this.edgeAttributes, edgeId).set(name, toAttribute(name, value, type))
  }

  removeEdgeAttribute(edgeId: number, name: string) {
    const attrs = this.edgeAttributes.get(edgeId)
    if (!attrs) return
    attrs.delete(name)
    if (attrs.size === 0) this.edgeAttributes.delete(edgeId)
  }

  getNetworkAttribute(name: string): Attribute | undefined {
    return this.networkAttributes.get(name)
  }

  setNetworkAttribute(name: string, value: AttributeValue, type?: AttributeType) {
    this.networkAttributes.set(name, toAttribute(name, value, type))
  }
}

function attributesFor(store: Map<number, Map<string, Attribute>>, id: number): Map<string, Attribute> {
  let attrs = store.get(id)
  if (!attrs) {
    attrs = new Map()
    store.set(id, attrs)
  }
  return attrs
}
