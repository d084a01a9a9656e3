import { describe, it, expect } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import { CxNetwork } from './cxNetwork'

const FIXTURE = path.join(process.cwd(), 'src/evidence/__fixtures__/network.cx')

function loadFixture() {
  return CxNetwork.fromCx(JSON.parse(fs.readFileSync(FIXTURE, 'utf8')))
}

describe('CxNetwork', () => {
  it('reads nodes, edges and attributes', () => {
    const net = loadFixture()
    expect(net.getName()).toBe('Test pathway')
    expect(net.getNodes()).toEqual([
      { id: 0, name: 'MAPK1', represents: 'hgnc:6871' },
      { id: 1, name: 'MAP2K1' },
      { id: 2, name: 'RAF' }
    ])
    expect(net.getEdges()).toEqual([{ id: 0, source: 1, target: 0, interaction: 'controls-state-change-of' }])
    expect(net.getNodeAttribute(2, 'member')?.value).toEqual(['hgnc.symbol:RAF1', 'hgnc.symbol:BRAF'])
    expect(net.getEdgeAttribute(0, 'weight')).toEqual({ name: 'weight', value: 0.5, type: 'double' })
  })

  it('allocates ids after the highest one read', () => {
    const net = loadFixture()
    expect(net.createNode('BRAF')).toBe(3)
    expect(net.createEdge(3, 1, 'interacts with')).toBe(1)
  })

  it('writes aspects back with regenerated metadata', () => {
    const net = loadFixture()
    net.setName('Renamed')
    const cx = net.toCx()

    expect(cx[0]).toEqual({ numberVerification: [{ longNumber: 281474976710655 }] })
    expect(cx[cx.length - 1]).toEqual({ status: [{ error: '', success: true }] })
    expect(cx[1]).toEqual({
      metaData: [
        { name: 'nodes', elementCount: 3, version: '1.0', consistencyGroup: 1, idCounter: 3 },
        { name: 'edges', elementCount: 1, version: '1.0', consistencyGroup: 1, idCounter: 1 },
        { name: 'nodeAttributes', elementCount: 1, version: '1.0', consistencyGroup: 1 },
        { name: 'edgeAttributes', elementCount: 1, version: '1.0', consistencyGroup: 1 },
        { name: 'networkAttributes', elementCount: 2, version: '1.0', consistencyGroup: 1 },
        { name: 'cartesianLayout', elementCount: 1, version: '1.0', consistencyGroup: 1 }
      ]
    })
    expect(cx).toContainEqual({ cartesianLayout: [{ node: 0, x: 10.5, y: -3 }] })
    expect(cx).toContainEqual({
      networkAttributes: [
        { n: 'name', v: 'Renamed' },
        { n: 'description', v: 'Small signalling fixture' }
      ]
    })

    const reread = CxNetwork.fromCx(cx)
    expect(reread.getName()).toBe('Renamed')
    expect(reread.getEdgeAttribute(0, 'weight')?.type).toBe('double')
  })

  it('drops an edge together with its attributes', () => {
    const net = loadFixture()
    net.removeEdge(0)
    expect(net.getEdges()).toEqual([])
    expect(net.getEdgeAttributes(0)).toEqual([])
  })

  it('refuses edges to unknown nodes', () => {
    const net = new CxNetwork()
    net.createNode('A')
    expect(() => net.createEdge(0, 7, 'interacts with')).toThrow('Cannot create edge 0 -> 7: unknown node')
  })

  it('rejects malformed documents', () => {
    expect(() => CxNetwork.fromCx({ nodes: [] })).toThrow('Malformed CX document')
    expect(() => CxNetwork.fromCx([{ nodes: [{ n: 'A' }] }])).toThrow('Malformed CX nodes aspect: 0.@id: Required')
  })
})
