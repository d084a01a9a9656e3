import { describe, it, expect } from 'vitest'
import { CxNetwork } from './cxNetwork'
import { getFamilyMembers, isFamilyNode, nodeIdToNameMap, nodeNameToIdMap, removeEdgeWithAttributes } from './lookup'

describe('network lookup', () => {
  it('strips the namespace from family members', () => {
    const net = new CxNetwork()
    const raf = net.createNode('RAF')
    const a = net.createNode('A')
    net.setNodeAttribute(raf, 'member', ['hgnc.symbol:BRAF', 'RAF1'], 'list_of_string')
    expect(getFamilyMembers(net, raf)).toEqual(['BRAF', 'RAF1'])
    expect(isFamilyNode(net, raf)).toBe(true)
    expect(isFamilyNode(net, a)).toBe(false)
  })

  it('maps members and names to ids, later nodes winning', () => {
    const net = new CxNetwork()
    const raf = net.createNode('RAF')
    const x = net.createNode('X')
    net.setNodeAttribute(raf, 'member', ['hgnc.symbol:BRAF'], 'list_of_string')
    net.setNodeAttribute(x, 'member', ['hgnc.symbol:RAF'], 'list_of_string')
    expect(Array.from(nodeNameToIdMap(net).entries())).toEqual([
      ['BRAF', 0],
      ['RAF', 1],
      ['X', 1]
    ])
    expect(nodeIdToNameMap(net).get(1)).toBe('X')
  })

  it('removes an edge with its attributes', () => {
    const net = new CxNetwork()
    net.createNode('A')
    net.createNode('B')
    const edge = net.createEdge(0, 1, 'pp')
    net.setEdgeAttribute(edge, 'weight', 2, 'double')
    removeEdgeWithAttributes(net, edge)
    expect(net.getEdges()).toEqual([])
    expect(net.getEdgeAttribute(edge, 'weight')).toBeUndefined()
  })
})
