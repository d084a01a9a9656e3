import { describe, it, expect } from 'vitest'
import { leadingToken, orderEvidenceEntries } from './ordering'

describe('evidence ordering', () => {
  it('orders groups by their highest count', () => {
    const out = orderEvidenceEntries([
      { text: 'A activ B #1', count: 1 },
      { text: 'A activ B #2', count: 5 },
      { text: 'C bind D', count: 10 }
    ])
    expect(out).toEqual(['C bind D', 'A activ B #2', 'A activ B #1'])
  })

  it('keeps first-seen order on ties', () => {
    const out = orderEvidenceEntries([
      { text: 'X a', count: 2 },
      { text: 'Y b', count: 2 },
      { text: 'X c', count: 2 }
    ])
    expect(out).toEqual(['X a', 'X c', 'Y b'])
  })

  it('handles empty input', () => {
    expect(orderEvidenceEntries([])).toEqual([])
  })

  it('takes the text before the first space', () => {
    expect(leadingToken('MAPK1 binds MAP2K1')).toBe('MAPK1')
    expect(leadingToken('MAPK1')).toBe('MAPK1')
  })
})
