import { debug } from '../logger'
import type { EvidenceEntry } from './types'

export function leadingToken(text: string): string {
  const idx = text.indexOf(' ')
  return idx === -1 ? text : text.slice(0, idx)
}

/**
 * Orders display entries in two levels. Entries are grouped by their leading
 * entity name and each group is sorted by evidence count, highest first.
 * Groups are then ordered by their highest count. Both sorts are stable, so
 * ties keep first-seen order.
 */
export function orderEvidenceEntries(entries: readonly EvidenceEntry[]): string[] {
  const groups = new Map<string, EvidenceEntry[]>()
  for (const entry of entries) {
    const token = leadingToken(entry.text)
    const group = groups.get(token)
    if (group) group.push(entry)
    else groups.set(token, [entry])
  }

  const ranked = Array.from(groups.values()).map((group) => {
    const sorted = [...group].sort((a, b) => b.count - a.count)
    return { max: sorted[0].count, texts: sorted.map((e) => e.text) }
  })
  ranked.sort((a, b) => b.max - a.max)
  debug('Ordered evidence groups:', ranked.map((g) => `${g.max}:${g.texts.length}`).join(','))

  return ranked.flatMap((g) => g.texts)
}
