import { emptyKindCounts, RULE_KINDS } from '../types'
import type { RuleEntry, RuleGroup, RuleKind } from '../types'

const KIND_RANK = new Map<RuleKind, number>(RULE_KINDS.map((k, i) => [k, i]))

/** Code-unit comparison; localeCompare would make the order depend on the host's ICU data */
function compareValues(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

export function compareEntries(a: RuleEntry, b: RuleEntry): number {
  const byKind = (KIND_RANK.get(a.kind) ?? 0) - (KIND_RANK.get(b.kind) ?? 0)
  return byKind !== 0 ? byKind : compareValues(a.value, b.value)
}

export function entryKey(e: RuleEntry): string {
  return `${e.kind}\u0000${e.value}`
}

export interface AggregateStats {
  entries: number
  byKind: Record<RuleKind, number>
  duplicates: number
}

/**
 * Accumulates entries of one group. First occurrence wins, later equal
 * entries only bump the duplicate counter. Output order never depends on input order.
 */
export class RuleSetBuilder {
  private readonly seen = new Map<string, RuleEntry>()
  private dup = 0

  add(entry: RuleEntry): boolean {
    const key = entryKey(entry)
    if (this.seen.has(key)) {
      this.dup++
      return false
    }
    this.seen.set(key, { kind: entry.kind, value: entry.value })
    return true
  }

  addAll(entries: Iterable<RuleEntry>): this {
    for (const e of entries) this.add(e)
    return this
  }

  get size(): number {
    return this.seen.size
  }

  stats(): AggregateStats {
    const byKind = emptyKindCounts()
    for (const e of this.seen.values()) byKind[e.kind]++
    return { entries: this.seen.size, byKind, duplicates: this.dup }
  }

  build(name: string): RuleGroup {
    return { name, entries: [...this.seen.values()].sort(compareEntries) }
  }
}

/** Union of every source's entries as one sorted group */
export function aggregate(name: string, sources: Iterable<Iterable<RuleEntry>>): RuleGroup {
  const b = new RuleSetBuilder()
  for (const entries of sources) b.addAll(entries)
  return b.build(name)
}
