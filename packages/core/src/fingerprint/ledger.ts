import type { SourceFingerprint } from '../types'

/**
 * Persistence of source fingerprints. Keys are `<group>/<source id>`.
 * `commit` replaces each record as a unit; an absent record reads as undefined.
 */
export interface LedgerStore {
  read(key: string): Promise<string | undefined>
  commit(records: SourceFingerprint[]): Promise<void>
}

export interface MemoryLedger extends LedgerStore {
  snapshot(): Record<string, string>
}

export function createMemoryLedger(initial: Record<string, string> = {}): MemoryLedger {
  const records = new Map(Object.entries(initial))
  return {
    async read(key) {
      return records.get(key)
    },
    async commit(list) {
      for (const r of list) records.set(r.sourceId, r.digest)
    },
    snapshot() {
      return Object.fromEntries([...records.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)))
    },
  }
}
