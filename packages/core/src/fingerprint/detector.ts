import type { SourceFingerprint, SourceState } from '../types'
import { digestBytes, ledgerKey } from './digest'
import type { DigestAlgorithm } from './digest'
import type { LedgerStore } from './ledger'

export interface SourceCheck {
  key: string
  digest: string
  state: SourceState
  previous?: string
}

export class ChangeDetector {
  private readonly algorithm: DigestAlgorithm

  constructor(private readonly ledger: LedgerStore, opts: { algorithm?: DigestAlgorithm } = {}) {
    this.algorithm = opts.algorithm ?? 'sha256'
  }

  async check(group: string, sourceId: string, bytes: Uint8Array | string): Promise<SourceCheck> {
    const key = ledgerKey(group, sourceId)
    const digest = digestBytes(bytes, this.algorithm)
    const previous = await this.ledger.read(key)
    const state: SourceState = previous === digest ? 'unchanged' : 'changed'
    return previous === undefined ? { key, digest, state } : { key, digest, state, previous }
  }

  /** Only called after the group's artifacts were committed */
  async commit(checks: SourceCheck[]): Promise<void> {
    const records: SourceFingerprint[] = checks.map(c => ({ sourceId: c.key, digest: c.digest }))
    await this.ledger.commit(records)
  }
}
