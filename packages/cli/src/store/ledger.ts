import fs from 'node:fs/promises'
import path from 'node:path'
import { ConfigError } from '@netrules/core'
import type { LedgerStore } from '@netrules/core'

import { atomicWrite } from '../cli-utils'

/** `<group>/<source id>` → `<dir>/<group>/<source id>.hash` */
export function ledgerPath(dir: string, key: string): string {
  const segments = key.split('/')
  if (segments.some(s => s === '' || s === '.' || s === '..')) {
    throw new ConfigError(`invalid ledger key "${key}"`)
  }
  return path.join(dir, ...segments) + '.hash'
}

/**
 * One file per source holding the digest and a newline.
 * Each record is replaced by rename, so a crash leaves either the old or the new digest.
 */
export function createFileLedger(dir: string): LedgerStore {
  return {
    async read(key) {
      const file = ledgerPath(dir, key)
      try {
        const text = await fs.readFile(file, 'utf8')
        return text.trim() || undefined
      } catch (e) {
        if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return undefined
        throw e
      }
    },

    async commit(records) {
      for (const r of records) {
        atomicWrite(ledgerPath(dir, r.sourceId), `${r.digest}\n`)
      }
    },
  }
}
