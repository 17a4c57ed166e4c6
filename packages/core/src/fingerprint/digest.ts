import crypto from 'node:crypto'

export type DigestAlgorithm = 'sha256' | 'sha1' | 'sha512' | 'md5'

/** Lower-case hex digest of the raw source bytes */
export function digestBytes(bytes: Uint8Array | string, algorithm: DigestAlgorithm = 'sha256'): string {
  return crypto.createHash(algorithm).update(bytes).digest('hex')
}

/** Ledger key of a source within a group */
export function ledgerKey(group: string, sourceId: string): string {
  return `${group}/${sourceId}`
}
