export { digestBytes, ledgerKey } from './digest'
export type { DigestAlgorithm } from './digest'
export { createMemoryLedger } from './ledger'
export type { LedgerStore, MemoryLedger } from './ledger'
export { ChangeDetector } from './detector'
export type { SourceCheck } from './detector'
