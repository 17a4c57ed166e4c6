import type { DigestAlgorithm } from '../fingerprint/digest'
import type { LedgerStore } from '../fingerprint/ledger'
import type { Logger } from '../logger'
import type { RenderedArtifacts, RenderOptions } from '../render/types'
import type { ArtifactPaths, BareDomainMode, SourceSpec } from '../types'

/** Retrieves the raw bytes of a source. Failures surface as FetchError. */
export interface SourceReader {
  read(source: SourceSpec, opts?: { signal?: AbortSignal }): Promise<Uint8Array>
}

export interface CompileJob {
  group: string
  /** staged structured document */
  input: string
  /** where the compiled rule-set must be written */
  output: string
  signal?: AbortSignal
}

/** External rule-set compiler. Throws CompileError when no output is produced. */
export interface RuleSetCompiler {
  compile(job: CompileJob): Promise<void>
}

/**
 * Rendered files of one group, written aside. `commit` moves them over the
 * previous artifacts; `discard` drops them and leaves the previous ones in place.
 */
export interface StagedArtifacts {
  paths: ArtifactPaths & { compiled: string }
  staging: { structured: string; compiled: string }
  commit(): Promise<void>
  discard(): Promise<void>
}

export interface ArtifactStore {
  /** true when every artifact of the group is present (the compiled one only if asked for) */
  exists(group: string, opts?: { compiled?: boolean }): Promise<boolean>
  stage(group: string, rendered: RenderedArtifacts): Promise<StagedArtifacts>
}

export interface PipelineDeps {
  reader: SourceReader
  ledger: LedgerStore
  artifacts: ArtifactStore
  compiler?: RuleSetCompiler
  logger?: Logger
}

export interface PipelineOptions {
  /** regenerate even when no source changed */
  force?: boolean
  /** groups processed at once, default 4 */
  concurrency?: number
  signal?: AbortSignal
  algorithm?: DigestAlgorithm
  /** default for sources that do not set `bareDomain` */
  bareDomain?: BareDomainMode
  render?: RenderOptions
}
