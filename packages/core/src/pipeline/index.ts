export { DEFAULT_CONCURRENCY, runPipeline } from './run'
export { processGroup } from './group'
export { runPool } from './pool'
export { createMemoryArtifactStore } from './memory-store'
export type { MemoryArtifactStore } from './memory-store'
export type {
  ArtifactStore,
  CompileJob,
  PipelineDeps,
  PipelineOptions,
  RuleSetCompiler,
  SourceReader,
  StagedArtifacts,
} from './types'
