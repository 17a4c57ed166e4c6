import { RuleSetBuilder } from '../aggregate/builder'
import { classifyLines } from '../classify/classify'
import { AbortedError, describeError } from '../errors'
import { ChangeDetector } from '../fingerprint/detector'
import type { SourceCheck } from '../fingerprint/detector'
import type { Logger } from '../logger'
import { parseSource } from '../parse'
import { renderArtifacts } from '../render'
import { emptyKindCounts } from '../types'
import type { GroupReport, GroupSpec, SourceReport, SourceSpec } from '../types'
import type { PipelineDeps, PipelineOptions } from './types'

export interface GroupContext {
  deps: PipelineDeps
  options: PipelineOptions
  detector: ChangeDetector
  logger: Logger
}

interface FetchedSource {
  source: SourceSpec
  bytes: Uint8Array
  check: SourceCheck
}

const decoder = new TextDecoder('utf-8')

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new AbortedError()
}

function baseReport(group: GroupSpec): GroupReport {
  return {
    name: group.name,
    status: 'failed',
    entries: 0,
    byKind: emptyKindCounts(),
    duplicates: 0,
    skipped: 0,
    sources: group.sources.map(s => ({ id: s.id, skipped: 0 })),
  }
}

/**
 * One group from sources to committed artifacts. Never throws: every failure
 * becomes a `failed` report and leaves the previous artifacts and fingerprints as they were.
 */
export async function processGroup(group: GroupSpec, ctx: GroupContext): Promise<GroupReport> {
  const report = baseReport(group)
  try {
    return await run(group, ctx, report)
  } catch (e) {
    const reason = ctx.options.signal?.aborted || e instanceof AbortedError ? 'aborted' : describeError(e)
    ctx.logger.error(`[pipeline] ${group.name}: failed: ${reason}`)
    return { ...report, status: 'failed', reason }
  }
}

async function run(group: GroupSpec, ctx: GroupContext, report: GroupReport): Promise<GroupReport> {
  const { deps, options, detector, logger } = ctx
  const signal = options.signal
  throwIfAborted(signal)

  const fetched: FetchedSource[] = await Promise.all(
    group.sources.map(async (source) => {
      const bytes = await deps.reader.read(source, { signal })
      const check = await detector.check(group.name, source.id, bytes)
      return { source, bytes, check }
    }),
  )
  throwIfAborted(signal)

  const sources: SourceReport[] = fetched.map(f => ({
    id: f.source.id,
    state: f.check.state,
    digest: f.check.digest,
    skipped: 0,
  }))
  report.sources = sources

  const changed = fetched.some(f => f.check.state === 'changed')
  const present = await deps.artifacts.exists(group.name, { compiled: Boolean(deps.compiler) })
  if (!changed && present && !options.force) {
    logger.debug(`[pipeline] ${group.name}: unchanged`)
    return { ...report, status: 'unchanged' }
  }
  if (!changed && !options.force) logger.info(`[pipeline] ${group.name}: artifacts missing, regenerating`)

  const builder = new RuleSetBuilder()
  let skipped = 0
  fetched.forEach((f, i) => {
    const lines = parseSource(f.source, decoder.decode(f.bytes))
    const bareDomain = f.source.bareDomain ?? options.bareDomain
    const result = classifyLines(lines, bareDomain ? { bareDomain } : {}, (err) => logger.warn(`[pipeline] ${group.name}: ${err.message}`))
    builder.addAll(result.entries)
    skipped += result.skipped
    const sr = sources[i]
    if (sr) sr.skipped = result.skipped
  })

  const ruleGroup = builder.build(group.name)
  const stats = builder.stats()
  const rendered = renderArtifacts(ruleGroup, options.render)

  throwIfAborted(signal)
  const staged = await deps.artifacts.stage(group.name, rendered)
  try {
    if (deps.compiler) {
      await deps.compiler.compile({
        group: group.name,
        input: staged.staging.structured,
        output: staged.staging.compiled,
        signal,
      })
    }
    throwIfAborted(signal)
    await staged.commit()
  } catch (e) {
    await staged.discard()
    throw e
  }

  await detector.commit(fetched.map(f => f.check))
  logger.info(`[pipeline] ${group.name}: ${stats.entries} rules (${stats.duplicates} duplicates, ${skipped} skipped)`)

  const { compiled, ...rest } = staged.paths
  return {
    ...report,
    status: 'updated',
    entries: stats.entries,
    byKind: stats.byKind,
    duplicates: stats.duplicates,
    skipped,
    artifacts: deps.compiler ? { ...rest, compiled } : rest,
  }
}
