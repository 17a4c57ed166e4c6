import { ConfigError } from '../errors'
import { ChangeDetector } from '../fingerprint/detector'
import { silentLogger } from '../logger'
import type { GroupSpec, GroupStatus, RunReport } from '../types'
import { processGroup } from './group'
import { runPool } from './pool'
import type { PipelineDeps, PipelineOptions } from './types'

export const DEFAULT_CONCURRENCY = 4

function assertUniqueNames(groups: readonly GroupSpec[]): void {
  const seen = new Set<string>()
  for (const g of groups) {
    if (seen.has(g.name)) throw new ConfigError(`duplicate group name "${g.name}"`)
    seen.add(g.name)
  }
}

/**
 * Brings the artifacts of every group up to date with their sources.
 * Groups are independent: a failure in one is reported, never propagated.
 */
export async function runPipeline(
  groups: readonly GroupSpec[],
  deps: PipelineDeps,
  options: PipelineOptions = {},
): Promise<RunReport> {
  assertUniqueNames(groups)
  const logger = deps.logger ?? silentLogger
  const detector = new ChangeDetector(deps.ledger, { algorithm: options.algorithm })
  const ctx = { deps, options, detector, logger }

  logger.debug(`[pipeline] ${groups.length} group(s), concurrency ${options.concurrency ?? DEFAULT_CONCURRENCY}`)
  const reports = await runPool(groups, options.concurrency ?? DEFAULT_CONCURRENCY, g => processGroup(g, ctx))

  const counts: Record<GroupStatus, number> = { updated: 0, unchanged: 0, failed: 0 }
  for (const r of reports) counts[r.status]++
  return { groups: reports, counts, ok: counts.failed === 0 }
}
