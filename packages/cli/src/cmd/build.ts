import fs from 'node:fs'
import path from 'node:path'
import { ConfigError, describeError, renderSummaryMarkdown, runPipeline } from '@netrules/core'
import type { Logger, RuleSetCompiler, RunReport, SourceReader } from '@netrules/core'
import { singBoxCompiler } from '@netrules/compiler'

import { loadConfig } from '../config/config'
import type { ResolvedConfig } from '../config/config'
import {
  discoverRulesDir,
  loadManifest,
  parseBareDomainOption,
  parseDialectOption,
  singleFilePlan,
} from '../build/manifest'
import type { BuildPlan } from '../build/manifest'
import { createReader } from '../build/sources'
import { createFileArtifactStore } from '../store/artifacts'
import { createFileLedger } from '../store/ledger'
import {
  atomicWrite,
  createCliLogger,
  fail,
  printBuildSummary,
  resolveRepoPath,
} from '../cli-utils'

export type BuildOpts = {
  config?: string        // манифест групп
  rulesDir?: string      // режим rules/*.list
  file?: string          // один файл → одна группа
  dialect?: string
  match?: string
  bareDomain?: string
  out?: string
  ledger?: string
  force?: boolean
  compile?: boolean      // commander: --no-compile → false
  compilerBin?: string
  concurrency?: string | number
  summary?: string
  debug?: boolean
  cwd?: string
}

/** Подмена коллабораторов в тестах; `compiler: null` отключает компиляцию */
export type BuildDeps = {
  reader?: SourceReader
  compiler?: RuleSetCompiler | null
  logger?: Logger
  signal?: AbortSignal
  quiet?: boolean
}

export type BuildResult = {
  code: number
  report?: RunReport
}

function toNumber(v: string | number | undefined): number | undefined {
  if (v === undefined) return undefined
  return typeof v === 'number' ? v : Number(v)
}

function resolvePlan(rc: ResolvedConfig, opts: BuildOpts): BuildPlan {
  const dialect = parseDialectOption(opts.dialect)
  if (opts.file) return singleFilePlan(resolveRepoPath(rc.repoRoot, opts.file), { dialect })
  if (rc.rulesDir) return discoverRulesDir(rc.rulesDir, { match: rc.match, dialect })
  return loadManifest(rc.manifest)
}

function pickCompiler(rc: ResolvedConfig, deps: BuildDeps): RuleSetCompiler | undefined {
  if (deps.compiler !== undefined) return rc.compile.enabled ? deps.compiler ?? undefined : undefined
  if (!rc.compile.enabled) return undefined
  return singBoxCompiler({ bin: rc.compile.bin, timeoutMs: rc.compile.timeoutMs })
}

/** Пути артефактов в summary относительно корня репо */
function relativeReport(report: RunReport, repoRoot: string): RunReport {
  const rel = (p: string) => path.relative(repoRoot, p) || p
  return {
    ...report,
    groups: report.groups.map(g => {
      if (!g.artifacts) return g
      const { list, structured, compiled } = g.artifacts
      return {
        ...g,
        artifacts: compiled
          ? { list: rel(list), structured: rel(structured), compiled: rel(compiled) }
          : { list: rel(list), structured: rel(structured) },
      }
    }),
  }
}

function writeSummary(rc: ResolvedConfig, report: RunReport, summary?: string) {
  const md = renderSummaryMarkdown(relativeReport(report, rc.repoRoot))
  if (summary) {
    atomicWrite(resolveRepoPath(rc.repoRoot, summary), md)
    return
  }
  const stepSummary = process.env.GITHUB_STEP_SUMMARY
  if (stepSummary) fs.appendFileSync(stepSummary, md + '\n', 'utf8')
}

/**
 * build: группы → артефакты.
 * exit 0: всё обновлено или без изменений; 1: хотя бы одна группа упала; 2: ошибка конфигурации.
 */
export async function runBuildCLI(opts: BuildOpts = {}, deps: BuildDeps = {}): Promise<BuildResult> {
  try {
    const rc = loadConfig({
      manifest: opts.config,
      rulesDir: opts.rulesDir,
      match: opts.match,
      concurrency: toNumber(opts.concurrency),
      force: opts.force ? true : undefined,
      out: { dir: opts.out, ledgerDir: opts.ledger },
      classify: { bareDomain: parseBareDomainOption(opts.bareDomain) },
      compile: {
        enabled: opts.compile === false ? false : undefined,
        bin: opts.compilerBin,
      },
    }, { cwd: opts.cwd })

    const plan = resolvePlan(rc, opts)
    const logger = deps.logger ?? createCliLogger({ debug: opts.debug })
    logger.debug(`[build] ${plan.groups.length} group(s) from ${plan.origin}`)

    const report = await runPipeline(plan.groups, {
      reader: deps.reader ?? createReader(rc, plan.baseDir),
      ledger: createFileLedger(rc.out.ledgerDirAbs),
      artifacts: createFileArtifactStore(rc.out.dirAbs),
      compiler: pickCompiler(rc, deps),
      logger,
    }, {
      force: rc.force,
      concurrency: rc.concurrency,
      signal: deps.signal,
      algorithm: rc.digest.algorithm,
      bareDomain: rc.classify.bareDomain,
      render: rc.render,
    })

    writeSummary(rc, report, opts.summary)
    if (!deps.quiet) printBuildSummary({ repoRoot: rc.repoRoot, report, outDir: rc.out.dirAbs })

    return { code: report.ok ? 0 : 1, report }
  } catch (e) {
    fail(describeError(e))
    return { code: e instanceof ConfigError ? 2 : 1 }
  }
}
