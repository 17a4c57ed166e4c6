import fs from 'node:fs'
import path from 'node:path'
import { ConfigError, DEFAULT_CONCURRENCY } from '@netrules/core'
import type { BareDomainMode, DigestAlgorithm } from '@netrules/core'
import { findRepoRoot } from '../cli-utils'
import { formatSchemaErrors, validateRc } from '../schema'

export const RC_FILE = '.netrulesrc.json'
export const DEFAULT_MANIFEST = 'netrules.config.yml'
export const DEFAULT_MATCH = '*.{list,txt,yaml,yml,json}'

export interface NetrulesRc {
  manifest?: string
  rulesDir?: string
  match?: string
  concurrency?: number
  force?: boolean

  out?: {
    dir?: string
    ledgerDir?: string
  }

  classify?: {
    bareDomain?: BareDomainMode
  }

  render?: {
    header?: boolean
    sections?: boolean
    version?: number
  }

  compile?: {
    enabled?: boolean
    bin?: string
    timeoutMs?: number
  }

  http?: {
    timeoutMs?: number
    retries?: number
    userAgent?: string
  }

  digest?: {
    algorithm?: DigestAlgorithm
  }
}

/** Разрешённая конфигурация (абсолютные пути и дефолты) */
export interface ResolvedConfig {
  repoRoot: string
  rcPath: string | null

  manifest: string
  rulesDir?: string
  match: string
  concurrency: number
  force: boolean

  out: {
    dirAbs: string
    ledgerDirAbs: string
  }

  classify: { bareDomain: BareDomainMode }
  render: { header: boolean; sections: boolean; version: number }
  compile: { enabled: boolean; bin: string; timeoutMs: number }
  http: { timeoutMs: number; retries: number; userAgent: string }
  digest: { algorithm: DigestAlgorithm }
}

/* ──────────────────────────────────────────────────────────────────────────── */

const BARE_DOMAIN = new Set<BareDomainMode>(['exact', 'suffix'])
const ALGORITHMS = new Set<DigestAlgorithm>(['sha256', 'sha1', 'sha512', 'md5'])

function readRc(p: string): NetrulesRc {
  let data: unknown
  try {
    data = JSON.parse(fs.readFileSync(p, 'utf8'))
  } catch (e) {
    throw new ConfigError(`cannot read ${p}: ${e instanceof Error ? e.message : String(e)}`)
  }
  if (!validateRc(data)) {
    throw new ConfigError(`invalid ${path.basename(p)}:\n${formatSchemaErrors(validateRc.errors)}`)
  }
  return data
}

/** Ищем ближайший .netrulesrc.json от CWD вверх до корня репо */
function findRc(startDir: string, repoRoot: string): string | null {
  let dir = path.resolve(startDir)
  while (true) {
    const candidate = path.join(dir, RC_FILE)
    if (fs.existsSync(candidate)) return candidate
    const parent = path.dirname(dir)
    if (parent === dir) break
    if (dir === repoRoot) break
    dir = parent
  }
  const fallback = path.join(repoRoot, RC_FILE)
  return fs.existsSync(fallback) ? fallback : null
}

/** tiny helper: копируем только определённые (не undefined) поля */
export function pickDefined<T extends object>(obj: T | undefined): Partial<T> {
  if (!obj) return {}
  const out: Partial<T> = {}
  for (const [k, v] of Object.entries(obj)) {
    if (v !== undefined) Reflect.set(out, k, v)
  }
  return out
}

/** Глубокий merge, игнорирующий undefined */
function mergeRc(base: NetrulesRc, over?: NetrulesRc): NetrulesRc {
  if (!over) return base
  return {
    ...base,
    ...pickDefined({
      manifest: over.manifest,
      rulesDir: over.rulesDir,
      match: over.match,
      concurrency: over.concurrency,
      force: over.force,
    }),
    out: { ...(base.out || {}), ...pickDefined(over.out) },
    classify: { ...(base.classify || {}), ...pickDefined(over.classify) },
    render: { ...(base.render || {}), ...pickDefined(over.render) },
    compile: { ...(base.compile || {}), ...pickDefined(over.compile) },
    http: { ...(base.http || {}), ...pickDefined(over.http) },
    digest: { ...(base.digest || {}), ...pickDefined(over.digest) },
  }
}

const envBool = (v: string | undefined) => (v === undefined ? undefined : v === '1' || v === 'true')
const envNum = (v: string | undefined) => (v ? Number(v) : undefined)

/** ENV → RC */
function envAsRc(env: NodeJS.ProcessEnv = process.env): NetrulesRc {
  const out: NetrulesRc = {}

  if (env.NETRULES_MANIFEST) out.manifest = env.NETRULES_MANIFEST
  if (env.NETRULES_RULES_DIR) out.rulesDir = env.NETRULES_RULES_DIR
  if (env.NETRULES_MATCH) out.match = env.NETRULES_MATCH
  if (env.NETRULES_CONCURRENCY) out.concurrency = Number(env.NETRULES_CONCURRENCY)
  if (env.NETRULES_FORCE) out.force = envBool(env.NETRULES_FORCE)

  const outDir = env.NETRULES_OUT_DIR
  const ledgerDir = env.NETRULES_LEDGER_DIR
  if (outDir || ledgerDir) out.out = pickDefined({ dir: outDir, ledgerDir })

  const bare = env.NETRULES_BARE_DOMAIN
  if (bare) out.classify = { bareDomain: bare === 'suffix' ? 'suffix' : 'exact' }

  const compileEnabled = env.NETRULES_COMPILE
  const compileBin = env.NETRULES_COMPILER_BIN
  const compileTimeout = env.NETRULES_COMPILE_TIMEOUT_MS
  if (compileEnabled || compileBin || compileTimeout) {
    out.compile = pickDefined({
      enabled: envBool(compileEnabled),
      bin: compileBin,
      timeoutMs: envNum(compileTimeout),
    })
  }

  const httpTimeout = env.NETRULES_HTTP_TIMEOUT_MS
  const httpRetries = env.NETRULES_HTTP_RETRIES
  const userAgent = env.NETRULES_HTTP_USER_AGENT
  if (httpTimeout || httpRetries || userAgent) {
    out.http = pickDefined({ timeoutMs: envNum(httpTimeout), retries: envNum(httpRetries), userAgent })
  }

  return out
}

/** Значения по умолчанию */
const defaults: NetrulesRc = {
  manifest: DEFAULT_MANIFEST,
  match: DEFAULT_MATCH,
  concurrency: DEFAULT_CONCURRENCY,
  force: false,
  out: { dir: 'out', ledgerDir: 'hashes' },
  classify: { bareDomain: 'exact' },
  render: { header: true, sections: true, version: 1 },
  compile: { enabled: true, bin: 'sing-box', timeoutMs: 60_000 },
  http: { timeoutMs: 30_000, retries: 3, userAgent: 'netrules' },
  digest: { algorithm: 'sha256' },
}

function positiveInt(v: number | undefined, fallback: number, label: string): number {
  if (v === undefined) return fallback
  if (!Number.isInteger(v) || v < 1) throw new ConfigError(`${label} must be a positive integer, got ${v}`)
  return v
}

/** Публичный загрузчик: defaults <- rc(file) <- env <- cli */
export function loadConfig(cliOverrides?: NetrulesRc, opts: { cwd?: string } = {}): ResolvedConfig {
  const cwd = opts.cwd ?? process.cwd()
  const repoRoot = findRepoRoot(cwd)
  const rcPath = findRc(cwd, repoRoot)
  const fileRc = rcPath ? readRc(rcPath) : {}

  const merged = mergeRc(mergeRc(mergeRc(defaults, fileRc), envAsRc()), cliOverrides)
  const abs = (p: string) => (path.isAbsolute(p) ? p : path.join(repoRoot, p))

  const bareDomain = merged.classify?.bareDomain ?? 'exact'
  if (!BARE_DOMAIN.has(bareDomain)) throw new ConfigError(`classify.bareDomain must be "exact" or "suffix", got "${bareDomain}"`)
  const algorithm = merged.digest?.algorithm ?? 'sha256'
  if (!ALGORITHMS.has(algorithm)) throw new ConfigError(`digest.algorithm "${algorithm}" is not supported`)

  return {
    repoRoot,
    rcPath,
    manifest: abs(merged.manifest || DEFAULT_MANIFEST),
    rulesDir: merged.rulesDir ? abs(merged.rulesDir) : undefined,
    match: merged.match || DEFAULT_MATCH,
    concurrency: positiveInt(merged.concurrency, DEFAULT_CONCURRENCY, 'concurrency'),
    force: !!merged.force,

    out: {
      dirAbs: abs(merged.out?.dir || 'out'),
      ledgerDirAbs: abs(merged.out?.ledgerDir || 'hashes'),
    },

    classify: { bareDomain },
    render: {
      header: merged.render?.header ?? true,
      sections: merged.render?.sections ?? true,
      version: merged.render?.version ?? 1,
    },
    compile: {
      enabled: merged.compile?.enabled ?? true,
      bin: merged.compile?.bin || 'sing-box',
      timeoutMs: positiveInt(merged.compile?.timeoutMs, 60_000, 'compile.timeoutMs'),
    },
    http: {
      timeoutMs: positiveInt(merged.http?.timeoutMs, 30_000, 'http.timeoutMs'),
      retries: positiveInt(merged.http?.retries, 3, 'http.retries'),
      userAgent: merged.http?.userAgent || 'netrules',
    },
    digest: { algorithm },
  }
}

export const _internal = { findRc, envAsRc, mergeRc }
