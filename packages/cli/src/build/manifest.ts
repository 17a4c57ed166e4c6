import fs from 'node:fs'
import path from 'node:path'
import picomatch from 'picomatch'
import { LineCounter, parseDocument } from 'yaml'
import { ConfigError, DIALECTS } from '@netrules/core'
import type { BareDomainMode, Dialect, GroupSpec, SourceSpec } from '@netrules/core'

import { formatSchemaErrors, validateManifest } from '../schema'

export interface ManifestSource {
  id?: string
  locator: string
  dialect?: Dialect
  bareDomain?: BareDomainMode
}

export interface ManifestGroup {
  name: string
  description?: string
  sources: ManifestSource[]
}

/** netrules.config.yml */
export interface ManifestFile {
  version?: 1
  defaults?: {
    dialect?: Dialect
    bareDomain?: BareDomainMode
  }
  groups: ManifestGroup[]
}

/** Groups to build plus the directory relative locators resolve against */
export interface BuildPlan {
  groups: GroupSpec[]
  baseDir: string
  origin: string
}

const EXT_DIALECT: Record<string, Dialect> = {
  '.list': 'classical',
  '.txt': 'list',
  '.yaml': 'structured',
  '.yml': 'structured',
  '.json': 'structured',
}

/** Dialect implied by a file name or URL path, if any */
export function dialectForFile(locator: string): Dialect | undefined {
  const pathname = locator.replace(/[?#].*$/, '')
  return EXT_DIALECT[path.extname(pathname).toLowerCase()]
}

function sourceIdFor(locator: string, index: number): string {
  const last = locator.replace(/[?#].*$/, '').split(/[\\/]/).filter(Boolean).pop() ?? ''
  const id = last.replace(/[^A-Za-z0-9._-]/g, '_')
  return id && id !== '.' && id !== '..' ? id : `source-${index + 1}`
}

/** YAML (or JSON) text → validated manifest; every problem is a ConfigError */
export function parseManifest(text: string, file = 'manifest'): ManifestFile {
  const lineCounter = new LineCounter()
  const doc = parseDocument(text, { lineCounter })
  const first = doc.errors[0]
  if (first) {
    const line = first.linePos?.[0]?.line
    throw new ConfigError(`${file}${line ? `:${line}` : ''}: ${first.message.split('\n')[0] ?? 'invalid YAML'}`)
  }

  const data: unknown = doc.toJS()
  if (!validateManifest(data)) {
    throw new ConfigError(`${file} does not match the manifest schema:\n${formatSchemaErrors(validateManifest.errors)}`)
  }

  const problems = checkManifest(data)
  if (problems.length) throw new ConfigError(`${file}:\n${problems.map(p => `- ${p}`).join('\n')}`)
  return data
}

/** Checks the schema cannot express: unique group names, unique source ids per group */
export function checkManifest(m: ManifestFile): string[] {
  const problems: string[] = []
  const names = new Set<string>()
  for (const g of m.groups) {
    if (names.has(g.name)) problems.push(`duplicate group name "${g.name}"`)
    names.add(g.name)

    const ids = new Set<string>()
    g.sources.forEach((s, i) => {
      const id = s.id ?? sourceIdFor(s.locator, i)
      if (ids.has(id)) problems.push(`group "${g.name}": duplicate source id "${id}" (set "id" explicitly)`)
      ids.add(id)
    })
  }
  return problems
}

export function manifestToGroups(m: ManifestFile): GroupSpec[] {
  return m.groups.map(g => ({
    name: g.name,
    sources: g.sources.map((s, i): SourceSpec => {
      const bareDomain = s.bareDomain ?? m.defaults?.bareDomain
      const spec: SourceSpec = {
        id: s.id ?? sourceIdFor(s.locator, i),
        locator: s.locator,
        dialect: s.dialect ?? m.defaults?.dialect ?? dialectForFile(s.locator) ?? 'list',
      }
      return bareDomain ? { ...spec, bareDomain } : spec
    }),
  }))
}

export function loadManifest(file: string): BuildPlan {
  if (!fs.existsSync(file)) {
    throw new ConfigError(`manifest not found: ${file} (run "netrules init" or pass --rules-dir)`)
  }
  const manifest = parseManifest(fs.readFileSync(file, 'utf8'), path.basename(file))
  return { groups: manifestToGroups(manifest), baseDir: path.dirname(file), origin: file }
}

/** The rules/*.list layout: each matching file is its own group, named after the file */
export function discoverRulesDir(dir: string, opts: { match: string; dialect?: Dialect }): BuildPlan {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new ConfigError(`rules dir not found: ${dir}`)
  }
  const isMatch = picomatch(opts.match, { dot: false })
  const files = fs.readdirSync(dir, { withFileTypes: true })
    .filter(e => e.isFile() && isMatch(e.name))
    .map(e => e.name)
    .sort()

  const groups: GroupSpec[] = []
  const seen = new Map<string, string>()
  for (const name of files) {
    const group = path.basename(name, path.extname(name))
    const clash = seen.get(group)
    if (clash) throw new ConfigError(`${clash} and ${name} would both build group "${group}"`)
    seen.set(group, name)
    groups.push(fileGroup(path.join(dir, name), group, opts.dialect))
  }
  return { groups, baseDir: dir, origin: dir }
}

export function singleFilePlan(file: string, opts: { dialect?: Dialect; name?: string } = {}): BuildPlan {
  if (!fs.existsSync(file)) throw new ConfigError(`file not found: ${file}`)
  const group = opts.name ?? path.basename(file, path.extname(file))
  return { groups: [fileGroup(file, group, opts.dialect)], baseDir: path.dirname(file), origin: file }
}

function fileGroup(file: string, group: string, dialect?: Dialect): GroupSpec {
  return {
    name: group,
    sources: [{ id: path.basename(file), locator: file, dialect: dialect ?? dialectForFile(file) ?? 'list' }],
  }
}

/** `--dialect` value → Dialect; unknown names are a usage error */
export function parseDialectOption(value: string | undefined): Dialect | undefined {
  if (value === undefined) return undefined
  const dialect = DIALECTS.find(d => d === value)
  if (!dialect) throw new ConfigError(`unknown dialect "${value}" (expected ${DIALECTS.join(', ')})`)
  return dialect
}

export function parseBareDomainOption(value: string | undefined): BareDomainMode | undefined {
  if (value === undefined) return undefined
  if (value === 'exact' || value === 'suffix') return value
  throw new ConfigError(`--bare-domain must be "exact" or "suffix", got "${value}"`)
}
