import fs from 'node:fs'
import path from 'node:path'
import {
  ConfigError,
  RuleSetBuilder,
  classifyLines,
  describeError,
  parseSource,
  renderList,
  renderStructured,
} from '@netrules/core'
import type { RuleGroup } from '@netrules/core'

import { loadConfig } from '../config/config'
import { dialectForFile, parseBareDomainOption, parseDialectOption } from '../build/manifest'
import { atomicWrite, fail, printConvertSummary, resolveRepoPath, warn } from '../cli-utils'

export type ConvertFormat = 'list' | 'json' | 'both'

export type ConvertOpts = {
  input: string
  format?: string
  outDir?: string
  name?: string
  dialect?: string
  bareDomain?: string
  cwd?: string
  quiet?: boolean
}

export type ConvertResult = {
  code: number
  outFiles: string[]
  group?: RuleGroup
  skipped: number
}

function parseFormat(v: string | undefined): ConvertFormat {
  if (v === undefined) return 'json'
  if (v === 'list' || v === 'json' || v === 'both') return v
  throw new ConfigError(`--format must be list, json or both, got "${v}"`)
}

/** Один файл → .list и/или .json, без леджера и компиляции */
export async function convertCLI(opts: ConvertOpts): Promise<ConvertResult> {
  try {
    const rc = loadConfig({}, { cwd: opts.cwd })
    const format = parseFormat(opts.format)
    const inFile = resolveRepoPath(rc.repoRoot, opts.input)
    if (!fs.existsSync(inFile)) throw new ConfigError(`input not found: ${inFile}`)

    const name = opts.name ?? path.basename(inFile, path.extname(inFile))
    const dialect = parseDialectOption(opts.dialect) ?? dialectForFile(inFile) ?? 'list'
    const bareDomain = parseBareDomainOption(opts.bareDomain) ?? rc.classify.bareDomain
    const outDir = opts.outDir ? resolveRepoPath(rc.repoRoot, opts.outDir) : path.dirname(inFile)

    const targets = [
      ...(format === 'list' || format === 'both' ? [path.join(outDir, `${name}.list`)] : []),
      ...(format === 'json' || format === 'both' ? [path.join(outDir, `${name}.json`)] : []),
    ]
    const clash = targets.find(t => path.resolve(t) === path.resolve(inFile))
    if (clash) throw new ConfigError(`refusing to overwrite the input file ${clash} (use --name or --out-dir)`)

    const lines = parseSource({ id: path.basename(inFile), dialect }, fs.readFileSync(inFile, 'utf8'))
    const { entries, skipped } = classifyLines(lines, { bareDomain }, (err) => {
      if (!opts.quiet) warn(err.message)
    })
    const group = new RuleSetBuilder().addAll(entries).build(name)

    for (const t of targets) {
      atomicWrite(t, t.endsWith('.list') ? renderList(group, rc.render) : renderStructured(group, rc.render))
    }

    if (!opts.quiet) {
      printConvertSummary({ repoRoot: rc.repoRoot, inFile, outFiles: targets, entries: group.entries.length, skipped })
    }
    return { code: 0, outFiles: targets, group, skipped }
  } catch (e) {
    fail(describeError(e))
    return { code: e instanceof ConfigError ? 2 : 1, outFiles: [], skipped: 0 }
  }
}
