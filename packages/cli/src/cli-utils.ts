import fs from 'node:fs'
import path from 'node:path'
import { pathToFileURL } from 'node:url'
import { bold, cyan, dim, green, red, yellow } from 'colorette'
import { RULE_KINDS, LIST_LABELS } from '@netrules/core'
import type { GroupReport, Logger, RunReport } from '@netrules/core'

/** ────────────────────────────────────────────────────────────────────────────
 *  FS helpers
 *  ──────────────────────────────────────────────────────────────────────────── */
export function ensureDirForFile(p: string) {
  fs.mkdirSync(path.dirname(p), { recursive: true })
}

/** Resolve a (possibly relative) path against repo root */
export function resolveRepoPath(repoRoot: string, p: string) {
  return path.isAbsolute(p) ? p : path.join(repoRoot, p)
}

/** Make file:// link for pretty output */
export const linkifyFile = (absPath: string) => pathToFileURL(absPath).href

/** Human friendly sizes */
export const formatBytes = (n: number) =>
  n < 1024 ? `${n} B`
  : n < 1024 * 1024 ? `${(n / 1024).toFixed(1)} KB`
  : `${(n / 1024 / 1024).toFixed(2)} MB`

/** write to a sibling temp file, then rename over the target */
export function atomicWrite(file: string, data: string | Uint8Array) {
  ensureDirForFile(file)
  const tmp = `${file}.tmp-${process.pid}-${Date.now()}`
  fs.writeFileSync(tmp, data)
  fs.renameSync(tmp, file)
}

/** ────────────────────────────────────────────────────────────────────────────
 *  Repo root detection (stable for monorepos)
 *  ────────────────────────────────────────────────────────────────────────────
 *  Rules:
 *   - If NETRULES_REPO_ROOT is set and exists → use it
 *   - Else walk up from `start` until you find .git or package.json
 *   - If not found, fall back to `start` (no surprises)
 */
export function findRepoRoot(start = process.cwd()): string {
  const envRoot = process.env.NETRULES_REPO_ROOT
  if (envRoot && fs.existsSync(envRoot)) {
    return path.resolve(envRoot)
  }

  let dir = path.resolve(start)
  while (true) {
    const isGitRoot = fs.existsSync(path.join(dir, '.git'))
    const isPkgRoot = fs.existsSync(path.join(dir, 'package.json'))
    if (isGitRoot || isPkgRoot) return dir

    const parent = path.dirname(dir)
    if (parent === dir) {
      // FS root reached: fall back to start
      return path.resolve(start)
    }
    dir = parent
  }
}

/** ────────────────────────────────────────────────────────────────────────────
 *  Pretty console helpers (consistent UX)
 *  ──────────────────────────────────────────────────────────────────────────── */
export const ok   = (msg: string) => console.log(green('✔ ') + msg)
export const info = (msg: string) => console.log(cyan('ℹ ') + msg)
export const warn = (msg: string) => console.warn(yellow('▲ ') + msg)
export const fail = (msg: string) => console.error(red('✖ ') + msg)

/** Pipeline logger on top of the console helpers; debug lines only when asked */
export function createCliLogger(opts: { debug?: boolean } = {}): Logger {
  const debug = !!opts.debug || !!process.env.NETRULES_DEBUG
  return {
    debug: (msg) => {
      if (debug) console.log(dim(msg))
    },
    info,
    warn,
    error: fail,
  }
}

/** ────────────────────────────────────────────────────────────────────────────
 *  Unified summaries
 *  ──────────────────────────────────────────────────────────────────────────── */

function kindLine(g: GroupReport): string {
  const parts = RULE_KINDS.filter(k => g.byKind[k] > 0).map(k => `${LIST_LABELS[k]} ${g.byKind[k]}`)
  return parts.length ? parts.join(', ') : 'empty'
}

/** Print nice summary for a build run */
export function printBuildSummary(args: {
  repoRoot: string
  report: RunReport
  outDir: string
}) {
  const { repoRoot, report, outDir } = args
  const { updated, unchanged, failed } = report.counts

  console.log('')
  console.log(bold('Build summary'))
  console.log('  ' + cyan('output:  ') + `${dim(path.relative(repoRoot, outDir) || '.')} ${cyan('→')} ${dim(linkifyFile(outDir))}`)
  console.log('  ' + cyan('groups:  ')
    + `${report.groups.length} `
    + dim(`(updated ${updated}, unchanged ${unchanged}, failed ${failed})`))

  for (const g of report.groups) {
    if (g.status === 'updated') {
      console.log('   • ' + green(g.name) + ` ${g.entries} rules ` + dim(`(${kindLine(g)}; dup ${g.duplicates}, skipped ${g.skipped})`))
    } else if (g.status === 'unchanged') {
      console.log('   • ' + dim(`${g.name} unchanged`))
    } else {
      console.log('   • ' + red(g.name) + ' ' + (g.reason ?? 'failed'))
    }
  }

  console.log('  ' + cyan('exit:    ') + (report.ok ? green('exit 0') : red('exit 1') + dim(' (some groups failed)')))
}

/** Print nice summary for convert */
export function printConvertSummary(args: {
  repoRoot: string
  inFile: string
  outFiles: string[]
  entries: number
  skipped: number
}) {
  const { repoRoot, inFile, outFiles, entries, skipped } = args
  console.log('')
  console.log(bold('Convert summary'))
  console.log('  ' + cyan('input:   ') + `${dim(path.relative(repoRoot, inFile))} ${cyan('→')} ${dim(linkifyFile(inFile))}`)
  for (const f of outFiles) {
    const size = fs.existsSync(f) ? ` ${dim(`(${formatBytes(fs.statSync(f).size)})`)}` : ''
    console.log('  ' + cyan('output:  ') + `${dim(path.relative(repoRoot, f))}${size} ${cyan('→')} ${dim(linkifyFile(f))}`)
  }
  console.log('  ' + cyan('rules:   ') + `${entries}` + (skipped ? dim(` (${skipped} skipped)`) : ''))
  ok('Rule set written')
}

/** Print concise summary for init */
export function printInitSummary(args: {
  repoRoot: string
  root: string          // каталог, в котором создавались файлы
  created: string[]     // абсолютные пути созданных файлов
  skipped: string[]     // абсолютные пути пропущенных (существующих) файлов
}) {
  const { repoRoot, root, created, skipped } = args

  console.log('')
  console.log(bold('Init summary'))
  console.log('  ' + cyan('root:    ') + (path.relative(repoRoot, root) || '.'))

  if (created.length) {
    ok('Created:')
    for (const f of created) {
      const rel = path.relative(repoRoot, f)
      console.log('   • ' + dim(rel) + ' ' + cyan('→') + ' ' + dim(linkifyFile(f)))
    }
  }

  if (skipped.length) {
    warn('Skipped (already exists):')
    for (const f of skipped) {
      console.log('   • ' + dim(path.relative(repoRoot, f)))
    }
  }
}

export function printInitNextSteps(args: {
  repoRoot: string
  manifest: string
  rulesDir: string
}) {
  const { repoRoot, manifest, rulesDir } = args
  const relManifest = path.relative(repoRoot, manifest)
  const relRules = path.relative(repoRoot, rulesDir)

  console.log('')
  console.log(bold('Next steps'))
  console.log('  - Add your sources to ' + yellow(relManifest) + ' (urls, paths or memory:// ids).')
  console.log('  - Drop hand-written lists into ' + yellow(relRules) + '.')
  console.log('  - Try a dry run:\n    ' +
    dim(`netrules build --config ${relManifest} --no-compile`))
}
