import 'dotenv/config'

import path from 'node:path'
import { Command } from 'commander'
import { bold, dim } from 'colorette'
import { config as loadEnv } from 'dotenv'

import { runBuildCLI } from './cmd/build'
import { convertCLI } from './cmd/convert'
import { validateCLI } from './cmd/validate'
import { initCLI } from './cmd/init'
import { DEFAULT_MATCH, RC_FILE } from './config/config'
import { fail, findRepoRoot, warn } from './cli-utils'

// ────────────────────────────────────────────────────────────────────────────────
// Repo root (.git | package.json | fallback)
// ────────────────────────────────────────────────────────────────────────────────
const REPO_ROOT = findRepoRoot()

process.env.NETRULES_REPO_ROOT ||= REPO_ROOT

loadEnv({ path: path.join(REPO_ROOT, '.env') })

// Ctrl+C: группы в полёте помечаются aborted, ничего не коммитится
const abort = new AbortController()
process.once('SIGINT', () => {
  warn('interrupted, abandoning in-flight groups…')
  abort.abort()
})

const program = new Command()
  .name('netrules')
  .description(`${bold('netrules')}: build sing-box / classical rule sets from mixed source lists`)
  .version('0.1.0')

program.showHelpAfterError()
program.showSuggestionAfterError()

// ────────────────────────────────────────────────────────────────────────────────
// build
// ────────────────────────────────────────────────────────────────────────────────
program
  .command('build')
  .description('Fetch sources, rebuild changed groups into out/<group>/<group>.{list,json,srs}')
  .option('-c, --config <file>', 'group manifest (default netrules.config.yml)')
  .option('--rules-dir <dir>', 'treat every matching file in <dir> as its own group')
  .option('--file <path>', 'build a single file as one group')
  .option('--dialect <dialect>', 'list | classical | structured (rules-dir and file modes)')
  .option('--match <glob>', `file filter for --rules-dir (default ${DEFAULT_MATCH})`)
  .option('--bare-domain <mode>', 'exact | suffix: how untagged hostnames are read')
  .option('-o, --out <dir>', 'artifacts root (abs or repo-root relative)')
  .option('--ledger <dir>', 'fingerprint ledger dir')
  .option('-f, --force', 'rebuild even when no source changed', false)
  .option('--no-compile', 'skip the binary rule-set')
  .option('--compiler-bin <path>', 'sing-box executable')
  .option('--concurrency <n>', 'groups processed at once')
  .option('--summary <file>', 'write the markdown summary here (default: $GITHUB_STEP_SUMMARY)')
  .option('--debug', 'verbose debug logs', false)
  .action(async (opts) => {
    const { code } = await runBuildCLI(opts, { signal: abort.signal })
    process.exitCode = code
  })

// ────────────────────────────────────────────────────────────────────────────────
// convert
// ────────────────────────────────────────────────────────────────────────────────
program
  .command('convert')
  .description('Convert one list file into .list and/or sing-box .json (no ledger, no compile)')
  .argument('<input>', 'source file (abs or repo-root relative)')
  .option('--format <format>', 'list | json | both', 'json')
  .option('--out-dir <dir>', 'output dir (default: next to the input)')
  .option('--name <name>', 'output base name (default: input basename)')
  .option('--dialect <dialect>', 'list | classical | structured (default: by extension)')
  .option('--bare-domain <mode>', 'exact | suffix')
  .action(async (input: string, opts) => {
    const { code } = await convertCLI({ ...opts, input })
    process.exitCode = code
  })

// ────────────────────────────────────────────────────────────────────────────────
// validate
// ────────────────────────────────────────────────────────────────────────────────
program
  .command('validate')
  .description('Validate the group manifest (or a rules dir) without fetching anything')
  .option('-c, --config <file>', 'group manifest')
  .option('--rules-dir <dir>', 'validate rules-dir discovery instead')
  .option('--match <glob>', 'file filter for --rules-dir')
  .action((opts) => {
    process.exitCode = validateCLI(opts).code
  })

// ────────────────────────────────────────────────────────────────────────────────
// init
// ────────────────────────────────────────────────────────────────────────────────
program
  .command('init')
  .description(`Scaffold netrules.config.yml, ${RC_FILE} and rules/example.list`)
  .option('--dir <dir>', 'target dir (default: repo root)')
  .option('--force', 'overwrite existing files', false)
  .action(async (opts) => {
    await initCLI({ dir: opts.dir, force: !!opts.force })
  })

// help footer
program.addHelpText(
  'afterAll',
  `
${dim('Config sources (priority high→low):')} CLI ${bold('>')} ENV ${bold('>')} ${RC_FILE} ${bold('>')} defaults
Repo root: ${dim(REPO_ROOT)}
`,
)

// run
program.parseAsync().catch((e: unknown) => {
  fail(String(e instanceof Error ? e.stack ?? e.message : e))
  process.exitCode = 1
})
