import path from 'node:path'
import { ConfigError, describeError } from '@netrules/core'
import type { GroupSpec } from '@netrules/core'

import { loadConfig } from '../config/config'
import { discoverRulesDir, loadManifest } from '../build/manifest'
import { fail, ok } from '../cli-utils'

export type ValidateOpts = {
  config?: string
  rulesDir?: string
  match?: string
  cwd?: string
  quiet?: boolean
}

export type ValidateResult = {
  code: number
  groups: GroupSpec[]
}

/** Манифест (или rules-dir) через схему и проверки имён; exit 2 если невалиден */
export function validateCLI(opts: ValidateOpts = {}): ValidateResult {
  try {
    const rc = loadConfig({ manifest: opts.config, rulesDir: opts.rulesDir, match: opts.match }, { cwd: opts.cwd })
    const plan = rc.rulesDir
      ? discoverRulesDir(rc.rulesDir, { match: rc.match })
      : loadManifest(rc.manifest)

    if (!opts.quiet) {
      const sources = plan.groups.reduce((n, g) => n + g.sources.length, 0)
      ok(`[validate] ${path.relative(rc.repoRoot, plan.origin) || plan.origin} is valid: ${plan.groups.length} group(s), ${sources} source(s)`)
    }
    return { code: 0, groups: plan.groups }
  } catch (e) {
    fail(`[validate] ${describeError(e)}`)
    return { code: e instanceof ConfigError ? 2 : 1, groups: [] }
  }
}
