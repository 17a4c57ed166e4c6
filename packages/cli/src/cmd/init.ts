import fs from 'node:fs'
import path from 'node:path'

import { DEFAULT_MANIFEST, RC_FILE } from '../config/config'
import {
  findRepoRoot,
  printInitNextSteps,
  printInitSummary,
  resolveRepoPath,
} from '../cli-utils'

export type InitOpts = {
  dir?: string       // куда писать, по умолчанию корень репо
  force?: boolean    // перезаписать существующие файлы
  cwd?: string
  quiet?: boolean
}

export type InitResult = {
  root: string
  created: string[]
  skipped: string[]
}

function writeFileIfMissing(filePath: string, content: string, force = false) {
  if (!force && fs.existsSync(filePath)) return false
  fs.mkdirSync(path.dirname(filePath), { recursive: true })
  fs.writeFileSync(filePath, content, 'utf8')
  return true
}

const tplManifest = `# netrules groups: one artifact set per group
version: 1

defaults:
  # bare hostnames: exact (DOMAIN) or suffix (DOMAIN-SUFFIX)
  bareDomain: exact

groups:
  - name: example
    description: hand-written rules
    sources:
      - locator: rules/example.list
        dialect: classical

  # - name: ads
  #   sources:
  #     - id: upstream
  #       locator: https://example.com/ads.txt
  #       dialect: list
`

function tplRc() {
  return JSON.stringify({
    manifest: DEFAULT_MANIFEST,
    out: { dir: 'out', ledgerDir: 'hashes' },
    classify: { bareDomain: 'exact' },
    render: { header: true, sections: true },
    compile: { enabled: true, bin: 'sing-box' },
  }, null, 2) + '\n'
}

const tplExampleList = `# classical list: TYPE,value
DOMAIN-SUFFIX,example.com
DOMAIN,api.example.org
DOMAIN-KEYWORD,tracker
IP-CIDR,192.0.2.0/24
IP-CIDR6,2001:db8::/32
`

/** Стартовый манифест, .netrulesrc.json и rules/example.list */
export async function initCLI(opts: InitOpts = {}): Promise<InitResult> {
  const repoRoot = findRepoRoot(opts.cwd)
  const root = opts.dir ? resolveRepoPath(repoRoot, opts.dir) : repoRoot

  const manifest = path.join(root, DEFAULT_MANIFEST)
  const rulesDir = path.join(root, 'rules')

  const files: Array<[string, string]> = [
    [manifest, tplManifest],
    [path.join(root, RC_FILE), tplRc()],
    [path.join(rulesDir, 'example.list'), tplExampleList],
  ]

  const created: string[] = []
  const skipped: string[] = []
  for (const [fp, content] of files) {
    const wrote = writeFileIfMissing(fp, content, !!opts.force)
    if (wrote) created.push(fp); else skipped.push(fp)
  }

  if (!opts.quiet) {
    printInitSummary({ repoRoot, root, created, skipped })
    printInitNextSteps({ repoRoot, manifest, rulesDir })
  }

  return { root, created, skipped }
}
