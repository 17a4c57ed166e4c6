import fs from 'node:fs'
import path from 'node:path'
import { describe, it, beforeEach, afterEach, expect, vi } from 'vitest'
import { silentLogger } from '@netrules/core'
import { initCLI } from '../init'
import { validateCLI } from '../validate'
import { runBuildCLI } from '../build'
import { makeSandbox, read } from '../../__tests__/helpers/sandbox'

describe('initCLI (with sandbox)', () => {
  let sbx: ReturnType<typeof makeSandbox>

  beforeEach(() => {
    sbx = makeSandbox('netrules-init-')
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
    sbx.cleanup()
  })

  it('scaffolds manifest, rc and an example list at the repo root', async () => {
    const res = await initCLI({ cwd: sbx.root })

    expect(res.root).toBe(sbx.root)
    expect(res.created).toEqual([
      path.join(sbx.root, 'netrules.config.yml'),
      path.join(sbx.root, '.netrulesrc.json'),
      path.join(sbx.root, 'rules', 'example.list'),
    ])
    expect(res.skipped).toEqual([])
    expect(JSON.parse(read(sbx.root, '.netrulesrc.json')).out).toEqual({ dir: 'out', ledgerDir: 'hashes' })
  })

  it('skips existing files unless --force', async () => {
    fs.writeFileSync(path.join(sbx.root, 'netrules.config.yml'), 'groups: []\n')

    const first = await initCLI({ cwd: sbx.root })
    expect(first.skipped).toEqual([path.join(sbx.root, 'netrules.config.yml')])
    expect(read(sbx.root, 'netrules.config.yml')).toBe('groups: []\n')

    const forced = await initCLI({ cwd: sbx.root, force: true })
    expect(forced.skipped).toEqual([])
    expect(read(sbx.root, 'netrules.config.yml')).toContain('name: example')
  })

  it('writes into --dir relative to the repo root', async () => {
    const res = await initCLI({ cwd: sbx.root, dir: 'infra/rules' })
    expect(res.root).toBe(path.join(sbx.root, 'infra/rules'))
    expect(fs.existsSync(path.join(sbx.root, 'infra/rules/rules/example.list'))).toBe(true)
  })

  it('the scaffold validates and builds', async () => {
    await initCLI({ cwd: sbx.root, quiet: true })

    const checked = validateCLI({ cwd: sbx.root, quiet: true })
    expect(checked.code).toBe(0)
    expect(checked.groups).toEqual([
      {
        name: 'example',
        sources: [{ id: 'example.list', locator: 'rules/example.list', dialect: 'classical', bareDomain: 'exact' }],
      },
    ])

    const built = await runBuildCLI({ cwd: sbx.root, compile: false }, { quiet: true, logger: silentLogger })
    expect(built.code).toBe(0)
    expect(built.report?.groups[0]?.entries).toBe(5)
    expect(read(sbx.root, 'out/example/example.list')).toContain('IP-CIDR6,2001:db8::/32')
  })
})
