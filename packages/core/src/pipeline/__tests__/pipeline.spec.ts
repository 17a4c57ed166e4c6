import { describe, it, expect, vi } from 'vitest'
import { CompileError, ConfigError } from '../../errors'
import { createMemoryLedger } from '../../fingerprint'
import type { Logger } from '../../logger'
import type { GroupSpec } from '../../types'
import { createMemoryArtifactStore, runPipeline, runPool } from '..'
import type { RuleSetCompiler } from '..'
import { fakeReader, listSource } from './helpers'

const SAMPLE = 'example.com\nEXAMPLE.com\n# comment\n\n10.0.0.0/8\n'

function setup(data: Record<string, string>) {
  const reader = fakeReader(data)
  const ledger = createMemoryLedger()
  const artifacts = createMemoryArtifactStore()
  return { reader, ledger, artifacts }
}

describe('runPipeline', () => {
  it('normalizes, dedups and writes both artifacts', async () => {
    const deps = setup({ 'mem://s': SAMPLE })
    const groups: GroupSpec[] = [{ name: 'g', sources: [listSource('s')] }]

    const report = await runPipeline(groups, deps)
    const g = report.groups[0]

    expect(report.ok).toBe(true)
    expect(g?.status).toBe('updated')
    expect(g?.entries).toBe(2)
    expect(g?.duplicates).toBe(1)
    expect(g?.byKind).toEqual({ domain: 1, domain_suffix: 0, domain_keyword: 0, ip_cidr: 1, ip_cidr6: 0 })
    expect(g?.artifacts).toEqual({ list: 'out/g/g.list', structured: 'out/g/g.json' })

    expect(deps.artifacts.read('out/g/g.list')).toBe(
      '# NAME: g\n# DOMAIN: 1\n# IP-CIDR: 1\n# TOTAL: 2\n\n# DOMAIN\nDOMAIN,example.com\n\n# IP-CIDR\nIP-CIDR,10.0.0.0/8\n',
    )
    expect(deps.artifacts.read('out/g/g.json')).toBe(
      '{\n  "version": 1,\n  "rules": [\n    {\n      "domain": [\n        "example.com"\n      ],\n      "ip_cidr": [\n        "10.0.0.0/8"\n      ]\n    }\n  ]\n}\n',
    )
    expect(Object.keys(deps.ledger.snapshot())).toEqual(['g/s'])
  })

  it('reports unchanged on a second run with the same input', async () => {
    const deps = setup({ 'mem://s': SAMPLE })
    const groups: GroupSpec[] = [{ name: 'g', sources: [listSource('s')] }]

    await runPipeline(groups, deps)
    const before = deps.artifacts.read('out/g/g.list')
    const second = await runPipeline(groups, deps)

    expect(second.counts).toEqual({ updated: 0, unchanged: 1, failed: 0 })
    expect(second.groups[0]?.sources[0]?.state).toBe('unchanged')
    expect(deps.artifacts.read('out/g/g.list')).toBe(before)
  })

  it('regenerates when forced, when a source changed or when artifacts are gone', async () => {
    const deps = setup({ 'mem://s': SAMPLE })
    const groups: GroupSpec[] = [{ name: 'g', sources: [listSource('s')] }]
    await runPipeline(groups, deps)

    expect((await runPipeline(groups, deps, { force: true })).groups[0]?.status).toBe('updated')

    deps.artifacts.files.delete('out/g/g.json')
    expect((await runPipeline(groups, deps)).groups[0]?.status).toBe('updated')

    const digest = deps.ledger.snapshot()['g/s']
    deps.reader.set('mem://s', `${SAMPLE}foo.org\n`)
    const changed = await runPipeline(groups, deps)
    expect(changed.groups[0]?.status).toBe('updated')
    expect(changed.groups[0]?.entries).toBe(3)
    expect(deps.ledger.snapshot()['g/s']).not.toBe(digest)
  })

  it('produces identical artifacts for permuted input', async () => {
    const a = setup({ 'mem://x': 'b.com\na.com\n1.1.1.1\n', 'mem://y': '+.c.com\n' })
    const b = setup({ 'mem://x': '1.1.1.1\na.com\nb.com\n', 'mem://y': '+.c.com\n' })

    await runPipeline([{ name: 'g', sources: [listSource('x'), listSource('y')] }], a)
    await runPipeline([{ name: 'g', sources: [listSource('y'), listSource('x')] }], b)

    expect(b.artifacts.read('out/g/g.list')).toBe(a.artifacts.read('out/g/g.list'))
    expect(b.artifacts.read('out/g/g.json')).toBe(a.artifacts.read('out/g/g.json'))
  })

  it('isolates a failing group from the others', async () => {
    const deps = setup({ 'mem://ok': 'a.com\n' })
    const report = await runPipeline(
      [
        { name: 'good', sources: [listSource('ok')] },
        { name: 'bad', sources: [listSource('ok'), listSource('missing')] },
      ],
      deps,
    )

    expect(report.ok).toBe(false)
    expect(report.counts).toEqual({ updated: 1, unchanged: 0, failed: 1 })
    expect(report.groups[1]).toMatchObject({ name: 'bad', status: 'failed', reason: '[fetch] missing: not found' })
    expect(Object.keys(deps.ledger.snapshot())).toEqual(['good/ok'])
    expect(deps.artifacts.read('out/bad/bad.list')).toBeUndefined()
  })

  it('keeps previous artifacts and fingerprints when a source stops parsing', async () => {
    const deps = setup({ 'mem://s': 'domain_suffix: [a.com]\n' })
    const groups: GroupSpec[] = [{ name: 'g', sources: [listSource('s', 'structured')] }]
    await runPipeline(groups, deps)
    const list = deps.artifacts.read('out/g/g.list')
    const ledger = deps.ledger.snapshot()

    deps.reader.set('mem://s', 'payload: 5\n')
    const report = await runPipeline(groups, deps)

    expect(report.groups[0]?.status).toBe('failed')
    expect(report.groups[0]?.reason).toBe('[parse] s (line 1, key "payload"): payload must be a list')
    expect(deps.artifacts.read('out/g/g.list')).toBe(list)
    expect(deps.ledger.snapshot()).toEqual(ledger)
  })

  it('skips unclassifiable lines with a warning', async () => {
    const warn = vi.fn()
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() }
    const deps = { ...setup({ 'mem://s': 'DOMAIN,a.com\nPROCESS-NAME,foo.exe\n' }), logger }

    const report = await runPipeline([{ name: 'g', sources: [listSource('s', 'classical')] }], deps)

    expect(report.groups[0]?.status).toBe('updated')
    expect(report.groups[0]?.skipped).toBe(1)
    expect(report.groups[0]?.sources[0]?.skipped).toBe(1)
    expect(warn).toHaveBeenCalledWith('[pipeline] g: [classify] s:2: unsupported rule type PROCESS-NAME: "foo.exe"')
  })

  it('applies the bareDomain default unless the source overrides it', async () => {
    const deps = setup({ 'mem://a': 'a.com\n', 'mem://b': 'b.com\n' })
    await runPipeline(
      [{ name: 'g', sources: [listSource('a'), { ...listSource('b'), bareDomain: 'exact' }] }],
      deps,
      { bareDomain: 'suffix', render: { header: false, sections: false } },
    )
    expect(deps.artifacts.read('out/g/g.list')).toBe('DOMAIN,b.com\nDOMAIN-SUFFIX,a.com\n')
  })

  it('tracks a shared source separately per group', async () => {
    const deps = setup({ 'mem://shared': 'a.com\n' })
    await runPipeline(
      [
        { name: 'a', sources: [listSource('shared')] },
        { name: 'b', sources: [listSource('shared')] },
      ],
      deps,
    )
    expect(Object.keys(deps.ledger.snapshot())).toEqual(['a/shared', 'b/shared'])
  })

  it('rejects duplicate group names', async () => {
    const deps = setup({})
    await expect(
      runPipeline([{ name: 'g', sources: [] }, { name: 'g', sources: [] }], deps),
    ).rejects.toBeInstanceOf(ConfigError)
  })
})

describe('runPipeline with a compiler', () => {
  it('commits the compiled rule-set with the other artifacts', async () => {
    const deps = setup({ 'mem://s': 'a.com\n' })
    const compiler: RuleSetCompiler = {
      compile: async (job) => {
        deps.artifacts.files.set(job.output, `srs:${job.group}`)
      },
    }

    const report = await runPipeline([{ name: 'g', sources: [listSource('s')] }], { ...deps, compiler })

    expect(report.groups[0]?.artifacts?.compiled).toBe('out/g/g.srs')
    expect(deps.artifacts.read('out/g/g.srs')).toBe('srs:g')
    expect([...deps.artifacts.files.keys()].filter(k => k.endsWith('.staged'))).toEqual([])
  })

  it('drops the compiled rule-set once compilation is turned off', async () => {
    const deps = setup({ 'mem://s': 'a.com\n' })
    const groups: GroupSpec[] = [{ name: 'g', sources: [listSource('s')] }]
    const compiler: RuleSetCompiler = {
      compile: async (job) => {
        deps.artifacts.files.set(job.output, 'srs')
      },
    }
    await runPipeline(groups, { ...deps, compiler })
    expect(deps.artifacts.read('out/g/g.srs')).toBe('srs')

    deps.reader.set('mem://s', 'a.com\nb.com\n')
    const report = await runPipeline(groups, deps)

    expect(report.groups[0]?.status).toBe('updated')
    expect(deps.artifacts.read('out/g/g.srs')).toBeUndefined()
  })

  it('leaves everything as it was when compilation fails', async () => {
    const deps = setup({ 'mem://s': 'a.com\n' })
    const groups: GroupSpec[] = [{ name: 'g', sources: [listSource('s')] }]
    await runPipeline(groups, deps)
    const list = deps.artifacts.read('out/g/g.list')
    const ledger = deps.ledger.snapshot()

    deps.reader.set('mem://s', 'a.com\nb.com\n')
    const compiler: RuleSetCompiler = {
      compile: async (job) => {
        throw new CompileError(job.group, 'exit code 1')
      },
    }
    const report = await runPipeline(groups, { ...deps, compiler })

    expect(report.groups[0]).toMatchObject({ status: 'failed', reason: '[emit] g: exit code 1' })
    expect(deps.artifacts.read('out/g/g.list')).toBe(list)
    expect(deps.ledger.snapshot()).toEqual(ledger)
    expect([...deps.artifacts.files.keys()].filter(k => k.endsWith('.staged'))).toEqual([])
  })
})

describe('runPipeline cancellation', () => {
  it('fails every group as aborted when the signal is already aborted', async () => {
    const deps = setup({ 'mem://s': 'a.com\n' })
    const ctrl = new AbortController()
    ctrl.abort()

    const report = await runPipeline([{ name: 'g', sources: [listSource('s')] }], deps, { signal: ctrl.signal })

    expect(report.groups[0]).toMatchObject({ status: 'failed', reason: 'aborted' })
    expect(deps.ledger.snapshot()).toEqual({})
    expect(deps.artifacts.files.size).toBe(0)
  })

  it('commits nothing for groups in flight when aborted', async () => {
    const deps = setup({ 'mem://s': 'a.com\n' })
    const ctrl = new AbortController()
    const reader = {
      read: async (...args: Parameters<typeof deps.reader.read>) => {
        const bytes = await deps.reader.read(...args)
        ctrl.abort()
        return bytes
      },
    }

    const report = await runPipeline([{ name: 'g', sources: [listSource('s')] }], { ...deps, reader }, { signal: ctrl.signal })

    expect(report.groups[0]?.reason).toBe('aborted')
    expect(deps.ledger.snapshot()).toEqual({})
    expect(deps.artifacts.read('out/g/g.list')).toBeUndefined()
  })
})

describe('runPool', () => {
  it('keeps result order and respects the limit', async () => {
    let active = 0
    let peak = 0
    const results = await runPool([30, 10, 20, 5, 15], 2, async (ms, i) => {
      active++
      peak = Math.max(peak, active)
      await new Promise(r => setTimeout(r, ms))
      active--
      return i
    })
    expect(results).toEqual([0, 1, 2, 3, 4])
    expect(peak).toBe(2)
  })
})
