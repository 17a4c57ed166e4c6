import { describe, it, expect } from 'vitest'
import type { RuleEntry } from '../../types'
import { aggregate, RuleSetBuilder } from '..'

const entries: RuleEntry[] = [
  { kind: 'ip_cidr', value: '10.0.0.0/8' },
  { kind: 'domain', value: 'a0.com' },
  { kind: 'domain_suffix', value: 'z.com' },
  { kind: 'domain', value: 'a.com' },
  { kind: 'ip_cidr6', value: '2001:db8::/32' },
  { kind: 'domain', value: 'a-b.com' },
  { kind: 'domain_keyword', value: 'ads' },
]

describe('RuleSetBuilder', () => {
  it('reports whether an entry was new', () => {
    const b = new RuleSetBuilder()
    expect(b.add({ kind: 'domain', value: 'a.com' })).toBe(true)
    expect(b.add({ kind: 'domain', value: 'a.com' })).toBe(false)
    expect(b.add({ kind: 'domain_suffix', value: 'a.com' })).toBe(true)
    expect(b.size).toBe(2)
    expect(b.stats().duplicates).toBe(1)
  })

  it('sorts by kind order, then by code unit', () => {
    const group = new RuleSetBuilder().addAll(entries).build('g')
    expect(group.entries).toEqual([
      { kind: 'domain', value: 'a-b.com' },
      { kind: 'domain', value: 'a.com' },
      { kind: 'domain', value: 'a0.com' },
      { kind: 'domain_suffix', value: 'z.com' },
      { kind: 'domain_keyword', value: 'ads' },
      { kind: 'ip_cidr', value: '10.0.0.0/8' },
      { kind: 'ip_cidr6', value: '2001:db8::/32' },
    ])
  })

  it('counts entries per kind', () => {
    const stats = new RuleSetBuilder().addAll(entries).addAll(entries.slice(0, 2)).stats()
    expect(stats).toEqual({
      entries: 7,
      byKind: { domain: 3, domain_suffix: 1, domain_keyword: 1, ip_cidr: 1, ip_cidr6: 1 },
      duplicates: 2,
    })
  })
})

describe('aggregate', () => {
  it('does not depend on source or line order', () => {
    const a = aggregate('g', [entries.slice(0, 3), entries.slice(3)])
    const b = aggregate('g', [[...entries].reverse(), entries.slice(2, 4)])
    expect(b).toEqual(a)
  })
})
