import { describe, it, expect, vi } from 'vitest'
import { ClassificationError } from '../../errors'
import type { RawLine } from '../../types'
import { classifyLine, classifyLines, isHostname } from '..'

const line = (text: string, tag?: string): RawLine =>
  tag === undefined ? { sourceId: 's', line: 1, text } : { sourceId: 's', line: 1, text, tag }

describe('classifyLine: untagged text', () => {
  it('reads bare hostnames as exact domains by default', () => {
    expect(classifyLine(line('EXAMPLE.com.'))).toEqual({ kind: 'domain', value: 'example.com' })
  })

  it('reads bare hostnames as suffixes when configured', () => {
    expect(classifyLine(line('example.com'), { bareDomain: 'suffix' })).toEqual({ kind: 'domain_suffix', value: 'example.com' })
  })

  it('treats +. *. and . as suffix markers', () => {
    expect(classifyLine(line('+.Example.com'))).toEqual({ kind: 'domain_suffix', value: 'example.com' })
    expect(classifyLine(line('*.a.b'))).toEqual({ kind: 'domain_suffix', value: 'a.b' })
    expect(classifyLine(line('.a.b'))).toEqual({ kind: 'domain_suffix', value: 'a.b' })
  })

  it('treats *word* as a keyword', () => {
    expect(classifyLine(line('*Ads*'))).toEqual({ kind: 'domain_keyword', value: 'ads' })
  })

  it('understands v2fly prefixes', () => {
    expect(classifyLine(line('full:x.com'))).toEqual({ kind: 'domain', value: 'x.com' })
    expect(classifyLine(line('domain:x.com'), { bareDomain: 'exact' })).toEqual({ kind: 'domain_suffix', value: 'x.com' })
    expect(classifyLine(line('keyword:Track'))).toEqual({ kind: 'domain_keyword', value: 'track' })
    expect(() => classifyLine(line('regexp:^ads\\.'))).toThrow(ClassificationError)
    expect(() => classifyLine(line('include:google'))).toThrow(/unsupported prefix include:/)
  })

  it('canonicalizes addresses and prefixes', () => {
    expect(classifyLine(line('10.1.2.3/8'))).toEqual({ kind: 'ip_cidr', value: '10.0.0.0/8' })
    expect(classifyLine(line('2001:db8::1'))).toEqual({ kind: 'ip_cidr6', value: '2001:db8::1/128' })
  })

  it('rejects address-shaped text that does not parse', () => {
    expect(() => classifyLine(line('1.2.3'))).toThrow('[classify] s:1: invalid address or prefix: "1.2.3"')
  })

  it('strips inline comments and skips empty text', () => {
    expect(classifyLine(line('example.com   # note'))).toEqual({ kind: 'domain', value: 'example.com' })
    expect(classifyLine(line('   '))).toBeNull()
  })

  it('rejects hostnames with bad labels', () => {
    expect(() => classifyLine(line('bad-.example.com'))).toThrow(/invalid hostname/)
    expect(() => classifyLine(line(`${'a'.repeat(64)}.com`))).toThrow(/invalid hostname/)
    expect(() => classifyLine(line('*a b*'))).toThrow(/invalid keyword/)
  })
})

describe('classifyLine: tagged lines', () => {
  it('maps tags case-insensitively', () => {
    expect(classifyLine(line('+.a.com', 'DOMAIN-SUFFIX'))).toEqual({ kind: 'domain_suffix', value: 'a.com' })
    expect(classifyLine(line('a.com', 'domain_suffix'))).toEqual({ kind: 'domain_suffix', value: 'a.com' })
    expect(classifyLine(line('A.com', 'Domain'))).toEqual({ kind: 'domain', value: 'a.com' })
    expect(classifyLine(line('Tracker', 'domain_keyword'))).toEqual({ kind: 'domain_keyword', value: 'tracker' })
  })

  it('takes the address family from the value', () => {
    expect(classifyLine(line('fd00::/8', 'IP-CIDR'))).toEqual({ kind: 'ip_cidr6', value: 'fd00::/8' })
    expect(classifyLine(line('1.1.1.1', 'ip_cidr'))).toEqual({ kind: 'ip_cidr', value: '1.1.1.1/32' })
    expect(() => classifyLine(line('example.com', 'IP-CIDR'))).toThrow(/invalid address or prefix/)
  })

  it('tags override shape inference', () => {
    expect(classifyLine(line('example.com', 'DOMAIN'), { bareDomain: 'suffix' })).toEqual({ kind: 'domain', value: 'example.com' })
  })

  it('rejects rule types it cannot express', () => {
    expect(() => classifyLine(line('foo.exe', 'PROCESS-NAME'))).toThrow(
      '[classify] s:1: unsupported rule type PROCESS-NAME: "foo.exe"',
    )
  })
})

describe('classifyLines', () => {
  it('collects classification failures instead of throwing', () => {
    const onSkip = vi.fn()
    const res = classifyLines(
      [line('a.com'), { sourceId: 's', line: 2, text: 'x', tag: 'USER-AGENT' }, line('')],
      {},
      onSkip,
    )
    expect(res.entries).toEqual([{ kind: 'domain', value: 'a.com' }])
    expect(res.skipped).toBe(1)
    expect(onSkip).toHaveBeenCalledTimes(1)
    const err = onSkip.mock.calls[0]?.[0]
    expect(err).toBeInstanceOf(ClassificationError)
    if (err instanceof ClassificationError) expect(err.line).toBe(2)
  })
})

describe('isHostname', () => {
  it('accepts underscores and single labels', () => {
    expect(isHostname('_dmarc.example.com')).toBe(true)
    expect(isHostname('localhost')).toBe(true)
    expect(isHostname('a..b')).toBe(false)
    expect(isHostname('')).toBe(false)
  })
})
