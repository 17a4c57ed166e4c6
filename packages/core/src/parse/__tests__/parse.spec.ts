import { describe, it, expect } from 'vitest'
import { ParseError } from '../../errors'
import { parseClassical, parseList, parseSource, splitTagged } from '..'

const src = { id: 's' }

describe('parseList', () => {
  it('skips comments and blanks, keeps 1-based line numbers', () => {
    const text = '\uFEFFexample.com\r\n# c\n\n  foo.org  \n'
    expect([...parseList(src, text)]).toEqual([
      { sourceId: 's', line: 1, text: 'example.com' },
      { sourceId: 's', line: 4, text: 'foo.org' },
    ])
  })
})

describe('parseClassical', () => {
  it('splits the type from the value and drops trailing fields', () => {
    const text = [
      'DOMAIN-SUFFIX,google.com,Proxy',
      'IP-CIDR,10.0.0.0/8,no-resolve',
      'plain.com',
      'DOMAIN foo.com',
      '  # indented comment',
    ].join('\n')
    expect([...parseClassical(src, text)]).toEqual([
      { sourceId: 's', line: 1, text: 'google.com', tag: 'DOMAIN-SUFFIX' },
      { sourceId: 's', line: 2, text: '10.0.0.0/8', tag: 'IP-CIDR' },
      { sourceId: 's', line: 3, text: 'plain.com' },
      { sourceId: 's', line: 4, text: 'foo.com', tag: 'DOMAIN' },
    ])
  })

  it('keeps IPv6 values whole', () => {
    expect(splitTagged('IP-CIDR6,2001:db8::/32,no-resolve')).toEqual({ tag: 'IP-CIDR6', text: '2001:db8::/32' })
  })

  it('does not mistake a host followed by a comment for a tag', () => {
    expect(splitTagged('localhost # loopback')).toEqual({ text: 'localhost # loopback' })
  })
})

describe('parseStructured', () => {
  it('reads a mapping of lists, keys become tags', () => {
    const text = 'domain:\n  - a.com\ndomain_suffix: [b.com]\n'
    expect(parseSource({ id: 's', dialect: 'structured' }, text)).toEqual([
      { sourceId: 's', line: 2, text: 'a.com', tag: 'domain' },
      { sourceId: 's', line: 3, text: 'b.com', tag: 'domain_suffix' },
    ])
  })

  it('ignores a top-level version next to the lists', () => {
    const text = 'version: 1\ndomain: [a.com]\n'
    expect(parseSource({ id: 's', dialect: 'structured' }, text)).toEqual([
      { sourceId: 's', line: 2, text: 'a.com', tag: 'domain' },
    ])
  })

  it('reads sing-box rule-set sources (JSON)', () => {
    const text = JSON.stringify({ version: 1, rules: [{ domain: ['x.com'], ip_cidr: ['10.0.0.0/8'] }, { domain_keyword: 'ads' }] })
    const lines = parseSource({ id: 's', dialect: 'structured' }, text)
    expect(lines.map(l => [l.tag, l.text])).toEqual([
      ['domain', 'x.com'],
      ['ip_cidr', '10.0.0.0/8'],
      ['domain_keyword', 'ads'],
    ])
  })

  it('reads mihomo payloads, splitting classical entries', () => {
    const text = "payload:\n  - '+.example.com'\n  - 'DOMAIN,foo.com'\n"
    expect(parseSource({ id: 's', dialect: 'structured' }, text)).toEqual([
      { sourceId: 's', line: 2, text: '+.example.com' },
      { sourceId: 's', line: 3, text: 'foo.com', tag: 'DOMAIN' },
    ])
  })

  it('yields nothing for an empty document', () => {
    expect(parseSource({ id: 's', dialect: 'structured' }, '')).toEqual([])
  })

  it('reports structural problems as ParseError with position', () => {
    const parse = (text: string) => () => parseSource({ id: 's', dialect: 'structured' }, text)

    expect(parse('a: [')).toThrow(ParseError)
    expect(parse('- a\n- b\n')).toThrow(/expected a mapping at the top level/)
    expect(parse('rules: 5\n')).toThrow(/rules must be a list/)
    expect(parse('version: 1\nrules: []\nextra: 1\n')).toThrow(/unexpected key next to "rules"/)

    try {
      parse('domain: [1]\n')()
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(ParseError)
      if (e instanceof ParseError) {
        expect(e.line).toBe(1)
        expect(e.key).toBe('domain')
        expect(e.message).toBe('[parse] s (line 1, key "domain"): items must be strings')
      }
    }
  })
})
