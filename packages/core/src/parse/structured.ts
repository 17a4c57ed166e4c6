import { LineCounter, isMap, isNode, isScalar, isSeq, parseDocument } from 'yaml'
import type { YAMLMap } from 'yaml'

import { ParseError } from '../errors'
import type { RawLine, SourceSpec } from '../types'
import { splitTagged } from './text'

/**
 * Structured sources (YAML, and therefore JSON). Shapes:
 *  1) mapping of lists     { domain_suffix: [...], ip_cidr: [...] }
 *  2) sing-box rule-set    { version: 1, rules: [ { domain: [...] } ] }
 *  3) mihomo provider      { payload: ['+.example.com', 'DOMAIN,foo.com'] }
 * The section key becomes the tag of every item under it.
 */
export function* parseStructured(source: Pick<SourceSpec, 'id'>, text: string): Generator<RawLine> {
  const lineCounter = new LineCounter()
  const doc = parseDocument(text.replace(/^\uFEFF/, ''), { lineCounter })
  const sourceId = source.id

  const lineOf = (node: unknown): number | undefined => {
    if (!isNode(node) || !node.range) return undefined
    return lineCounter.linePos(node.range[0]).line
  }

  const first = doc.errors[0]
  if (first) {
    const line = first.linePos?.[0]?.line
    throw new ParseError(sourceId, first.message.split('\n')[0] ?? 'invalid document', { line })
  }

  const root = doc.contents
  if (root === null) return
  if (!isMap(root)) {
    throw new ParseError(sourceId, 'expected a mapping at the top level', { line: lineOf(root) })
  }

  const keys = keysOf(sourceId, root, lineOf)

  if (keys.has('payload')) {
    const payload = root.get('payload', true)
    if (!isSeq(payload)) {
      throw new ParseError(sourceId, 'payload must be a list', { key: 'payload', line: lineOf(payload) })
    }
    for (const item of payload.items) {
      const value = stringItem(sourceId, 'payload', item, lineOf)
      const { tag, text: token } = splitTagged(value)
      const line = lineOf(item) ?? 0
      yield tag === undefined ? { sourceId, line, text: token } : { sourceId, line, text: token, tag }
    }
    return
  }

  if (keys.has('rules')) {
    for (const key of keys.keys()) {
      if (key !== 'rules' && key !== 'version') {
        throw new ParseError(sourceId, 'unexpected key next to "rules"', { key, line: keys.get(key) })
      }
    }
    const rules = root.get('rules', true)
    if (!isSeq(rules)) {
      throw new ParseError(sourceId, 'rules must be a list', { key: 'rules', line: lineOf(rules) })
    }
    for (const rule of rules.items) {
      if (!isMap(rule)) {
        throw new ParseError(sourceId, 'each rule must be a mapping', { key: 'rules', line: lineOf(rule) })
      }
      yield* sections(sourceId, rule, lineOf)
    }
    return
  }

  // version рядом со списками допустим так же, как рядом с rules
  yield* sections(sourceId, root, lineOf, new Set(['version']))
}

function keysOf(
  sourceId: string,
  map: YAMLMap<unknown, unknown>,
  lineOf: (n: unknown) => number | undefined,
): Map<string, number | undefined> {
  const keys = new Map<string, number | undefined>()
  for (const pair of map.items) {
    if (!isScalar(pair.key) || typeof pair.key.value !== 'string') {
      throw new ParseError(sourceId, 'keys must be strings', { line: lineOf(pair.key) })
    }
    keys.set(pair.key.value, lineOf(pair.key))
  }
  return keys
}

function* sections(
  sourceId: string,
  map: YAMLMap<unknown, unknown>,
  lineOf: (n: unknown) => number | undefined,
  ignored: ReadonlySet<string> = new Set(),
): Generator<RawLine> {
  keysOf(sourceId, map, lineOf)
  for (const pair of map.items) {
    const key = isScalar(pair.key) ? String(pair.key.value) : ''
    if (ignored.has(key)) continue
    const value = pair.value

    // sing-box допускает строку вместо списка из одного элемента
    if (isScalar(value) && typeof value.value === 'string') {
      yield { sourceId, line: lineOf(value) ?? 0, text: value.value, tag: key }
      continue
    }
    if (!isSeq(value)) {
      throw new ParseError(sourceId, 'expected a list of strings', { key, line: lineOf(value) ?? lineOf(pair.key) })
    }
    for (const item of value.items) {
      const text = stringItem(sourceId, key, item, lineOf)
      yield { sourceId, line: lineOf(item) ?? 0, text, tag: key }
    }
  }
}

function stringItem(
  sourceId: string,
  key: string,
  item: unknown,
  lineOf: (n: unknown) => number | undefined,
): string {
  if (isScalar(item) && typeof item.value === 'string') return item.value
  throw new ParseError(sourceId, 'items must be strings', { key, line: lineOf(item) })
}
