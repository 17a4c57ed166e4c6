import { canonicalCidr, looksLikeAddress } from '../lib/cidr'
import { ClassificationError } from '../errors'
import type { BareDomainMode, RawLine, RuleEntry, RuleKind } from '../types'
import { resolveTag, V2FLY_PREFIXES } from './tags'

export interface ClassifyOptions {
  /** how an untagged bare hostname is read; markers (`+.`, `*.`, `.`, `domain:`) always mean suffix */
  bareDomain?: BareDomainMode
}

const LABEL = /^[a-z0-9_]([a-z0-9_-]*[a-z0-9_])?$/
const KEYWORD = /^[a-z0-9._-]+$/
const INLINE_COMMENT = /\s+#.*$/

export function isHostname(value: string): boolean {
  if (!value || value.length > 253) return false
  return value.split('.').every(l => l.length <= 63 && LABEL.test(l))
}

function cleanToken(text: string): string {
  return text.replace(INLINE_COMMENT, '').trim()
}

function normalizeHost(value: string): string {
  const v = value.toLowerCase()
  return v.endsWith('.') ? v.slice(0, -1) : v
}

function fail(raw: RawLine, token: string, reason: string): never {
  throw new ClassificationError(raw.sourceId, raw.line, token, reason)
}

function asDomain(raw: RawLine, kind: 'domain' | 'domain_suffix', token: string): RuleEntry {
  const value = normalizeHost(token)
  if (!isHostname(value)) fail(raw, token, 'invalid hostname')
  return { kind, value }
}

function asKeyword(raw: RawLine, token: string): RuleEntry {
  const value = token.toLowerCase()
  if (!KEYWORD.test(value)) fail(raw, token, 'invalid keyword')
  return { kind: 'domain_keyword', value }
}

function asCidr(raw: RawLine, token: string): RuleEntry {
  const cidr = canonicalCidr(token)
  if (!cidr) fail(raw, token, 'invalid address or prefix')
  return cidr
}

function stripSuffixMarker(token: string): string | undefined {
  for (const m of ['+.', '*.', '.']) {
    if (token.startsWith(m)) return token.slice(m.length)
  }
  return undefined
}

function byKind(raw: RawLine, kind: RuleKind | 'cidr', token: string): RuleEntry {
  switch (kind) {
    case 'domain':
    case 'domain_suffix':
      return asDomain(raw, kind, kind === 'domain_suffix' ? stripSuffixMarker(token) ?? token : token)
    case 'domain_keyword':
      return asKeyword(raw, token)
    case 'cidr':
    case 'ip_cidr':
    case 'ip_cidr6':
      return asCidr(raw, token)
  }
}

/**
 * One raw line → one entry, or null for a line that is empty once comments are gone.
 * Throws ClassificationError for anything that cannot be read as a rule.
 */
export function classifyLine(raw: RawLine, options: ClassifyOptions = {}): RuleEntry | null {
  const token = cleanToken(raw.text)
  if (!token) return null

  if (raw.tag !== undefined) {
    const target = resolveTag(raw.tag)
    if (!target) fail(raw, token, `unsupported rule type ${raw.tag}`)
    return byKind(raw, target, token)
  }

  const colon = token.indexOf(':')
  if (colon > 0) {
    const prefix = token.slice(0, colon + 1).toLowerCase()
    if (prefix in V2FLY_PREFIXES) {
      const kind = V2FLY_PREFIXES[prefix]
      if (!kind) fail(raw, token, `unsupported prefix ${prefix}`)
      return byKind(raw, kind, cleanToken(token.slice(colon + 1)))
    }
  }

  if (looksLikeAddress(token)) return asCidr(raw, token)

  if (token.length > 2 && token.startsWith('*') && token.endsWith('*')) {
    return asKeyword(raw, token.slice(1, -1))
  }

  const suffix = stripSuffixMarker(token)
  if (suffix !== undefined) return asDomain(raw, 'domain_suffix', suffix)

  return asDomain(raw, options.bareDomain === 'suffix' ? 'domain_suffix' : 'domain', token)
}

export interface ClassifyResult {
  entries: RuleEntry[]
  skipped: number
}

/** Classifies every line, collecting ClassificationErrors through `onSkip` instead of throwing. */
export function classifyLines(
  lines: Iterable<RawLine>,
  options: ClassifyOptions = {},
  onSkip?: (err: ClassificationError) => void,
): ClassifyResult {
  const entries: RuleEntry[] = []
  let skipped = 0
  for (const raw of lines) {
    try {
      const entry = classifyLine(raw, options)
      if (entry) entries.push(entry)
    } catch (e) {
      if (!(e instanceof ClassificationError)) throw e
      skipped++
      onSkip?.(e)
    }
  }
  return { entries, skipped }
}
