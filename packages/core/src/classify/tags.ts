import type { RuleKind } from '../types'

/** `cidr` resolves to ip_cidr or ip_cidr6 from the value itself */
export type TagTarget = Exclude<RuleKind, 'ip_cidr' | 'ip_cidr6'> | 'cidr'

// Ключи сравниваются в нижнем регистре: DOMAIN-SUFFIX, domain_suffix, Domain-Suffix означают одно и то же.
// `domain` здесь означает точный хост (sing-box/clash); v2fly-префикс `domain:` разбирается отдельно.
const TAG_TABLE: Record<string, TagTarget> = {
  'domain': 'domain',
  'full': 'domain',
  'host': 'domain',
  'domain-suffix': 'domain_suffix',
  'domain_suffix': 'domain_suffix',
  'suffix': 'domain_suffix',
  'host-suffix': 'domain_suffix',
  'domain-keyword': 'domain_keyword',
  'domain_keyword': 'domain_keyword',
  'keyword': 'domain_keyword',
  'host-keyword': 'domain_keyword',
  'ip-cidr': 'cidr',
  'ip-cidr6': 'cidr',
  'ip6-cidr': 'cidr',
  'ip_cidr': 'cidr',
  'ip': 'cidr',
}

export function resolveTag(tag: string): TagTarget | undefined {
  const key = tag.trim().toLowerCase()
  return Object.prototype.hasOwnProperty.call(TAG_TABLE, key) ? TAG_TABLE[key] : undefined
}

/** v2fly domain-list-community prefixes on untagged lines */
export const V2FLY_PREFIXES: Record<string, RuleKind | null> = {
  'full:': 'domain',
  'domain:': 'domain_suffix',
  'keyword:': 'domain_keyword',
  'regexp:': null,
  'include:': null,
}
