export type RuleKind = 'domain' | 'domain_suffix' | 'domain_keyword' | 'ip_cidr' | 'ip_cidr6'

/** Canonical kind order: primary sort key of every rule group */
export const RULE_KINDS: readonly RuleKind[] = [
  'domain',
  'domain_suffix',
  'domain_keyword',
  'ip_cidr',
  'ip_cidr6',
]

export interface RuleEntry {
  kind: RuleKind
  value: string
}

export interface RuleGroup {
  name: string
  /** unique by (kind, value), sorted by kind order then value */
  entries: RuleEntry[]
}

export type Dialect = 'list' | 'classical' | 'structured'

export const DIALECTS: readonly Dialect[] = ['list', 'classical', 'structured']

/** How an untagged bare hostname is classified */
export type BareDomainMode = 'exact' | 'suffix'

export interface SourceSpec {
  /** stable within the group, used for the ledger key */
  id: string
  /** http(s)://, memory://, file:// or a filesystem path */
  locator: string
  dialect: Dialect
  bareDomain?: BareDomainMode
}

export interface GroupSpec {
  name: string
  sources: SourceSpec[]
}

/**
 * One line (or structured item) as it came out of a parser.
 * `tag` is set when the dialect states the kind explicitly
 * (`DOMAIN-SUFFIX,…` in classical lists, section keys in structured docs).
 */
export interface RawLine {
  sourceId: string
  line: number
  text: string
  tag?: string
}

export interface SourceFingerprint {
  /** group-scoped: `<group>/<source id>` */
  sourceId: string
  digest: string
}

export type SourceState = 'changed' | 'unchanged'

export type GroupStatus = 'unchanged' | 'updated' | 'failed'

export interface SourceReport {
  id: string
  state?: SourceState
  digest?: string
  /** lines skipped by the classifier */
  skipped: number
}

export interface ArtifactPaths {
  list: string
  structured: string
  compiled?: string
}

export interface GroupReport {
  name: string
  status: GroupStatus
  reason?: string
  entries: number
  byKind: Record<RuleKind, number>
  duplicates: number
  skipped: number
  sources: SourceReport[]
  artifacts?: ArtifactPaths
}

export interface RunReport {
  groups: GroupReport[]
  counts: Record<GroupStatus, number>
  ok: boolean
}

export function emptyKindCounts(): Record<RuleKind, number> {
  return { domain: 0, domain_suffix: 0, domain_keyword: 0, ip_cidr: 0, ip_cidr6: 0 }
}
