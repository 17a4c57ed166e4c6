import type { RuleGroup } from '../types'
import type { RenderOptions } from './types'

type HeadlessRule = {
  domain?: string[]
  domain_suffix?: string[]
  domain_keyword?: string[]
  ip_cidr?: string[]
}

/**
 * sing-box rule-set source. Both address families go to `ip_cidr`
 * (v4 first, as sorted); kinds without entries are left out.
 */
export function renderStructured(group: RuleGroup, opts: RenderOptions = {}): string {
  const rule: HeadlessRule = {}
  for (const e of group.entries) {
    const field = e.kind === 'ip_cidr6' ? 'ip_cidr' : e.kind
    const list = rule[field] ?? (rule[field] = [])
    list.push(e.value)
  }
  const doc = {
    version: opts.version ?? 1,
    rules: Object.keys(rule).length ? [rule] : [],
  }
  return `${JSON.stringify(doc, null, 2)}\n`
}
