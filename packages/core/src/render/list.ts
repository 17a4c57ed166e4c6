import { RULE_KINDS } from '../types'
import type { RuleGroup, RuleKind } from '../types'
import { LIST_LABELS } from './types'
import type { RenderOptions } from './types'

function countKinds(group: RuleGroup): Map<RuleKind, number> {
  const counts = new Map<RuleKind, number>()
  for (const e of group.entries) counts.set(e.kind, (counts.get(e.kind) ?? 0) + 1)
  return counts
}

/**
 * Classical list artifact:
 *
 *   # NAME: media
 *   # DOMAIN: 1
 *   # TOTAL: 1
 *
 *   # DOMAIN
 *   DOMAIN,example.com
 */
export function renderList(group: RuleGroup, opts: RenderOptions = {}): string {
  const header = opts.header ?? true
  const sections = opts.sections ?? true
  const counts = countKinds(group)
  const out: string[] = []

  if (header) {
    out.push(`# NAME: ${group.name}`)
    for (const kind of RULE_KINDS) {
      const n = counts.get(kind)
      if (n) out.push(`# ${LIST_LABELS[kind]}: ${n}`)
    }
    out.push(`# TOTAL: ${group.entries.length}`)
    if (!sections && group.entries.length) out.push('')
  }

  let current: RuleKind | undefined
  for (const e of group.entries) {
    if (sections && e.kind !== current) {
      if (out.length) out.push('')
      out.push(`# ${LIST_LABELS[e.kind]}`)
    }
    current = e.kind
    out.push(`${LIST_LABELS[e.kind]},${e.value}`)
  }

  return out.length ? `${out.join('\n')}\n` : ''
}
