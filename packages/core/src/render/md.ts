import { RULE_KINDS } from '../types'
import type { GroupReport, RunReport } from '../types'
import { LIST_LABELS } from './types'

type SummaryOptions = {
  title?: string
}

function mdEscapeInline(s: string): string {
  // минимально: экранируем | * _ ` и \
  return (s ?? '')
    .replace(/\\/g, '\\\\')
    .replace(/\|/g, '\\|')
    .replace(/\*/g, '\\*')
    .replace(/_/g, '\\_')
    .replace(/`/g, '\\`')
}

function kindBreakdown(g: GroupReport): string {
  const parts = RULE_KINDS.filter(k => g.byKind[k] > 0).map(k => `${LIST_LABELS[k]} ${g.byKind[k]}`)
  return parts.length ? parts.join(', ') : 'empty'
}

function updatedSection(groups: GroupReport[]): string[] {
  if (!groups.length) return []
  const out = ['## Updated', '', '| group | rules | by type | skipped | files |', '|---|---:|---|---:|---|']
  for (const g of groups) {
    const files = g.artifacts
      ? [g.artifacts.list, g.artifacts.structured, g.artifacts.compiled]
          .filter((p): p is string => Boolean(p))
          .map(p => `\`${mdEscapeInline(p)}\``)
          .join('<br>')
      : ''
    out.push(`| ${mdEscapeInline(g.name)} | ${g.entries} | ${kindBreakdown(g)} | ${g.skipped} | ${files} |`)
  }
  out.push('')
  return out
}

/** Run summary in the shape of a CI step summary */
export function renderSummaryMarkdown(report: RunReport, opts: SummaryOptions = {}): string {
  const title = opts.title ?? 'Rule sets'
  const updated = report.groups.filter(g => g.status === 'updated')
  const unchanged = report.groups.filter(g => g.status === 'unchanged')
  const failed = report.groups.filter(g => g.status === 'failed')

  const out = [
    `# ${title}`,
    '',
    `updated: **${report.counts.updated}** · unchanged: **${report.counts.unchanged}** · failed: **${report.counts.failed}**`,
    '',
    ...updatedSection(updated),
  ]

  if (unchanged.length) {
    out.push('## Unchanged', '', ...unchanged.map(g => `- ${mdEscapeInline(g.name)}`), '')
  }
  if (failed.length) {
    out.push('## Failed', '', ...failed.map(g => `- **${mdEscapeInline(g.name)}**: ${mdEscapeInline(g.reason ?? 'unknown error')}`), '')
  }
  if (!report.groups.length) out.push('> No rule groups configured.', '')

  return out.join('\n')
}
