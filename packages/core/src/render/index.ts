import type { RuleGroup } from '../types'
import { renderList } from './list'
import { renderStructured } from './structured'
import type { RenderedArtifacts, RenderOptions } from './types'

export { renderList } from './list'
export { renderStructured } from './structured'
export { renderSummaryMarkdown } from './md'
export { LIST_LABELS } from './types'
export type { RenderedArtifacts, RenderOptions } from './types'

export function renderArtifacts(group: RuleGroup, opts: RenderOptions = {}): RenderedArtifacts {
  return { list: renderList(group, opts), structured: renderStructured(group, opts) }
}
