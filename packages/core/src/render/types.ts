import type { RuleKind } from '../types'

/**
 * Опции рендера артефактов группы.
 * Одни и те же для build и convert.
 */
export interface RenderOptions {
  /**
   * Шапка `# NAME / # <TYPE>: n / # TOTAL` в начале .list.
   * По умолчанию включена.
   */
  header?: boolean

  /** Комментарий `# <TYPE>` перед каждой секцией .list. По умолчанию включён. */
  sections?: boolean

  /** Поле `version` в rule-set JSON. По умолчанию 1. */
  version?: number
}

export interface RenderedArtifacts {
  list: string
  structured: string
}

/** Labels of the classical list format */
export const LIST_LABELS: Record<RuleKind, string> = {
  domain: 'DOMAIN',
  domain_suffix: 'DOMAIN-SUFFIX',
  domain_keyword: 'DOMAIN-KEYWORD',
  ip_cidr: 'IP-CIDR',
  ip_cidr6: 'IP-CIDR6',
}
