import type { RawLine, SourceSpec } from '../types'
import { isSkippableLine, splitLines, splitTagged } from './text'

/** Plain list: one token per line */
export function* parseList(source: Pick<SourceSpec, 'id'>, text: string): Generator<RawLine> {
  const lines = splitLines(text)
  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i] ?? ''
    if (isSkippableLine(raw)) continue
    yield { sourceId: source.id, line: i + 1, text: raw.trim() }
  }
}

/** Clash/mihomo classical list: `TYPE,value[,extra…]`, untagged lines pass through */
export function* parseClassical(source: Pick<SourceSpec, 'id'>, text: string): Generator<RawLine> {
  const lines = splitLines(text)
  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i] ?? ''
    if (isSkippableLine(raw)) continue
    const { tag, text: value } = splitTagged(raw)
    yield tag === undefined
      ? { sourceId: source.id, line: i + 1, text: value }
      : { sourceId: source.id, line: i + 1, text: value, tag }
  }
}
