import type { Dialect, RawLine, SourceSpec } from '../types'
import { parseClassical, parseList } from './list'
import { parseStructured } from './structured'

export { parseClassical, parseList } from './list'
export { parseStructured } from './structured'
export { isSkippableLine, splitLines, splitTagged } from './text'

type Parser = (source: Pick<SourceSpec, 'id'>, text: string) => Iterable<RawLine>

const PARSERS: Record<Dialect, Parser> = {
  list: parseList,
  classical: parseClassical,
  structured: parseStructured,
}

/** Decode a source body according to its dialect. Throws ParseError on malformed structure. */
export function parseSource(source: Pick<SourceSpec, 'id' | 'dialect'>, text: string): RawLine[] {
  return [...PARSERS[source.dialect](source, text)]
}
