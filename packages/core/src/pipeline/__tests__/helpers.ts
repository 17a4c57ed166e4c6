import { FetchError } from '../../errors'
import type { SourceSpec } from '../../types'
import type { SourceReader } from '../types'

export type FakeReader = SourceReader & {
  set(locator: string, text: string): void
  reads: string[]
}

/** In-process source reader keyed by locator */
export function fakeReader(data: Record<string, string> = {}, delayMs = 0): FakeReader {
  const texts = new Map(Object.entries(data))
  const reads: string[] = []
  return {
    reads,
    set: (locator, text) => {
      texts.set(locator, text)
    },
    async read(source: SourceSpec) {
      reads.push(source.locator)
      if (delayMs) await new Promise(r => setTimeout(r, delayMs))
      const text = texts.get(source.locator)
      if (text === undefined) throw new FetchError(source.id, 'not found')
      return new TextEncoder().encode(text)
    },
  }
}

export const listSource = (id: string, dialect: SourceSpec['dialect'] = 'list'): SourceSpec => ({
  id,
  locator: `mem://${id}`,
  dialect,
})
