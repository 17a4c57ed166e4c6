import { FetchError } from '@netrules/core'
import { hasScheme } from '@netrules/source-types'
import type { SourceProvider } from '@netrules/source-types'

export interface MemorySource extends SourceProvider {
  set(name: string, text: string): void
  delete(name: string): void
}

/** `memory://<name>` sources backed by a map; for tests and dry runs */
export function memorySource(initial: Record<string, string> = {}): MemorySource {
  const texts = new Map(Object.entries(initial))
  const encoder = new TextEncoder()

  return {
    name: 'memory',
    accepts: (locator) => hasScheme(locator, 'memory'),
    async read(source) {
      const name = source.locator.replace(/^memory:\/\//i, '')
      const text = texts.get(name)
      if (text === undefined) throw new FetchError(source.id, `no memory source "${name}"`)
      return encoder.encode(text)
    },
    set(name, text) {
      texts.set(name, text)
    },
    delete(name) {
      texts.delete(name)
    },
  }
}

export default memorySource
