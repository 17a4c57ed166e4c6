import { FetchError } from '@netrules/core'
import type { SourceReader, SourceSpec } from '@netrules/core'

export interface ReadOptions {
  signal?: AbortSignal
}

/**
 * Minimal source contract: name + locator check + async read.
 * `read` resolves to the raw bytes and fails with FetchError.
 */
export interface SourceProvider {
  name: string
  accepts(locator: string): boolean
  read(source: SourceSpec, opts?: ReadOptions): Promise<Uint8Array>
}

/** First provider that accepts the locator wins. */
export function createSourceReader(providers: readonly SourceProvider[]): SourceReader {
  return {
    async read(source, opts = {}) {
      const provider = providers.find(p => p.accepts(source.locator))
      if (!provider) {
        throw new FetchError(source.id, `no source provider for "${source.locator}"`)
      }
      return provider.read(source, opts)
    },
  }
}

export function hasScheme(locator: string, ...schemes: string[]): boolean {
  const m = /^([a-z][a-z0-9+.-]*):\/\//i.exec(locator)
  return m?.[1] !== undefined && schemes.includes(m[1].toLowerCase())
}
