import fs from 'node:fs/promises'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { FetchError } from '@netrules/core'
import type { SourceProvider } from '@netrules/source-types'

export interface LocalSourceOptions {
  /** relative locators are resolved against it (default: cwd) */
  baseDir?: string
}

function isFileUrl(locator: string): boolean {
  return /^file:\/\//i.test(locator)
}

/** Anything without a URL scheme is a path; `file://` URLs too. */
export function resolveLocalPath(locator: string, baseDir = process.cwd()): string {
  if (isFileUrl(locator)) return fileURLToPath(locator)
  return path.resolve(baseDir, locator)
}

export function localSource(opts: LocalSourceOptions = {}): SourceProvider {
  return {
    name: 'local',
    accepts: (locator) => isFileUrl(locator) || !/^[a-z][a-z0-9+.-]*:\/\//i.test(locator),
    async read(source, { signal } = {}) {
      const file = resolveLocalPath(source.locator, opts.baseDir)
      try {
        return await fs.readFile(file, { signal })
      } catch (e) {
        const code = e instanceof Error && 'code' in e ? String(e.code) : ''
        const reason = code === 'ENOENT' ? `file not found: ${file}` : `cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`
        throw new FetchError(source.id, reason, { cause: e, retryable: false })
      }
    },
  }
}

export const localProvider = localSource()

export default localProvider
