import type { SourceReader } from '@netrules/core'
import { createSourceReader } from '@netrules/source-types'
import type { SourceProvider } from '@netrules/source-types'
import { httpSource } from '@netrules/source-http'
import { localSource } from '@netrules/source-local'
import { memorySource } from '@netrules/source-memory'

import type { ResolvedConfig } from '../config/config'

/**
 * Провайдеры в порядке приоритета: memory:// → http(s):// → локальные пути.
 * Локальный идёт последним, он принимает всё без схемы.
 */
export function createProviders(rc: Pick<ResolvedConfig, 'http'>, baseDir: string): SourceProvider[] {
  return [
    memorySource(),
    httpSource({
      timeoutMs: rc.http.timeoutMs,
      retries: rc.http.retries,
      userAgent: rc.http.userAgent,
    }),
    localSource({ baseDir }),
  ]
}

export function createReader(rc: Pick<ResolvedConfig, 'http'>, baseDir: string): SourceReader {
  return createSourceReader(createProviders(rc, baseDir))
}
