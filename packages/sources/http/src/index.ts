import { FetchError } from '@netrules/core'
import type { SourceSpec } from '@netrules/core'
import { hasScheme } from '@netrules/source-types'
import type { ReadOptions, SourceProvider } from '@netrules/source-types'

export type FetchFn = (url: string, init: { signal: AbortSignal; headers: Record<string, string> }) => Promise<Response>

export interface HttpSourceOptions {
  /** per attempt, default 30s */
  timeoutMs?: number
  /** attempts in total, default 3 */
  retries?: number
  userAgent?: string
  fetchFn?: FetchFn
  /** pause before the next attempt; default 500ms per attempt, at most 3s */
  delay?: (attempt: number) => number
}

export const DEFAULT_TIMEOUT_MS = 30_000
export const DEFAULT_RETRIES = 3

const defaultDelay = (attempt: number) => Math.min(3000, attempt * 500)

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) return resolve()
    const t = setTimeout(() => {
      signal?.removeEventListener('abort', done)
      resolve()
    }, ms)
    const done = () => {
      clearTimeout(t)
      resolve()
    }
    signal?.addEventListener('abort', done, { once: true })
  })
}

async function attempt(source: SourceSpec, opts: Required<Omit<HttpSourceOptions, 'delay'>>, outer?: AbortSignal): Promise<Uint8Array> {
  const ctrl = new AbortController()
  const onAbort = () => ctrl.abort()
  outer?.addEventListener('abort', onAbort, { once: true })
  const timer = setTimeout(() => ctrl.abort(), opts.timeoutMs)

  try {
    const res = await opts.fetchFn(source.locator, {
      signal: ctrl.signal,
      headers: { 'user-agent': opts.userAgent },
    })
    if (!res.ok) {
      throw new FetchError(source.id, `HTTP ${res.status} ${res.statusText}`.trim(), {
        retryable: isRetryableStatus(res.status),
      })
    }
    return new Uint8Array(await res.arrayBuffer())
  } catch (e) {
    if (e instanceof FetchError) throw e
    if (outer?.aborted) throw new FetchError(source.id, 'aborted', { cause: e })
    const reason = ctrl.signal.aborted ? `timed out after ${opts.timeoutMs}ms` : e instanceof Error ? e.message : String(e)
    throw new FetchError(source.id, reason, { cause: e, retryable: true })
  } finally {
    clearTimeout(timer)
    outer?.removeEventListener('abort', onAbort)
  }
}

export function httpSource(options: HttpSourceOptions = {}): SourceProvider {
  const opts = {
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    retries: Math.max(1, options.retries ?? DEFAULT_RETRIES),
    userAgent: options.userAgent ?? 'netrules',
    fetchFn: options.fetchFn ?? ((url, init) => fetch(url, init)),
  } satisfies Required<Omit<HttpSourceOptions, 'delay'>>
  const delay = options.delay ?? defaultDelay

  return {
    name: 'http',
    accepts: (locator) => hasScheme(locator, 'http', 'https'),
    async read(source: SourceSpec, { signal }: ReadOptions = {}) {
      let last: FetchError | undefined
      for (let n = 1; n <= opts.retries; n++) {
        try {
          return await attempt(source, opts, signal)
        } catch (e) {
          if (!(e instanceof FetchError)) throw e
          last = e
          if (!e.retryable || n === opts.retries) break
          await sleep(delay(n), signal)
        }
      }
      throw last ?? new FetchError(source.id, 'no attempts made')
    },
  }
}

export const httpProvider = httpSource()

export default httpProvider
