export type ErrorCode =
  | 'E_FETCH'
  | 'E_PARSE'
  | 'E_CLASSIFY'
  | 'E_EMIT'
  | 'E_COMPILE'
  | 'E_CONFIG'
  | 'E_ABORTED'

export class NetrulesError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'NetrulesError'
    this.code = code
  }
}

/** Source could not be retrieved. `retryable` marks network/timeout style failures. */
export class FetchError extends NetrulesError {
  readonly sourceId: string
  readonly retryable: boolean

  constructor(sourceId: string, message: string, opts: { retryable?: boolean; cause?: unknown } = {}) {
    super('E_FETCH', `[fetch] ${sourceId}: ${message}`, { cause: opts.cause })
    this.name = 'FetchError'
    this.sourceId = sourceId
    this.retryable = opts.retryable ?? false
  }
}

/** Malformed source structure. Fatal for the source (and its group). */
export class ParseError extends NetrulesError {
  readonly sourceId: string
  readonly line?: number
  readonly key?: string

  constructor(sourceId: string, message: string, where: { line?: number; key?: string } = {}) {
    const at = [
      where.line !== undefined ? `line ${where.line}` : '',
      where.key !== undefined ? `key "${where.key}"` : '',
    ].filter(Boolean).join(', ')
    super('E_PARSE', `[parse] ${sourceId}${at ? ` (${at})` : ''}: ${message}`)
    this.name = 'ParseError'
    this.sourceId = sourceId
    this.line = where.line
    this.key = where.key
  }
}

/** A single unrecognized line. Recoverable: the line is skipped with a warning. */
export class ClassificationError extends NetrulesError {
  readonly sourceId: string
  readonly line: number
  readonly token: string

  constructor(sourceId: string, line: number, token: string, reason: string) {
    super('E_CLASSIFY', `[classify] ${sourceId}:${line}: ${reason}: "${token}"`)
    this.name = 'ClassificationError'
    this.sourceId = sourceId
    this.line = line
    this.token = token
  }
}

/** Writing an artifact failed. Fatal for the group. */
export class EmissionError extends NetrulesError {
  readonly group: string

  constructor(group: string, message: string, opts: { cause?: unknown; code?: 'E_EMIT' | 'E_COMPILE' } = {}) {
    super(opts.code ?? 'E_EMIT', `[emit] ${group}: ${message}`, { cause: opts.cause })
    this.name = 'EmissionError'
    this.group = group
  }
}

/** External compiler exited non-zero or produced no output. */
export class CompileError extends EmissionError {
  constructor(group: string, message: string, opts: { cause?: unknown } = {}) {
    super(group, message, { cause: opts.cause, code: 'E_COMPILE' })
    this.name = 'CompileError'
  }
}

export class ConfigError extends NetrulesError {
  constructor(message: string) {
    super('E_CONFIG', `[config] ${message}`)
    this.name = 'ConfigError'
  }
}

export class AbortedError extends NetrulesError {
  constructor(message = 'aborted') {
    super('E_ABORTED', message)
    this.name = 'AbortedError'
  }
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message
  return String(e)
}
