export function splitLines(text: string): string[] {
  return text.replace(/^\uFEFF/, '').split(/\r?\n/)
}

/** blank or a whole-line `#` comment */
export function isSkippableLine(line: string): boolean {
  const t = line.trim()
  return !t || t.startsWith('#')
}

const TAGGED_COMMA = /^([A-Za-z][A-Za-z0-9-]*)\s*,\s*([^,]*)/
const TAGGED_SPACE = /^([A-Za-z][A-Za-z0-9-]*)\s+([^\s#]+)/

/**
 * `DOMAIN-SUFFIX,example.com,Proxy` → tag + value; trailing fields
 * (policy, no-resolve) are dropped. Text without a `TYPE,` head is returned untagged.
 * A tag never contains dots or colons, so hosts and addresses stay untagged.
 */
export function splitTagged(text: string): { tag?: string; text: string } {
  const t = text.trim()
  const m = t.match(TAGGED_COMMA) ?? t.match(TAGGED_SPACE)
  if (!m || m[1] === undefined || m[2] === undefined) return { text: t }
  return { tag: m[1], text: m[2].trim() }
}
