import type { RuleKind } from '../types'

export type CidrKind = Extract<RuleKind, 'ip_cidr' | 'ip_cidr6'>

export interface CanonicalCidr {
  kind: CidrKind
  value: string
}

const V4_OCTET = /^(0|[1-9]\d{0,2})$/
const V6_GROUP = /^[0-9a-f]{1,4}$/i
const MASK = /^(0|[1-9]\d{0,2})$/

export function parseIPv4(s: string): number[] | null {
  const parts = s.split('.')
  if (parts.length !== 4) return null
  const out: number[] = []
  for (const p of parts) {
    if (!V4_OCTET.test(p)) return null
    const n = Number(p)
    if (n > 255) return null
    out.push(n)
  }
  return out
}

function parseV6Groups(parts: string[], allowV4Tail: boolean): number[] | null {
  const out: number[] = []
  for (let i = 0; i < parts.length; i++) {
    const p = parts[i] ?? ''
    if (allowV4Tail && i === parts.length - 1 && p.includes('.')) {
      const v4 = parseIPv4(p)
      if (!v4) return null
      const [a = 0, b = 0, c = 0, d = 0] = v4
      out.push((a << 8) | b, (c << 8) | d)
      continue
    }
    if (!V6_GROUP.test(p)) return null
    out.push(parseInt(p, 16))
  }
  return out
}

/** 8 × 16-bit words, or null. Zone ids (`%eth0`) are not accepted. */
export function parseIPv6(s: string): number[] | null {
  if (!s.includes(':')) return null
  const dbl = s.indexOf('::')
  if (dbl !== s.lastIndexOf('::')) return null

  if (dbl < 0) {
    const words = parseV6Groups(s.split(':'), true)
    return words && words.length === 8 ? words : null
  }

  const headRaw = s.slice(0, dbl)
  const tailRaw = s.slice(dbl + 2)
  const head = parseV6Groups(headRaw ? headRaw.split(':') : [], false)
  const tail = parseV6Groups(tailRaw ? tailRaw.split(':') : [], true)
  if (!head || !tail) return null
  if (head.length + tail.length > 7) return null

  const zeros = new Array<number>(8 - head.length - tail.length).fill(0)
  return [...head, ...zeros, ...tail]
}

/** RFC 5952: lower-case hex, longest zero run (first on tie, length ≥ 2) compressed */
export function formatIPv6(words: number[]): string {
  let bestStart = -1
  let bestLen = 0
  let curStart = -1
  let curLen = 0
  for (let i = 0; i < words.length; i++) {
    if (words[i] === 0) {
      if (curStart < 0) {
        curStart = i
        curLen = 0
      }
      curLen++
      if (curLen > bestLen) {
        bestLen = curLen
        bestStart = curStart
      }
    } else {
      curStart = -1
    }
  }

  const hex = (ws: number[]) => ws.map(w => w.toString(16)).join(':')
  if (bestLen < 2) return hex(words)
  return `${hex(words.slice(0, bestStart))}::${hex(words.slice(bestStart + bestLen))}`
}

function maskWords(words: number[], width: number, prefix: number): number[] {
  const full = (1 << width) - 1
  return words.map((w, i) => {
    const bits = Math.min(Math.max(prefix - width * i, 0), width)
    return w & ((full << (width - bits)) & full)
  })
}

/** Text that can only be meant as an address (so a parse failure is an error, not a hostname) */
export function looksLikeAddress(text: string): boolean {
  if (/^[0-9.]+(\/[0-9]*)?$/.test(text)) return true
  return text.includes(':') && /^[0-9a-f:.]+(\/[0-9]*)?$/i.test(text)
}

/**
 * Canonical network prefix for an address or CIDR, host bits cleared.
 * A bare address becomes /32 or /128.
 */
export function canonicalCidr(text: string): CanonicalCidr | null {
  const slash = text.indexOf('/')
  const addr = slash >= 0 ? text.slice(0, slash) : text
  const maskRaw = slash >= 0 ? text.slice(slash + 1) : undefined
  if (maskRaw !== undefined && !MASK.test(maskRaw)) return null

  const v4 = parseIPv4(addr)
  if (v4) {
    const prefix = maskRaw === undefined ? 32 : Number(maskRaw)
    if (prefix > 32) return null
    return { kind: 'ip_cidr', value: `${maskWords(v4, 8, prefix).join('.')}/${prefix}` }
  }

  const v6 = parseIPv6(addr)
  if (v6) {
    const prefix = maskRaw === undefined ? 128 : Number(maskRaw)
    if (prefix > 128) return null
    return { kind: 'ip_cidr6', value: `${formatIPv6(maskWords(v6, 16, prefix))}/${prefix}` }
  }

  return null
}
