export * from './types'
export * from './errors'
export type { Logger } from './logger'
export { silentLogger } from './logger'
export { canonicalCidr, formatIPv6, looksLikeAddress, parseIPv4, parseIPv6 } from './lib/cidr'
export type { CanonicalCidr, CidrKind } from './lib/cidr'
export * from './parse'
export * from './classify'
export * from './aggregate'
export * from './fingerprint'
export * from './render'
export * from './pipeline'
