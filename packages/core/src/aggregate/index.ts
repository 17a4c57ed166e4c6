export { aggregate, compareEntries, entryKey, RuleSetBuilder } from './builder'
export type { AggregateStats } from './builder'
