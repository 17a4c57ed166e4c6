export { classifyLine, classifyLines, isHostname } from './classify'
export type { ClassifyOptions, ClassifyResult } from './classify'
export { resolveTag } from './tags'
export type { TagTarget } from './tags'
