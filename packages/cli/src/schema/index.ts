import Ajv2020 from 'ajv/dist/2020.js'
import type { ErrorObject } from 'ajv'
import addFormats from 'ajv-formats'

import type { NetrulesRc } from '../config/config'
import type { ManifestFile } from '../build/manifest'
import manifestSchema from './manifest.schema.json'
import rcSchema from './rc.schema.json'

const ajv = new Ajv2020({
  allErrors: true,
  strict: false,
  validateSchema: false,
})
addFormats(ajv)

export const validateManifest = ajv.compile<ManifestFile>(manifestSchema)
export const validateRc = ajv.compile<NetrulesRc>(rcSchema)

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? []).map(err => `- ${err.instancePath || '(root)'} ${err.message ?? 'is invalid'}`).join('\n')
}
