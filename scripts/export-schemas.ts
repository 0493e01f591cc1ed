/**
 * Exports the report TypeBox schemas to JSON Schema files in schemas/.
 * Schemas with $id use that as filename; others use the export name.
 * Run via: npm run schemas
 */
import { writeFileSync, mkdirSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { Kind } from '@sinclair/typebox'

import * as report from '../src/report/schema.js'

const __dirname = dirname(fileURLToPath(import.meta.url))
const SCHEMAS_DIR = join(__dirname, '..', 'schemas')

let exportedCount = 0

for (const [exportName, schema] of Object.entries(report)) {
  // Skip exports that are not TypeBox schemas
  if (!schema || typeof schema !== 'object' || Array.isArray(schema) || !(Kind in schema)) {
    continue
  }

  const id = '$id' in schema && typeof schema.$id === 'string' ? schema.$id : exportName
  const outPath = join(SCHEMAS_DIR, 'report', `${id}.json`)
  mkdirSync(dirname(outPath), { recursive: true })
  writeFileSync(outPath, JSON.stringify({ ...schema, $id: id }, null, 2) + '\n')
  exportedCount++
}

console.log(`Exported ${exportedCount} schemas to ${SCHEMAS_DIR}`)
