/**
 * Artifact names too generic to stand alone as `Libs.core`; these always
 * get their group prefix. Most come from the androidx migration table.
 */
export const DEFAULT_DENYLIST: readonly string[] = [
  'common',
  'core',
  'core-testing',
  'testing',
  'runtime',
  'extensions',
  'compiler',
  'migration',
  'db',
  'rules',
  'runner',
  'monitor',
  'loader',
  'media',
  'print',
  'io',
  'collection',
]
