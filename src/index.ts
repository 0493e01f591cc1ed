/**
 * buildsrc-libs — typed Kotlin constants from a dependency update report
 *
 * Reads the JSON report of `./gradlew dependencyUpdates` and generates
 * `Libs.kt` and `Versions.kt` for buildSrc, so build scripts write
 * `Libs.okhttp` instead of `"com.squareup.okhttp3:okhttp:3.12.0"`.
 *
 * Subpath imports available:
 *   import { parseReport } from 'buildsrc-libs/report'
 *   import { resolveNames } from 'buildsrc-libs/naming'
 *   import { annotate } from 'buildsrc-libs/status'
 *   import { generateModules, renderKotlinFile } from 'buildsrc-libs/codegen'
 *   import { runPipeline } from 'buildsrc-libs/pipeline'
 */

export * from './errors.js'
export * from './report/index.js'
export * from './naming/index.js'
export * from './status/index.js'
export * from './codegen/index.js'
export * from './pipeline/index.js'
export * from './output/index.js'
export * from './cli/index.js'
