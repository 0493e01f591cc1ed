import { existsSync, readFileSync } from 'node:fs'
import { join, resolve } from 'node:path'
import { MalformedReportError, SyncLibsOptionsError } from '../errors.js'
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from '../pipeline/config.js'
import { runPipeline, type PipelineResult } from '../pipeline/run.js'
import { checkModules, createBasicStructureIfNeeded, writeModules } from '../output/writer.js'
import { helpMessageAfter, helpMessageBefore, SCANNER_COMMAND, type RandomSource } from '../output/messages.js'
import { KOTLIN_FILE_EXTENSION } from '../codegen/module.js'
import { parseSyncLibsArgs, type SyncLibsOptions } from './options.js'

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>

export interface SyncLibsEnv {
  logger?: Logger
  random?: RandomSource
}

/** Parse command-line arguments and run. Bad options exit with 1 like every other failure. */
export function runSyncLibsCli(argv: readonly string[], env: SyncLibsEnv = {}): number {
  let options: SyncLibsOptions
  try {
    options = parseSyncLibsArgs(argv)
  } catch (err) {
    if (err instanceof SyncLibsOptionsError) {
      const logger = env.logger ?? console
      logger.error(`[sync-libs] ${err.message}`)
      return 1
    }
    throw err
  }
  return runSyncLibs(options, env)
}

/** Regenerate `Libs.kt` and `Versions.kt` from the report. Returns the process exit code. */
export function runSyncLibs(options: SyncLibsOptions, env: SyncLibsEnv = {}): number {
  const logger = env.logger ?? console
  const random = env.random ?? Math.random

  const projectDir = resolve(options.projectDir)
  const reportPath = resolve(projectDir, options.report)
  const outputDir = resolve(projectDir, options.outputDir)
  const libsPath = join(outputDir, `${options.libsName}${KOTLIN_FILE_EXTENSION}`)

  const config: PipelineConfig = {
    ...DEFAULT_PIPELINE_CONFIG,
    names: { ...DEFAULT_PIPELINE_CONFIG.names, libs: options.libsName, versions: options.versionsName },
  }

  if (!existsSync(reportPath)) {
    logger.error(`[sync-libs] Report not found: ${reportPath}`)
    logger.error(`[sync-libs] Run $ ${SCANNER_COMMAND} first`)
    return 1
  }

  const fileExisted = existsSync(libsPath)
  if (!options.check) logger.log(helpMessageBefore(reportPath))

  const result = readReport(reportPath, config, logger)
  if (result === undefined) return 1

  for (const warning of result.warnings) {
    logger.warn(`[sync-libs] ${warning.message}`)
  }

  if (options.check) {
    const drift = checkModules(result.modules, outputDir)
    for (const path of drift) logger.error(`[check] DRIFT: ${path}`)
    if (drift.length > 0) {
      logger.error(`\nGenerated files are out of date. Run $ ${config.regenerateCommand}`)
      return 1
    }
    logger.log('[check] Generated files are in sync.')
    return 0
  }

  for (const path of createBasicStructureIfNeeded(projectDir, outputDir)) {
    logger.log(`[scaffold] created ${path}`)
  }
  for (const file of writeModules(result.modules, outputDir)) {
    logger.log(`[write] ${file.existed ? 'updated' : 'created'} ${file.path}`)
  }

  logger.log(helpMessageAfter({
    fileExisted,
    outputPath: libsPath,
    dependencies: result.dependencies,
    random,
    libsName: options.libsName,
    regenerateCommand: config.regenerateCommand,
  }))
  return 0
}

function readReport(reportPath: string, config: PipelineConfig, logger: Logger): PipelineResult | undefined {
  try {
    return runPipeline(readFileSync(reportPath, 'utf-8'), config)
  } catch (err) {
    if (err instanceof MalformedReportError) {
      logger.error(`[sync-libs] ${reportPath}: ${err.message}`)
      return undefined
    }
    throw err
  }
}
