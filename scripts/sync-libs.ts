#!/usr/bin/env node
/**
 * Regenerates buildSrc/src/main/java/{Libs,Versions}.kt from the
 * dependencyUpdates report.
 *
 * Run from the Gradle project root, after `./gradlew dependencyUpdates`:
 *   npx tsx scripts/sync-libs.ts
 *
 * Or with explicit paths:
 *   npx tsx scripts/sync-libs.ts --project-dir ../app --report build/dependencyUpdates/report.json
 *
 * With --check nothing is written; exits non-zero when the files are stale.
 */

import { runSyncLibsCli } from '../src/cli/index.js'

process.exitCode = runSyncLibsCli(process.argv.slice(2))
