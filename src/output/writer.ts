import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import type { GeneratedModule, GeneratedModules } from '../codegen/module.js'
import { renderKotlinFile } from '../codegen/kotlin.js'

export const BUILD_SRC_SCRIPT = join('buildSrc', 'build.gradle.kts')

export const INITIAL_BUILD_GRADLE_KTS = `plugins {
    \`kotlin-dsl\`
}
repositories {
    jcenter()
}
`

export interface WrittenFile {
  path: string
  existed: boolean
}

const ordered = (modules: GeneratedModules): GeneratedModule[] => [modules.libs, modules.versions]

/** Render both modules and write them as `<outputDir>/<Name>.kt`. */
export function writeModules(modules: GeneratedModules, outputDir: string): WrittenFile[] {
  // both files are rendered before either is written
  const rendered = ordered(modules).map((module) => ({
    path: join(outputDir, module.fileName),
    text: renderKotlinFile(module),
  }))
  mkdirSync(outputDir, { recursive: true })
  return rendered.map(({ path, text }) => {
    const existed = existsSync(path)
    writeFileSync(path, text)
    return { path, existed }
  })
}

/** Paths whose content differs from what writeModules would write (missing files included). */
export function checkModules(modules: GeneratedModules, outputDir: string): string[] {
  const drift: string[] = []
  for (const module of ordered(modules)) {
    const path = join(outputDir, module.fileName)
    if (!existsSync(path) || readFileSync(path, 'utf-8') !== renderKotlinFile(module)) {
      drift.push(path)
    }
  }
  return drift
}

/**
 * Make sure `buildSrc` can compile the generated files: create the output
 * directory and a minimal `buildSrc/build.gradle.kts`. Existing files are
 * left alone. Returns what was created.
 */
export function createBasicStructureIfNeeded(projectDir: string, outputDir: string): string[] {
  const created: string[] = []
  if (!existsSync(outputDir)) {
    mkdirSync(outputDir, { recursive: true })
    created.push(outputDir)
  }
  const script = join(projectDir, BUILD_SRC_SCRIPT)
  if (!existsSync(script)) {
    mkdirSync(join(projectDir, 'buildSrc'), { recursive: true })
    writeFileSync(script, INITIAL_BUILD_GRADLE_KTS)
    created.push(script)
  }
  return created
}
