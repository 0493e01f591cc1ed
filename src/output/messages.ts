import type { ResolvedDependency } from '../naming/resolve.js'

/** Returns a number in [0, 1), like Math.random */
export type RandomSource = () => number

export const SCANNER_COMMAND = './gradlew dependencyUpdates'
export const SCANNER_PLUGIN = 'com.github.ben-manes:gradle-versions-plugin'

export function pickRandom<T>(items: readonly T[], random: RandomSource): T | undefined {
  if (items.length === 0) return undefined
  const index = Math.min(Math.floor(random() * items.length), items.length - 1)
  return items[index]
}

export function helpMessageBefore(reportPath: string): string {
  return [
    `Done running $ ${SCANNER_COMMAND}   # ${SCANNER_PLUGIN}`,
    `Reading info about your dependencies from ${reportPath}`,
  ].join('\n')
}

export interface HelpMessageAfter {
  fileExisted: boolean
  outputPath: string
  dependencies: readonly ResolvedDependency[]
  random: RandomSource
  libsName: string
  regenerateCommand: string
}

export function helpMessageAfter(opts: HelpMessageAfter): string {
  const verb = opts.fileExisted ? 'Updated file' : 'Created file'
  const sample = pickRandom(opts.dependencies, opts.random)?.escapedName ?? 'xxx'

  return [
    `${verb} ${opts.outputPath}`,
    '',
    'It contains meta-data about all your dependencies, including available updates and links to the website',
    '',
    'Its content is available in all your build.gradle and build.gradle.kts',
    '',
    '// build.gradle or build.gradle.kts',
    'dependencies {',
    `   ${opts.libsName}.${sample}`,
    '}',
    '',
    'Run again the task any time you add a dependency or want to check for updates',
    `   $ ${opts.regenerateCommand}`,
  ].join('\n')
}
