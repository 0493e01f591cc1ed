import type { GradleConfig } from '../report/schema.js'
import type { ResolvedDependency } from '../naming/resolve.js'
import { annotate } from '../status/rules.js'

/** Reference to a constant of another generated object, e.g. `Versions.okhttp` */
export interface ConstantReference {
  object: string
  constant: string
}

export type ConstantValue =
  | { kind: 'literal'; value: string }
  | { kind: 'concat'; prefix: string; reference: ConstantReference }

export interface ConstantSpec {
  name: string
  value: ConstantValue
  /** Documentation placed above the constant */
  doc?: string
  /** Trailing comment after the value */
  comment?: string
}

export interface ObjectSpec {
  name: string
  doc?: string
  constants: ConstantSpec[]
  nested: ObjectSpec[]
}

export interface GeneratedModule {
  name: string
  fileName: string
  object: ObjectSpec
}

export interface GeneratedModules {
  versions: GeneratedModule
  libs: GeneratedModule
}

export interface ModuleNames {
  libs: string
  versions: string
  gradle: string
}

export interface GenerateOptions {
  names: ModuleNames
  /** Documentation attached to both top-level objects */
  provenance: string
}

export const KOTLIN_FILE_EXTENSION = '.kt'

/** Header stating the file is generated and how to regenerate it */
export function provenanceDoc(toolName: string, command: string): string {
  return [
    `Generated by ${toolName}`,
    '',
    'Run again',
    `  \`$ ${command}\``,
    'to update this file',
  ].join('\n')
}

const literal = (name: string, value: string, comment?: string): ConstantSpec =>
  comment === undefined
    ? { name, value: { kind: 'literal', value } }
    : { name, value: { kind: 'literal', value }, comment }

export function generateModules(
  dependencies: readonly ResolvedDependency[],
  gradle: GradleConfig,
  options: GenerateOptions,
): GeneratedModules {
  const { names, provenance } = options

  const gradleObject: ObjectSpec = {
    name: names.gradle,
    constants: [
      literal('runningVersion', gradle.running.version),
      literal('currentVersion', gradle.current.version),
      literal('nightlyVersion', gradle.nightly.version),
      literal('releaseCandidate', gradle.releaseCandidate.version),
    ],
    nested: [],
  }

  const versions: ObjectSpec = {
    name: names.versions,
    doc: provenance,
    constants: dependencies.map((d) => literal(d.escapedName, d.version, annotate(d).text)),
    nested: [gradleObject],
  }

  const libs: ObjectSpec = {
    name: names.libs,
    doc: provenance,
    constants: dependencies.map((d) => {
      const constant: ConstantSpec = {
        name: d.escapedName,
        value: {
          kind: 'concat',
          prefix: `${d.group}:${d.name}:`,
          reference: { object: names.versions, constant: d.escapedName },
        },
      }
      if (d.projectUrl != null) constant.doc = `[${d.name} website](${d.projectUrl})`
      return constant
    }),
    nested: [],
  }

  return {
    versions: toModule(versions),
    libs: toModule(libs),
  }
}

function toModule(object: ObjectSpec): GeneratedModule {
  return { name: object.name, fileName: `${object.name}${KOTLIN_FILE_EXTENSION}`, object }
}

/** Number of constants in an object, nested objects included */
export function countConstants(object: ObjectSpec): number {
  return object.nested.reduce((n, child) => n + countConstants(child), object.constants.length)
}
