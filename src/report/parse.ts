import { Value } from '@sinclair/typebox/value'
import { MalformedReportError } from '../errors.js'
import {
  DependencyReport,
  type AvailableDependency,
  type Dependency,
  type DependencyBucket,
  type DependencyGraph,
  type GradleConfig,
} from './schema.js'

const MAX_ISSUES = 10

/** Parse the JSON text of a report. Throws MalformedReportError. */
export function parseReport(text: string): DependencyGraph {
  let value: unknown
  try {
    value = JSON.parse(text)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new MalformedReportError(`Report is not valid JSON: ${reason}`)
  }
  return validateReport(value)
}

/** Check an already-decoded report against the schema and normalize it. */
export function validateReport(value: unknown): DependencyGraph {
  if (!Value.Check(DependencyReport, value)) {
    const issues: string[] = []
    for (const error of Value.Errors(DependencyReport, value)) {
      issues.push(`${error.path || '/'}: ${error.message}`)
      if (issues.length >= MAX_ISSUES) break
    }
    throw new MalformedReportError('Report does not match the expected structure', issues)
  }

  return {
    current: bucket(value.current),
    exceeded: bucket(value.exceeded),
    outdated: bucket(value.outdated),
    gradle: gradleConfig(value.gradle),
  }
}

function bucket(raw: DependencyBucket | undefined): Dependency[] {
  if (raw === undefined) return []
  const list = Array.isArray(raw) ? raw : raw.dependencies
  return list.map(dependency)
}

function dependency(raw: Dependency): Dependency {
  const d: Dependency = { group: raw.group, name: raw.name, version: raw.version }
  if (raw.latest != null) d.latest = raw.latest
  if (raw.reason != null) d.reason = raw.reason
  if (raw.available != null) d.available = available(raw.available)
  if (raw.projectUrl != null) d.projectUrl = raw.projectUrl
  return d
}

function available(raw: AvailableDependency): AvailableDependency {
  const a: AvailableDependency = {}
  if (raw.release != null) a.release = raw.release
  if (raw.milestone != null) a.milestone = raw.milestone
  if (raw.integration != null) a.integration = raw.integration
  return a
}

function gradleConfig(raw: GradleConfig): GradleConfig {
  return {
    running: { version: raw.running.version },
    current: { version: raw.current.version },
    nightly: { version: raw.nightly.version },
    releaseCandidate: { version: raw.releaseCandidate.version },
  }
}
