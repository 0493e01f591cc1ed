import type { AvailableDependency, Dependency } from '../report/schema.js'

export type DependencyStatus = 'exceeded' | 'rejected' | 'outdated' | 'up-to-date'

export interface StatusAnnotation {
  status: DependencyStatus
  /** Comment text, without comment delimiters. May span several lines. */
  text: string
}

export interface StatusRule {
  status: DependencyStatus
  matches: (d: Dependency) => boolean
  format: (d: Dependency) => string
}

export const MAX_REASON_LINES = 4
export const TRUNCATION_MARKER = '....'

const isPresent = (s: string | null | undefined): s is string =>
  s != null && s.trim() !== ''

/** Evaluated in order; the first match wins. */
export const STATUS_RULES: readonly StatusRule[] = [
  {
    status: 'exceeded',
    matches: (d) => isPresent(d.latest),
    format: (d) => `exceeds the version found: ${d.latest ?? ''}`,
  },
  {
    status: 'rejected',
    matches: (d) => isPresent(d.reason),
    format: (d) => `error: ${shortenReason(d.reason ?? '')}`,
  },
  {
    status: 'outdated',
    matches: (d) => d.available != null,
    format: (d) => describeAvailable(d.available ?? {}),
  },
]

const UP_TO_DATE: StatusAnnotation = { status: 'up-to-date', text: 'up-to-date' }

export function annotate(d: Dependency, rules: readonly StatusRule[] = STATUS_RULES): StatusAnnotation {
  const rule = rules.find((r) => r.matches(d))
  return rule ? { status: rule.status, text: rule.format(d) } : UP_TO_DATE
}

export function shortenReason(reason: string): string {
  const lines = reason.split(/\r\n|\r|\n/)
  if (lines.length <= MAX_REASON_LINES) return lines.join('\n')
  return [...lines.slice(0, MAX_REASON_LINES), TRUNCATION_MARKER].join('\n')
}

export function describeAvailable(available: AvailableDependency): string {
  if (isPresent(available.release)) return `available: release=${available.release}`
  if (isPresent(available.milestone)) return `available: milestone=${available.milestone}`
  if (isPresent(available.integration)) return `available: integration=${available.integration}`
  return `available: ${JSON.stringify(available)}`
}
