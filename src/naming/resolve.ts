import type { Dependency, DependencyGraph } from '../report/schema.js'
import { qualifiedKey, shortKey } from './escape.js'
import { DEFAULT_DENYLIST } from './denylist.js'

export interface ResolvedDependency extends Readonly<Dependency> {
  /** Constant name shared by the Versions and Libs entries */
  readonly escapedName: string
}

/** All buckets as one sequence: current, exceeded, outdated. */
export function flattenReport(graph: DependencyGraph): Dependency[] {
  return [...graph.current, ...graph.exceeded, ...graph.outdated]
}

/**
 * Assign every dependency a constant name.
 *
 * The short form (`escapeName(name)`) is used unless the denylist holds it
 * verbatim or another entry shares it; then every entry sharing it falls
 * back to the qualified form (`escapeName(group_name)`). The result is deduplicated by
 * name, first occurrence kept, and sorted.
 *
 * Qualified names are not re-checked: two entries with the same group and
 * name end up under one constant and only the first survives.
 */
export function resolveNames(
  dependencies: readonly Dependency[],
  denylist: readonly string[] = DEFAULT_DENYLIST,
): ResolvedDependency[] {
  const denied = new Set(denylist)
  const names: string[] = []
  const claimedBy = new Map<string, number>()

  dependencies.forEach((d, i) => {
    const key = shortKey(d)
    const claimant = claimedBy.get(key)
    if (denied.has(key)) {
      names[i] = qualifiedKey(d)
    } else if (claimant !== undefined) {
      names[i] = qualifiedKey(d)
      names[claimant] = qualifiedKey(dependencies[claimant])
    } else {
      claimedBy.set(key, i)
      names[i] = key
    }
  })

  const seen = new Set<string>()
  const resolved: ResolvedDependency[] = []
  dependencies.forEach((d, i) => {
    const escapedName = names[i]
    if (seen.has(escapedName)) return
    seen.add(escapedName)
    resolved.push({ ...d, escapedName })
  })

  return resolved.sort((a, b) => compareNames(a.escapedName, b.escapedName))
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}
