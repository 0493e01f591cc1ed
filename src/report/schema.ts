import { Type, Static, TSchema } from '@sinclair/typebox'

/** The checker writes `null` for absent values */
const Nullable = <T extends TSchema>(schema: T) =>
  Type.Optional(Type.Union([schema, Type.Null()]))

export const AvailableDependency = Type.Object({
  release: Nullable(Type.String()),
  milestone: Nullable(Type.String()),
  integration: Nullable(Type.String()),
}, { $id: 'AvailableDependency', description: 'Newer versions found per release channel' })

export type AvailableDependency = Static<typeof AvailableDependency>

export const Dependency = Type.Object({
  group: Type.String({ minLength: 1 }),
  name: Type.String({ minLength: 1 }),
  version: Type.String(),
  latest: Nullable(Type.String()),
  reason: Nullable(Type.String()),
  available: Nullable(AvailableDependency),
  projectUrl: Nullable(Type.String()),
}, { $id: 'Dependency', description: 'One module coordinate as reported by the update checker' })

export type Dependency = Static<typeof Dependency>

/**
 * A bucket is either a bare list or the checker's own envelope:
 * `{ "dependencies": [...], "count": 3 }`.
 */
export const DependencyBucket = Type.Union([
  Type.Array(Dependency),
  Type.Object({
    dependencies: Type.Array(Dependency),
    count: Type.Optional(Type.Integer({ minimum: 0 })),
  }),
], { $id: 'DependencyBucket' })

export type DependencyBucket = Static<typeof DependencyBucket>

export const GradleChannel = Type.Object({
  version: Type.String(),
}, { $id: 'GradleChannel' })

export type GradleChannel = Static<typeof GradleChannel>

export const GradleConfig = Type.Object({
  running: GradleChannel,
  current: GradleChannel,
  nightly: GradleChannel,
  releaseCandidate: GradleChannel,
}, { $id: 'GradleConfig', description: 'Versions of the build tool itself' })

export type GradleConfig = Static<typeof GradleConfig>

/** Wire format of `build/dependencyUpdates/report.json` */
export const DependencyReport = Type.Object({
  current: Type.Optional(DependencyBucket),
  exceeded: Type.Optional(DependencyBucket),
  outdated: Type.Optional(DependencyBucket),
  gradle: GradleConfig,
}, { $id: 'DependencyReport', description: 'Dependency update report (JSON reporter output).' })

export type DependencyReport = Static<typeof DependencyReport>

/** Normalized report: buckets flattened to lists, nulls and unknown fields dropped */
export interface DependencyGraph {
  current: Dependency[]
  exceeded: Dependency[]
  outdated: Dependency[]
  gradle: GradleConfig
}
