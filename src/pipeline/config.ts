import { DEFAULT_DENYLIST } from '../naming/denylist.js'
import type { ModuleNames } from '../codegen/module.js'

export interface PipelineConfig {
  names: ModuleNames
  denylist: readonly string[]
  /** Shown in the provenance header of both generated files */
  toolName: string
  regenerateCommand: string
}

export const DEFAULT_MODULE_NAMES: ModuleNames = {
  libs: 'Libs',
  versions: 'Versions',
  gradle: 'Gradle',
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  names: DEFAULT_MODULE_NAMES,
  denylist: DEFAULT_DENYLIST,
  toolName: 'buildsrc-libs',
  regenerateCommand: './gradlew syncLibs',
}
