import { parseReport } from '../report/parse.js'
import type { GradleConfig } from '../report/schema.js'
import { flattenReport, resolveNames, type ResolvedDependency } from '../naming/resolve.js'
import { generateModules, provenanceDoc, type GeneratedModules } from '../codegen/module.js'
import { EMPTY_INPUT, type PipelineWarning } from '../errors.js'
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from './config.js'

export interface PipelineResult {
  modules: GeneratedModules
  /** Resolved and sorted, in the order the constants were emitted */
  dependencies: ResolvedDependency[]
  gradle: GradleConfig
  warnings: PipelineWarning[]
}

/**
 * parse -> resolve names -> annotate -> generate.
 *
 * Throws MalformedReportError before anything is generated; otherwise both
 * modules are returned.
 */
export function runPipeline(reportText: string, config: PipelineConfig = DEFAULT_PIPELINE_CONFIG): PipelineResult {
  const graph = parseReport(reportText)
  const dependencies = resolveNames(flattenReport(graph), config.denylist)

  const warnings: PipelineWarning[] = []
  if (dependencies.length === 0) {
    warnings.push({
      code: EMPTY_INPUT,
      message: 'The report lists no dependencies; only the Gradle versions are generated',
    })
  }

  const modules = generateModules(dependencies, graph.gradle, {
    names: config.names,
    provenance: provenanceDoc(config.toolName, config.regenerateCommand),
  })

  return { modules, dependencies, gradle: graph.gradle, warnings }
}
