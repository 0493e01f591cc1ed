/**
 * The report could not be read: not JSON, or missing required structure.
 * Fatal for a pipeline run; nothing is generated.
 */
export class MalformedReportError extends Error {
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  ${issues.join('\n  ')}` : message)
    this.name = 'MalformedReportError'
    this.issues = issues
  }
}

/** Command-line options that fail validation */
export class SyncLibsOptionsError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid options:\n  ${issues.join('\n  ')}`)
    this.name = 'SyncLibsOptionsError'
    this.issues = issues
  }
}

export const EMPTY_INPUT = 'EMPTY_INPUT' as const

/** Non-fatal: the report listed no dependencies. Both modules are still generated. */
export interface EmptyInputWarning {
  code: typeof EMPTY_INPUT
  message: string
}

export type PipelineWarning = EmptyInputWarning
