import { z } from 'zod'
import { SyncLibsOptionsError } from '../errors.js'

const kotlinName = z
  .string()
  .regex(/^[A-Z][A-Za-z0-9_]*$/, 'must be a capitalized Kotlin identifier')

export const SyncLibsOptions = z.object({
  report: z.string().min(1).default('build/dependencyUpdates/report.json')
    .describe('Path of the dependencyUpdates JSON report, relative to the project'),
  projectDir: z.string().min(1).default('.')
    .describe('Root of the Gradle project'),
  outputDir: z.string().min(1).default('buildSrc/src/main/java')
    .describe('Directory receiving the generated .kt files, relative to the project'),
  libsName: kotlinName.default('Libs'),
  versionsName: kotlinName.default('Versions'),
  check: z.boolean().default(false)
    .describe('Only compare the generated files with what is on disk'),
}).refine((o) => o.libsName !== o.versionsName, {
  message: 'libs and versions objects need different names',
  path: ['versionsName'],
})

export type SyncLibsOptions = z.infer<typeof SyncLibsOptions>

const VALUE_FLAGS: Record<string, 'report' | 'projectDir' | 'outputDir' | 'libsName' | 'versionsName'> = {
  '--report': 'report',
  '--project-dir': 'projectDir',
  '--output-dir': 'outputDir',
  '--libs-name': 'libsName',
  '--versions-name': 'versionsName',
}

/** `--flag value` / `--flag=value` arguments into validated options. Throws SyncLibsOptionsError. */
export function parseSyncLibsArgs(argv: readonly string[]): SyncLibsOptions {
  const raw: z.input<typeof SyncLibsOptions> = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    const eq = token.indexOf('=')
    const flag = eq > 0 ? token.slice(0, eq) : token

    if (flag === '--check') {
      if (eq > 0) throw new SyncLibsOptionsError([`${flag}: takes no value`])
      raw.check = true
      continue
    }

    const key = VALUE_FLAGS[flag]
    if (key === undefined) throw new SyncLibsOptionsError([`${token}: unknown option`])

    let value: string | undefined
    if (eq > 0) {
      value = token.slice(eq + 1)
    } else {
      value = argv[i + 1]
      i++
    }
    if (value === undefined || value.startsWith('--')) {
      throw new SyncLibsOptionsError([`${flag}: missing value`])
    }
    raw[key] = value
  }

  const parsed = SyncLibsOptions.safeParse(raw)
  if (!parsed.success) {
    throw new SyncLibsOptionsError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(options)'}: ${issue.message}`),
    )
  }
  return parsed.data
}
