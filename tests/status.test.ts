import { describe, it, expect } from 'vitest'
import {
  annotate,
  describeAvailable,
  shortenReason,
  STATUS_RULES,
  type Dependency,
  type StatusRule,
} from '../src/index.js'

const base: Dependency = { group: 'org.test', name: 'widget', version: '1.0' }

describe('annotate', () => {
  it('reports up-to-date when nothing else applies', () => {
    expect(annotate(base)).toEqual({ status: 'up-to-date', text: 'up-to-date' })
  })

  it('prefers latest over available', () => {
    const d = { ...base, latest: '0.9', available: { release: '1.1' } }
    expect(annotate(d)).toEqual({ status: 'exceeded', text: 'exceeds the version found: 0.9' })
  })

  it('prefers latest over reason', () => {
    expect(annotate({ ...base, latest: '0.9', reason: 'not found' }).status).toBe('exceeded')
  })

  it('ignores a blank latest', () => {
    const d = { ...base, latest: '  ', reason: 'Could not resolve' }
    expect(annotate(d)).toEqual({ status: 'rejected', text: 'error: Could not resolve' })
  })

  it('prefers reason over available', () => {
    const d = { ...base, reason: 'rejected by rule', available: { release: '1.1' } }
    expect(annotate(d).status).toBe('rejected')
  })

  it('keeps the first four lines of a long reason', () => {
    const d = { ...base, reason: 'forbidden by policy\nline2\nline3\nline4\nline5' }
    expect(annotate(d).text).toBe('error: forbidden by policy\nline2\nline3\nline4\n....')
  })

  it('reports the available release', () => {
    expect(annotate({ ...base, available: { release: '1.1', milestone: '2.0-M1' } }))
      .toEqual({ status: 'outdated', text: 'available: release=1.1' })
  })

  it('accepts rules from the caller', () => {
    const rules: StatusRule[] = [
      { status: 'rejected', matches: (d) => d.name === 'widget', format: () => 'custom' },
      ...STATUS_RULES,
    ]
    expect(annotate(base, rules)).toEqual({ status: 'rejected', text: 'custom' })
  })
})

describe('shortenReason', () => {
  it('leaves short reasons alone', () => {
    expect(shortenReason('a\nb')).toBe('a\nb')
    expect(shortenReason('1\n2\n3\n4')).toBe('1\n2\n3\n4')
  })

  it('normalizes CRLF line endings', () => {
    expect(shortenReason('a\r\nb')).toBe('a\nb')
  })

  it('treats a lone carriage return as a line break', () => {
    expect(shortenReason('bad\rval x = 1')).toBe('bad\nval x = 1')
    expect(shortenReason('1\r2\r3\r4\r5')).toBe('1\n2\n3\n4\n....')
  })
})

describe('describeAvailable', () => {
  it('falls back from release to milestone to integration', () => {
    expect(describeAvailable({ release: '', milestone: '2.0-M1' })).toBe('available: milestone=2.0-M1')
    expect(describeAvailable({ integration: '2.0-SNAPSHOT' })).toBe('available: integration=2.0-SNAPSHOT')
  })

  it('dumps the object when no channel has a version', () => {
    expect(describeAvailable({})).toBe('available: {}')
    expect(describeAvailable({ release: ' ' })).toBe('available: {"release":" "}')
  })
})
