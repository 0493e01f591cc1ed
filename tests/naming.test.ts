import { describe, it, expect } from 'vitest'
import {
  DEFAULT_DENYLIST,
  escapeName,
  flattenReport,
  qualifiedKey,
  resolveNames,
  shortKey,
  type Dependency,
} from '../src/index.js'

const dep = (group: string, name: string, version = '1.0'): Dependency => ({ group, name, version })

const names = (deps: Dependency[], denylist?: readonly string[]) =>
  resolveNames(deps, denylist).map((d) => d.escapedName)

describe('escapeName', () => {
  it('lowercases and replaces - . and :', () => {
    expect(escapeName('Kotlin-Stdlib.JDK8:all')).toBe('kotlin_stdlib_jdk8_all')
  })

  it('passes other characters through', () => {
    expect(escapeName('okhttp+mockwebserver_2')).toBe('okhttp+mockwebserver_2')
  })

  it('builds short and qualified keys', () => {
    const d = dep('org.jetbrains.kotlin', 'kotlin-stdlib')
    expect(shortKey(d)).toBe('kotlin_stdlib')
    expect(qualifiedKey(d)).toBe('org_jetbrains_kotlin_kotlin_stdlib')
  })
})

describe('resolveNames', () => {
  it('uses the short name when it is unique', () => {
    expect(names([dep('com.squareup.okhttp3', 'okhttp'), dep('com.squareup.moshi', 'moshi')]))
      .toEqual(['moshi', 'okhttp'])
  })

  it('qualifies denylisted names', () => {
    expect(names([dep('org.example', 'core')])).toEqual(['org_example_core'])
  })

  it('compares the short key against denylist entries verbatim', () => {
    expect(DEFAULT_DENYLIST).toContain('core-testing')
    expect(names([dep('androidx.arch.core', 'core-testing')])).toEqual(['core_testing'])
    expect(names([dep('androidx.arch.core', 'core-testing')], ['core_testing']))
      .toEqual(['androidx_arch_core_core_testing'])
  })

  it('takes the denylist from the caller', () => {
    expect(names([dep('org.example', 'core')], [])).toEqual(['core'])
    expect(names([dep('com.squareup.okhttp3', 'okhttp')], ['okhttp'])).toEqual(['com_squareup_okhttp3_okhttp'])
  })

  it('qualifies both sides of a collision', () => {
    const resolved = resolveNames([dep('a', 'lib', '1.0'), dep('b', 'lib', '2.0')])
    expect(resolved.map((d) => [d.escapedName, d.version])).toEqual([
      ['a_lib', '1.0'],
      ['b_lib', '2.0'],
    ])
  })

  it('qualifies every member of a three-way collision', () => {
    expect(names([dep('c', 'lib'), dep('a', 'lib'), dep('b', 'lib')])).toEqual(['a_lib', 'b_lib', 'c_lib'])
  })

  it('treats names differing only by case or separators as a collision', () => {
    expect(names([dep('x', 'Json-Api'), dep('y', 'json.api')])).toEqual(['x_json_api', 'y_json_api'])
  })

  it('leaves unrelated entries on their short name', () => {
    expect(names([dep('a', 'lib'), dep('org.test', 'widget'), dep('b', 'lib')]))
      .toEqual(['a_lib', 'b_lib', 'widget'])
  })

  it('does not mutate its input', () => {
    const input = [dep('a', 'lib'), dep('b', 'lib')]
    resolveNames(input)
    expect(input).toEqual([dep('a', 'lib'), dep('b', 'lib')])
  })

  it('sorts by code unit order', () => {
    expect(names([dep('g', 'b'), dep('g', 'a_b'), dep('g', 'B2'), dep('g', '_x')]))
      .toEqual(['_x', 'a_b', 'b', 'b2'])
  })

  // Known limitation: qualified names are not checked again
  it('keeps only the first entry when qualified names collide', () => {
    const resolved = resolveNames([dep('com.example', 'lib', '1.0'), dep('com.example', 'lib', '2.0')])
    expect(resolved).toEqual([
      { group: 'com.example', name: 'lib', version: '1.0', escapedName: 'com_example_lib' },
    ])
  })

  it('keeps only the first entry when a qualified name equals another short name', () => {
    const resolved = resolveNames([dep('a', 'b'), dep('z', 'b'), dep('x', 'a-b')])
    expect(resolved.map((d) => `${d.group}:${d.name} -> ${d.escapedName}`)).toEqual([
      'a:b -> a_b',
      'z:b -> z_b',
    ])
  })
})

describe('flattenReport', () => {
  it('concatenates current, exceeded and outdated in that order', () => {
    const gradle = {
      running: { version: '1' },
      current: { version: '1' },
      nightly: { version: '1' },
      releaseCandidate: { version: '1' },
    }
    const flat = flattenReport({
      current: [dep('a', 'current')],
      exceeded: [dep('a', 'exceeded')],
      outdated: [dep('a', 'outdated')],
      gradle,
    })
    expect(flat.map((d) => d.name)).toEqual(['current', 'exceeded', 'outdated'])
  })
})
