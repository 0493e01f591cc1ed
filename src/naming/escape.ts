const ESCAPED_CHARS = new Set(['-', '.', ':'])

/** Lowercase and replace `-`, `.` and `:` with `_`. Everything else passes through. */
export function escapeName(name: string): string {
  let out = ''
  for (const c of name) {
    out += ESCAPED_CHARS.has(c) ? '_' : c.toLowerCase()
  }
  return out
}

export const shortKey = (d: { name: string }): string => escapeName(d.name)

export const qualifiedKey = (d: { group: string; name: string }): string =>
  escapeName(`${d.group}_${d.name}`)
