import type { ConstantSpec, ConstantValue, GeneratedModule, ObjectSpec } from './module.js'

const INDENT = '    '

const HARD_KEYWORDS = new Set([
  'as', 'break', 'class', 'continue', 'do', 'else', 'false', 'for', 'fun', 'if',
  'in', 'interface', 'is', 'null', 'object', 'package', 'return', 'super', 'this',
  'throw', 'true', 'try', 'typealias', 'typeof', 'val', 'var', 'when', 'while',
])

const PLAIN_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/

// Kotlin ends a line comment at either CR or LF
const LINE_BREAK = /\r\n|\r|\n/

/** Serialize a generated module to the text of a `.kt` file */
export function renderKotlinFile(module: GeneratedModule): string {
  return renderObject(module.object, '').join('\n') + '\n'
}

export function kotlinIdentifier(name: string): string {
  return PLAIN_IDENTIFIER.test(name) && !HARD_KEYWORDS.has(name) ? name : `\`${name}\``
}

export function kotlinString(value: string): string {
  let out = '"'
  for (const c of value) {
    switch (c) {
      case '\\': out += '\\\\'; break
      case '"': out += '\\"'; break
      case '$': out += '\\$'; break
      case '\n': out += '\\n'; break
      case '\r': out += '\\r'; break
      case '\t': out += '\\t'; break
      case '\b': out += '\\b'; break
      default: {
        const code = c.charCodeAt(0)
        out += code < 0x20 ? `\\u${code.toString(16).padStart(4, '0')}` : c
      }
    }
  }
  return out + '"'
}

// Kotlin block comments nest, so both delimiters are broken up
function commentSafe(text: string): string {
  return text.replace(/\*\//g, '* /').replace(/\/\*/g, '/ *')
}

function renderDoc(doc: string, indent: string): string[] {
  const lines = commentSafe(doc).split(LINE_BREAK)
  return [
    `${indent}/**`,
    ...lines.map((line) => (line === '' ? `${indent} *` : `${indent} * ${line}`)),
    `${indent} */`,
  ]
}

function renderValue(value: ConstantValue): string {
  if (value.kind === 'literal') return kotlinString(value.value)
  const { object, constant } = value.reference
  return `${kotlinString(value.prefix)} + ${kotlinIdentifier(object)}.${kotlinIdentifier(constant)}`
}

function renderConstant(constant: ConstantSpec, indent: string): string[] {
  const lines = constant.doc === undefined ? [] : renderDoc(constant.doc, indent)
  const declaration = `${indent}const val ${kotlinIdentifier(constant.name)}: String = ${renderValue(constant.value)}`

  if (constant.comment === undefined) {
    lines.push(declaration)
    return lines
  }

  const commentLines = commentSafe(constant.comment).split(LINE_BREAK)
  if (commentLines.length === 1) {
    lines.push(`${declaration} // ${commentLines[0]}`)
    return lines
  }

  const [first, ...rest] = commentLines
  lines.push(`${declaration} /* ${first}`)
  rest.forEach((line, i) => {
    const close = i === rest.length - 1 ? ' */' : ''
    lines.push(`${indent}${INDENT}${line}${close}`)
  })
  return lines
}

function renderObject(object: ObjectSpec, indent: string): string[] {
  const inner = indent + INDENT
  const lines = object.doc === undefined ? [] : renderDoc(object.doc, indent)
  lines.push(`${indent}object ${kotlinIdentifier(object.name)} {`)

  for (const constant of object.constants) {
    lines.push(...renderConstant(constant, inner))
  }
  object.nested.forEach((child, i) => {
    if (i > 0 || object.constants.length > 0) lines.push('')
    lines.push(...renderObject(child, inner))
  })

  lines.push(`${indent}}`)
  return lines
}
