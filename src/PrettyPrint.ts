import chalk from 'chalk'
import {identity, join, repeat} from 'lodash'
import type {JsonValue} from './Json'

const defaultIndent = 2

export interface FormatOptions {
  /** Colors punctuation and scalars with chalk. Defaults to `false`. */
  readonly color?: boolean
}

type Paint = (s: string) => string

interface Palette {
  bracket: Paint
  brace: Paint
  null: Paint
  true: Paint
  false: Paint
  number: Paint
  string: Paint
}

const plain: Palette = {
  bracket: identity,
  brace: identity,
  null: identity,
  true: identity,
  false: identity,
  number: identity,
  string: identity
}

// Looked up on each call so that changes to `chalk.level` take effect
const colors = (): Palette => ({
  bracket: chalk.cyan,
  brace: chalk.green,
  null: chalk.magentaBright,
  true: chalk.greenBright,
  false: chalk.redBright,
  number: chalk.cyanBright,
  string: chalk.yellow
})

const escapes: {[c: string]: string} = {
  '"': '\\"',
  '\\': '\\\\',
  '\b': '\\b',
  '\f': '\\f',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t'
}

// A surrogate that `for...of` yields without its partner
function isLoneSurrogate(c: string) {
  const code = c.charCodeAt(0)
  return c.length === 1 && code >= 0xd800 && code <= 0xdfff
}

/**
 * Wraps `str` in double quotes, escaping quotes, backslashes, control
 * characters and unpaired surrogates so that the result is a valid JSON
 * string literal.
 */
export function quoteString(str: string): string {
  let out = '"'
  for (const c of str) {
    if (escapes.hasOwnProperty(c)) out += escapes[c]
    else if (c < ' ' || isLoneSurrogate(c)) {
      out += '\\u' + c.charCodeAt(0).toString(16).padStart(4, '0')
    }
    else out += c
  }
  return out + '"'
}

function indent(level: number) {
  return repeat(' ', level * defaultIndent)
}

function block(
  open: string, close: string, lines: string[], level: number
): string {
  return open + '\n' + join(lines, ',\n') + '\n' + indent(level - 1) + close
}

function formatValue(value: JsonValue, level: number, p: Palette): string {
  switch (value.type) {
  case 'null': return p.null('null')
  case 'bool': return value.value ? p.true('true') : p.false('false')
  case 'number': return p.number(String(value.value))
  case 'string': return p.string(quoteString(value.value))
  case 'array':
    if (value.elements.length === 0) return p.bracket('[]')
    return block(p.bracket('['), p.bracket(']'),
      value.elements.map(x => indent(level) + formatValue(x, level + 1, p)),
      level)
  case 'object':
    if (value.entries.length === 0) return p.brace('{}')
    return block(p.brace('{'), p.brace('}'),
      value.entries.map(([k, v]) =>
        indent(level) + quoteString(k) + ': ' + formatValue(v, level + 1, p)),
      level)
  }
}

/**
 * Renders a value tree as canonical JSON text: two-space indentation, one
 * array element or object entry per line, and empty containers kept inline
 * as `[]` and `{}`.
 */
export default function format(value: JsonValue, options: FormatOptions = {}) {
  return formatValue(value, 1, options.color ? colors() : plain)
}
