/* *
 * --- JSON Tokenizer ---
 *
 * Splits JSON source text into a flat list of tokens: structural punctuation,
 * the keywords `true`, `false` and `null`, and decoded string and number
 * literals. Whitespace is dropped.
 */

import XRegExp from 'xregexp'

/**
 * Accepted shape of a number literal. The scanner collects any run of
 * `0-9 + - e E .` first, so malformed runs such as `1.2.3` are only rejected
 * here.
 */
export const numberLiteral = XRegExp(`^
  ([+-])?              # sign
  ( [0-9]+ \\.? [0-9]* # integer part, optional fraction
  | \\. [0-9]+         # bare fraction
  )
  ([eE][+-]?[0-9]+)?   # exponent
$`, 'x')

const hexEscape = /^[0-9a-fA-F]{4}$/

export const whitespaceChars = new Set([' ', '\t', '\n', '\r'])

export const numberChars = new Set('0123456789+-eE.')

const escapes = new Map<string, string>([
  ['"', '"'],
  ['\\', '\\'],
  ['/', '/'],
  ['b', '\b'],
  ['f', '\f'],
  ['n', '\n'],
  ['r', '\r'],
  ['t', '\t']
])

export type Token = Token.Simple | Token.String | Token.Number

export namespace Token {
  export enum Type {
    LeftBracket, RightBracket, LeftBrace, RightBrace, Colon, Comma,
    True, False, Null, String, Number
  }

  /** Tokens that carry no payload */
  export type SimpleType = Exclude<Type, Type.String | Type.Number>

  export interface Simple { readonly type: SimpleType }
  export interface String { readonly type: Type.String, readonly value: string }
  export interface Number { readonly type: Type.Number, readonly value: number }
}

const T = Token.Type

export const punctuation = new Map<string, Token.SimpleType>([
  ['[', T.LeftBracket],
  [']', T.RightBracket],
  ['{', T.LeftBrace],
  ['}', T.RightBrace],
  [':', T.Colon],
  [',', T.Comma]
])

const keywords = new Map<string, Token.SimpleType>([
  ['true', T.True],
  ['false', T.False],
  ['null', T.Null]
])

// A bareword runs until one of these
const delimiters = new Set([...punctuation.keys(), ...whitespaceChars])

/**
 * Renders a token the way it would appear in source. String payloads are
 * quoted but not re-escaped.
 */
export function tokenToString(token: Token): string {
  switch (token.type) {
  case T.LeftBracket: return '['
  case T.RightBracket: return ']'
  case T.LeftBrace: return '{'
  case T.RightBrace: return '}'
  case T.Colon: return ':'
  case T.Comma: return ','
  case T.True: return 'true'
  case T.False: return 'false'
  case T.Null: return 'null'
  case T.String: return `"${token.value}"`
  case T.Number: return String(token.value)
  }
}

export interface Location {
  readonly line: number
  readonly column: number
}

export function locationToString({line, column}: Location) {
  return `line ${line}, col ${column}`
}

export class TokenizeError extends Error {
  readonly kind: TokenizeError.Kind
  /** The offending literal, escape or character, if any */
  readonly text?: string
  readonly location: Location

  constructor(kind: TokenizeError.Kind, location: Location, text?: string) {
    super(TokenizeError.messageFor(kind, text))
    this.name = 'TokenizeError'
    this.kind = kind
    this.text = text
    this.location = location
  }
}

export namespace TokenizeError {
  export enum Kind {
    UnexpectedLiteral = 'UnexpectedLiteral',
    UnexpectedCharacter = 'UnexpectedCharacter',
    UnexpectedEndOfInput = 'UnexpectedEndOfInput',
    InvalidEscapeCharacter = 'InvalidEscapeCharacter',
    InvalidNumberLiteral = 'InvalidNumberLiteral'
  }

  export function messageFor(kind: Kind, text = ''): string {
    switch (kind) {
    case Kind.InvalidEscapeCharacter: return `Invalid escape character: '${text}'`
    case Kind.InvalidNumberLiteral: return `Invalid number literal: '${text}'`
    case Kind.UnexpectedCharacter: return `Unexpected character: '${text}'`
    case Kind.UnexpectedEndOfInput: return 'Unexpected end of input'
    case Kind.UnexpectedLiteral: return `Unexpected literal: '${text}'`
    }
  }
}

const K = TokenizeError.Kind

const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff
const isLowSurrogate = (code: number) => code >= 0xdc00 && code <= 0xdfff

/**
 * Single-use scanner over one input string. Keeps a cursor with one character
 * of lookahead and tracks the line and column for error locations.
 */
class Tokenizer {
  readonly input: string
  i = 0
  line = 1
  column = 1
  readonly tokens: Token[] = []

  constructor(input: string) {
    this.input = input
  }

  peek(): string | undefined {
    return this.i < this.input.length ? this.input.charAt(this.i) : undefined
  }

  next(): string | undefined {
    const c = this.peek()
    if (c === undefined) return c
    this.i++
    if (c === '\n') {
      this.line++; this.column = 1
    } else this.column++
    return c
  }

  location(): Location {
    return {line: this.line, column: this.column}
  }

  error(kind: TokenizeError.Kind, text?: string, location = this.location()) {
    return new TokenizeError(kind, location, text)
  }

  run(): Token[] {
    for (let c = this.peek(); c !== undefined; c = this.peek()) {
      const type = punctuation.get(c)
      if (whitespaceChars.has(c)) {
        this.next()
      } else if (type !== undefined) {
        this.next()
        this.tokens.push({type})
      } else if (c === '"') {
        this.tokens.push(this.string())
      } else if (c === '-' || (c >= '0' && c <= '9')) {
        this.tokens.push(this.number())
      } else {
        this.tokens.push(this.bareword())
      }
    }
    return this.tokens
  }

  string(): Token.String {
    this.next() // opening quote
    let value = ''
    while (true) {
      const c = this.next()
      if (c === undefined) throw this.error(K.UnexpectedEndOfInput)
      else if (c === '"') return {type: T.String, value}
      else if (c !== '\\') {
        value += c
        continue
      }
      const escape = this.next()
      if (escape === undefined) throw this.error(K.UnexpectedEndOfInput)
      else if (escape === 'u') value += this.unicodeEscape()
      else {
        const result = escapes.get(escape)
        if (result === undefined) {
          throw this.error(K.InvalidEscapeCharacter, escape)
        }
        value += result
      }
    }
  }

  /**
   * Decodes the digits after `\u`. A high surrogate must be followed directly
   * by a `\u` escape holding its low surrogate; the pair becomes one
   * character.
   */
  unicodeEscape(): string {
    const high = this.hexDigits(), code = parseInt(high, 16)
    if (isLowSurrogate(code)) throw this.error(K.InvalidEscapeCharacter, high)
    if (!isHighSurrogate(code)) return String.fromCharCode(code)
    if (this.input.startsWith('\\u', this.i)) {
      this.next(); this.next()
      const low = this.hexDigits(), lowCode = parseInt(low, 16)
      if (isLowSurrogate(lowCode)) return String.fromCharCode(code, lowCode)
    }
    throw this.error(K.InvalidEscapeCharacter, high)
  }

  hexDigits(): string {
    let digits = '', count = 0
    for (let c = this.peek(); c !== undefined && c !== '"'; c = this.peek()) {
      digits += c
      this.next()
      // Counted by code point; a surrogate pair is one character
      const low = this.peek()
      if (isHighSurrogate(c.charCodeAt(0)) && low !== undefined &&
          isLowSurrogate(low.charCodeAt(0))) {
        digits += low
        this.next()
      }
      if (++count === 4) break
    }
    if (!hexEscape.test(digits)) {
      throw this.error(K.InvalidEscapeCharacter, digits)
    }
    return digits
  }

  number(): Token.Number {
    const start = this.location()
    let text = ''
    for (let c = this.peek(); c !== undefined && numberChars.has(c); c = this.peek()) {
      text += c
      this.next()
    }
    const value = numberLiteral.test(text) ? parseFloat(text) : NaN
    if (!isFinite(value)) throw this.error(K.InvalidNumberLiteral, text, start)
    return {type: T.Number, value}
  }

  bareword(): Token.Simple {
    const start = this.location()
    let text = ''
    for (let c = this.peek(); c !== undefined && !delimiters.has(c); c = this.peek()) {
      text += c
      this.next()
    }
    if (text === '') {
      throw this.error(K.UnexpectedCharacter, this.peek(), start)
    }
    const type = keywords.get(text)
    if (type === undefined) throw this.error(K.UnexpectedLiteral, text, start)
    return {type}
  }
}

/**
 * Scans `input` into tokens. Throws a `TokenizeError` at the first malformed
 * literal, escape or number; no partial token list is returned.
 */
export function tokenize(input: string): Token[] {
  return new Tokenizer(input).run()
}
