/* *
 * --- JSON Parser ---
 *
 * Recursive-descent parser from a token list to a `JsonValue` tree, one
 * function per grammar rule:
 *
 *   value  := null | true | false | number | string | array | object
 *   array  := '[' (value (',' value)*)? ']'
 *   object := '{' (member (',' member)*)? '}'
 *   member := string ':' value
 */

import {Token, tokenToString} from './Tokenizer'
import * as Json from './Json'
import type {JsonValue, JsonEntry} from './Json'

const T = Token.Type

/** A position in a token list, with one token of lookahead. */
export class TokenCursor {
  readonly tokens: ReadonlyArray<Token>
  position = 0

  constructor(tokens: ReadonlyArray<Token>) {
    this.tokens = tokens
  }

  /** Returns the current token without consuming it. */
  peek(): Token | undefined {
    return this.tokens[this.position]
  }

  /** Consumes and returns the current token. */
  next(): Token | undefined {
    const token = this.peek()
    if (token !== undefined) this.position++
    return token
  }
}

export class ParseError extends Error {
  readonly kind: ParseError.Kind
  /** The token that broke the grammar, for `UnexpectedToken` */
  readonly token?: Token

  constructor(kind: ParseError.Kind, token?: Token) {
    super(token === undefined
      ? 'Unexpected end of input'
      : `Unexpected token: '${tokenToString(token)}'`)
    this.name = 'ParseError'
    this.kind = kind
    this.token = token
  }
}

export namespace ParseError {
  export enum Kind {
    UnexpectedToken = 'UnexpectedToken',
    UnexpectedEndOfInput = 'UnexpectedEndOfInput'
  }

  export const unexpectedToken = (token: Token) =>
    new ParseError(Kind.UnexpectedToken, token)

  export const unexpectedEnd = () => new ParseError(Kind.UnexpectedEndOfInput)
}

/**
 * Parses exactly one JSON value from `tokens`. Throws a `ParseError` at the
 * first token that does not fit the grammar, including any token left over
 * after the root value.
 */
export function parse(tokens: ReadonlyArray<Token>): JsonValue {
  const cursor = new TokenCursor(tokens)
  const value = parseValue(cursor)
  const rest = cursor.peek()
  if (rest !== undefined) throw ParseError.unexpectedToken(rest)
  return value
}

export function parseValue(cursor: TokenCursor): JsonValue {
  const token = cursor.peek()
  if (token === undefined) throw ParseError.unexpectedEnd()
  switch (token.type) {
  case T.LeftBracket: return parseArray(cursor)
  case T.LeftBrace: return parseObject(cursor)
  case T.Null:
    cursor.next()
    return Json.NULL
  case T.True:
    cursor.next()
    return Json.bool(true)
  case T.False:
    cursor.next()
    return Json.bool(false)
  case T.Number:
    cursor.next()
    return Json.number(token.value)
  case T.String:
    cursor.next()
    return Json.string(token.value)
  default:
    throw ParseError.unexpectedToken(token)
  }
}

function parseArray(cursor: TokenCursor): Json.JsonArray {
  cursor.next() // [
  const elements: JsonValue[] = []
  if (cursor.peek()?.type === T.RightBracket) {
    cursor.next()
    return Json.array(elements)
  }
  elements.push(parseValue(cursor))
  for (let token = cursor.next(); token !== undefined; token = cursor.next()) {
    switch (token.type) {
    case T.Comma:
      elements.push(parseValue(cursor))
      break
    case T.RightBracket:
      return Json.array(elements)
    default:
      throw ParseError.unexpectedToken(token)
    }
  }
  throw ParseError.unexpectedEnd()
}

function parseObject(cursor: TokenCursor): Json.JsonObject {
  cursor.next() // {
  const entries: JsonEntry[] = []
  if (cursor.peek()?.type === T.RightBrace) {
    cursor.next()
    return Json.object(entries)
  }
  entries.push(parseMember(cursor))
  for (let token = cursor.next(); token !== undefined; token = cursor.next()) {
    switch (token.type) {
    case T.Comma:
      entries.push(parseMember(cursor))
      break
    case T.RightBrace:
      return Json.object(entries)
    default:
      throw ParseError.unexpectedToken(token)
    }
  }
  throw ParseError.unexpectedEnd()
}

function parseMember(cursor: TokenCursor): JsonEntry {
  const key = cursor.next()
  if (key === undefined) throw ParseError.unexpectedEnd()
  else if (key.type !== T.String) throw ParseError.unexpectedToken(key)
  // A missing colon is reported as end of input, whatever follows the key
  if (cursor.next()?.type !== T.Colon) throw ParseError.unexpectedEnd()
  return [key.value, parseValue(cursor)]
}
