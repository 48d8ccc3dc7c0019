import {tokenize, TokenizeError} from './Tokenizer'
import {parse, ParseError} from './Parser'
import format from './PrettyPrint'
import type {FormatOptions} from './PrettyPrint'

export type FormatJsonError = TokenizeError | ParseError

export function isFormatJsonError(x: unknown): x is FormatJsonError {
  return x instanceof TokenizeError || x instanceof ParseError
}

/**
 * Tokenizes, parses and re-formats a JSON document. Each stage runs to
 * completion before the next starts. Throws the first `TokenizeError` or
 * `ParseError` encountered; its `message` is the user-facing diagnostic.
 */
export function formatJson(content: string, options?: FormatOptions): string {
  return format(parse(tokenize(content)), options)
}

export {tokenize, tokenToString, Token, TokenizeError, locationToString} from './Tokenizer'
export type {Location} from './Tokenizer'
export {parse, TokenCursor, ParseError} from './Parser'
export {default as format, quoteString} from './PrettyPrint'
export type {FormatOptions} from './PrettyPrint'
export * as Json from './Json'
export type {JsonValue, JsonEntry, PlainJson} from './Json'
