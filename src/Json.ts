import * as _ from 'lodash'

/**
 * A parsed JSON document. Unlike a plain JavaScript value, objects keep their
 * entries as an ordered list, so duplicate keys survive parsing in the order
 * they were written.
 */
export type JsonValue =
  JsonNull | JsonBool | JsonNumber | JsonString | JsonArray | JsonObject

export interface JsonNull { readonly type: 'null' }
export interface JsonBool { readonly type: 'bool', readonly value: boolean }
export interface JsonNumber { readonly type: 'number', readonly value: number }
export interface JsonString { readonly type: 'string', readonly value: string }
export interface JsonArray {
  readonly type: 'array'
  readonly elements: ReadonlyArray<JsonValue>
}
export interface JsonObject {
  readonly type: 'object'
  readonly entries: ReadonlyArray<JsonEntry>
}

/** One `"key": value` member of an object */
export type JsonEntry = readonly [string, JsonValue]

/** Plain JavaScript JSON data, as produced by `JSON.parse` */
export type PlainJson =
  null | boolean | number | string | PlainJsonArray | PlainJsonObject
export interface PlainJsonArray extends Array<PlainJson> {}
export interface PlainJsonObject { [key: string]: PlainJson }

export const NULL: JsonNull = {type: 'null'}

export function bool(value: boolean): JsonBool {
  return {type: 'bool', value}
}

export function number(value: number): JsonNumber {
  return {type: 'number', value}
}

export function string(value: string): JsonString {
  return {type: 'string', value}
}

export function array(elements: ReadonlyArray<JsonValue>): JsonArray {
  return {type: 'array', elements}
}

export function object(entries: ReadonlyArray<JsonEntry>): JsonObject {
  return {type: 'object', entries}
}

/**
 * Converts a value tree to plain JavaScript data. If an object contains the
 * same key more than once, the last entry wins, matching `JSON.parse`.
 */
export function toPlain(value: JsonValue): PlainJson {
  switch (value.type) {
  case 'null': return null
  case 'bool':
  case 'number':
  case 'string':
    return value.value
  case 'array': return value.elements.map(toPlain)
  case 'object':
    return _.fromPairs(value.entries.map(([k, v]) => [k, toPlain(v)]))
  }
}

/** Builds a value tree from plain JavaScript data, in key insertion order. */
export function fromPlain(x: PlainJson): JsonValue {
  if (x === null) return NULL
  else if (typeof x === 'boolean') return bool(x)
  else if (typeof x === 'number') return number(x)
  else if (typeof x === 'string') return string(x)
  else if (Array.isArray(x)) return array(x.map(fromPlain))
  else return object(_.toPairs(x).map(([k, v]): JsonEntry => [k, fromPlain(v)]))
}
