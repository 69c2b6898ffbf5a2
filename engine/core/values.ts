/**
 * Value Model
 *
 * Constructors, coercions, equality and stringification for the tagged
 * Value union. Also converts between plain JavaScript data and Values.
 */

import type {
  Value,
  ValueType,
  NullValue,
  BoolValue,
  IntValue,
  FloatValue,
  StringValue,
  ListValue,
  MapValue,
  CallableValue,
  Context,
} from '../types'
import { TemplateError } from './errors'

// ============================================================================
// Constructors
// ============================================================================

export const NULL: NullValue = Object.freeze({ type: 'null' })
export const TRUE: BoolValue = Object.freeze({ type: 'bool', value: true })
export const FALSE: BoolValue = Object.freeze({ type: 'bool', value: false })

export function bool(value: boolean): BoolValue {
  return value ? TRUE : FALSE
}

/** Ints are exact only within the safe integer range; anything wider is an overflow. */
export function int(value: number): IntValue {
  const whole = Math.trunc(value)
  if (!Number.isSafeInteger(whole)) {
    throw new TemplateError('TypeError', `integer overflow: ${value} is outside the exact integer range`)
  }
  return { type: 'int', value: whole }
}

export function float(value: number): FloatValue {
  return { type: 'float', value }
}

export function str(value: string): StringValue {
  return { type: 'string', value }
}

export function list(items: readonly Value[]): ListValue {
  return { type: 'list', items }
}

export function map(entries: ReadonlyMap<string, Value> | Iterable<[string, Value]>): MapValue {
  return { type: 'map', entries: entries instanceof Map ? entries : new Map(entries) }
}

export function callable(name: string, call: (args: Value[]) => Value): CallableValue {
  return { type: 'callable', name, call }
}

// ============================================================================
// Truthiness & Type Names
// ============================================================================

/**
 * Null, false, 0, 0.0, "" and empty collections are falsy; everything else is truthy.
 */
export function isTruthy(value: Value): boolean {
  switch (value.type) {
    case 'null':
      return false
    case 'bool':
      return value.value
    case 'int':
    case 'float':
      return value.value !== 0
    case 'string':
      return value.value.length > 0
    case 'list':
      return value.items.length > 0
    case 'map':
      return value.entries.size > 0
    case 'callable':
    case 'object':
      return true
  }
}

const TYPE_NAMES: Record<ValueType, string> = {
  null: 'None',
  bool: 'bool',
  int: 'int',
  float: 'float',
  string: 'str',
  list: 'list',
  map: 'dict',
  callable: 'function',
  object: 'object',
}

export function typeName(value: Value): string {
  return value.type === 'object' ? value.name : TYPE_NAMES[value.type]
}

export function isNumeric(value: Value): value is IntValue | FloatValue {
  return value.type === 'int' || value.type === 'float'
}

// ============================================================================
// Equality
// ============================================================================

/**
 * Structural equality. Int and Float compare by numeric value; lists and maps
 * compare element-wise. Callables and native objects compare by identity.
 */
export function deepEquals(left: Value, right: Value): boolean {
  if (isNumeric(left) && isNumeric(right)) {
    return left.value === right.value
  }

  switch (left.type) {
    case 'null':
      return right.type === 'null'
    case 'bool':
      return right.type === 'bool' && left.value === right.value
    case 'string':
      return right.type === 'string' && left.value === right.value
    case 'list':
      return (
        right.type === 'list' &&
        left.items.length === right.items.length &&
        left.items.every((item, i) => deepEquals(item, right.items[i]))
      )
    case 'map': {
      if (right.type !== 'map' || left.entries.size !== right.entries.size) return false
      for (const [key, item] of left.entries) {
        const match = right.entries.get(key)
        if (match === undefined || !deepEquals(item, match)) return false
      }
      return true
    }
    default:
      return left === right
  }
}

// ============================================================================
// Numeric Coercion
// ============================================================================

const NUMERIC_STRING = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/

/**
 * Coerce to a 64-bit float for ordering comparisons.
 * Accepts Int, Float and numeric strings.
 */
export function toFloat(value: Value, role = 'operand'): number {
  if (isNumeric(value)) return value.value
  if (value.type === 'string' && NUMERIC_STRING.test(value.value)) {
    return parseFloat(value.value)
  }
  throw new TemplateError('TypeError', `${role}: cannot convert ${typeName(value)} ${repr(value)} to number`)
}

/**
 * Coerce to an integer index. Floats truncate; integer strings parse.
 */
export function toInteger(value: Value): number {
  if (isNumeric(value)) return Math.trunc(value.value)
  if (value.type === 'string' && /^\s*[+-]?\d+\s*$/.test(value.value)) {
    return parseInt(value.value, 10)
  }
  throw new TemplateError('TypeError', `indices must be integers, not ${typeName(value)}`)
}

// ============================================================================
// Stringification
// ============================================================================

function formatFloat(n: number): string {
  if (Number.isNaN(n)) return 'nan'
  if (!Number.isFinite(n)) return n > 0 ? 'inf' : '-inf'
  if (Number.isInteger(n) && Math.abs(n) < 1e16) return `${n}.0`
  return String(n)
}

function quote(s: string): string {
  const escaped = s.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/\t/g, '\\t').replace(/\r/g, '\\r')
  if (escaped.includes("'") && !escaped.includes('"')) return `"${escaped}"`
  return `'${escaped.replace(/'/g, "\\'")}'`
}

/**
 * Literal-style representation, used for values nested in lists and maps.
 */
export function repr(value: Value): string {
  switch (value.type) {
    case 'string':
      return quote(value.value)
    case 'null':
      return 'None'
    case 'list':
      return `[${value.items.map(repr).join(', ')}]`
    case 'map':
      return `{${Array.from(value.entries, ([k, v]) => `${quote(k)}: ${repr(v)}`).join(', ')}}`
    default:
      return stringify(value)
  }
}

/**
 * Text form of a value as it appears in rendered output.
 * Null renders as the empty string.
 */
export function stringify(value: Value): string {
  switch (value.type) {
    case 'null':
      return ''
    case 'bool':
      return value.value ? 'True' : 'False'
    case 'int':
      return String(value.value)
    case 'float':
      return formatFloat(value.value)
    case 'string':
      return value.value
    case 'list':
    case 'map':
      return repr(value)
    case 'callable':
      return `<function ${value.name}>`
    case 'object':
      return `<${value.name}>`
  }
}

/** Key form used when a value indexes a map */
export function toKey(value: Value): string {
  return value.type === 'null' ? 'None' : stringify(value)
}

// ============================================================================
// JavaScript Interop
// ============================================================================

function isPlainObject(input: object): input is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(input)
  return proto === Object.prototype || proto === null
}

/**
 * Convert plain JavaScript data into a Value.
 * Integral numbers in the safe range become Int; other numbers Float.
 */
export function toValue(input: unknown): Value {
  if (input === null || input === undefined) return NULL
  switch (typeof input) {
    case 'boolean':
      return bool(input)
    case 'number':
      return Number.isSafeInteger(input) ? int(input) : float(input)
    case 'bigint':
      return int(Number(input))
    case 'string':
      return str(input)
    case 'function': {
      const fn = input
      return callable(fn.name || 'anonymous', (args) => toValue(fn(...args.map(toNative))))
    }
    case 'object':
      break
    default:
      return str(String(input))
  }

  if (Array.isArray(input)) return list(input.map(toValue))
  if (input instanceof Map) {
    return map(Array.from(input, ([k, v]): [string, Value] => [String(k), toValue(v)]))
  }
  if (input instanceof Set) return list(Array.from(input, toValue))
  if (input instanceof Date) return str(input.toISOString())
  if (isPlainObject(input)) {
    return map(Object.entries(input).map(([k, v]): [string, Value] => [k, toValue(v)]))
  }
  return str(String(input))
}

/**
 * Convert a Value back into plain JavaScript data.
 */
export function toNative(value: Value): unknown {
  switch (value.type) {
    case 'null':
      return null
    case 'bool':
    case 'int':
    case 'float':
    case 'string':
      return value.value
    case 'list':
      return value.items.map(toNative)
    case 'map': {
      const out: Record<string, unknown> = {}
      for (const [k, v] of value.entries) out[k] = toNative(v)
      return out
    }
    case 'callable':
      return (...args: unknown[]) => toNative(value.call(args.map(toValue)))
    case 'object':
      return value.target
  }
}

/**
 * Build a Context from a plain record or an existing Map of raw data.
 */
export function createContext(data: Record<string, unknown> | ReadonlyMap<string, unknown> = {}): Context {
  const entries = data instanceof Map ? Array.from(data.entries()) : Object.entries(data)
  return new Map(entries.map(([k, v]): [string, Value] => [k, toValue(v)]))
}
