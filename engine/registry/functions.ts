/**
 * Default Functions & Methods
 *
 * Free functions callable by name (`lookup('env', 'HOME')`) and methods bound
 * to a value by its type (`settings.get('port', 8080)`).
 */

import { readFileSync } from 'node:fs'
import type { Value, ValueType, CallableValue } from '../types'
import type { MethodFn } from './index'
import { NULL, str, callable, toKey, typeName } from '../core/values'

// ============================================================================
// lookup()
// ============================================================================

function requireString(value: Value | undefined, what: string): string {
  if (value === undefined) {
    throw new Error(`lookup() requires a ${what}`)
  }
  if (value.type !== 'string') {
    throw new Error(`${what} must be a string, got ${typeName(value)}`)
  }
  return value.value
}

/**
 * `lookup('env', name)` reads an environment variable (missing → "").
 * `lookup('file', path)` reads a UTF-8 file.
 */
function lookup(args: Value[]): Value {
  const source = requireString(args[0], 'lookup type')
  const target = requireString(args[1], 'lookup target')

  switch (source) {
    case 'env':
      return str(process.env[target] ?? '')
    case 'file':
      try {
        return str(readFileSync(target, 'utf8'))
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error)
        throw new Error(`failed to read file ${target}: ${reason}`)
      }
    default:
      throw new Error(`unsupported lookup type: ${source}`)
  }
}

export const DEFAULT_FUNCTIONS: ReadonlyMap<string, CallableValue> = new Map<string, CallableValue>([
  ['lookup', callable('lookup', lookup)],
])

// ============================================================================
// Methods
// ============================================================================

/** `dict.get(key[, default])`: the value for key, else default, else None */
const mapGet: MethodFn = (receiver, args) => {
  const key = args[0]
  if (key === undefined) {
    throw new Error('get method requires a key')
  }
  const fallback = args[1] ?? NULL
  if (receiver.type !== 'map') return fallback
  return receiver.entries.get(toKey(key)) ?? fallback
}

export const DEFAULT_METHODS: ReadonlyMap<ValueType, ReadonlyMap<string, MethodFn>> = new Map<ValueType, ReadonlyMap<string, MethodFn>>([
  ['map', new Map<string, MethodFn>([['get', mapGet]])],
])
