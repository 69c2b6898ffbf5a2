/**
 * Registries
 *
 * Filters, free functions and type-scoped methods are plain values handed to
 * the engine at construction. Nothing here is global or mutable.
 */

import type { Value, ValueType, CallableValue } from '../types'
import { DEFAULT_FILTERS } from './filters'
import { DEFAULT_FUNCTIONS, DEFAULT_METHODS } from './functions'

// ============================================================================
// Types
// ============================================================================

export interface FilterInvocation {
  /** True when the input is the placeholder for an undefined variable */
  undefined: boolean
  /** Filters in scope, for filters that apply other filters by name */
  filters: FilterRegistry
}

export interface FilterDefinition {
  apply: (input: Value, args: Value[], invocation: FilterInvocation) => Value
  /**
   * Set for filters such as `default` whose result counts as a definition of
   * an otherwise undefined variable.
   */
  resolvesUndefined?: boolean
}

export type FilterRegistry = ReadonlyMap<string, FilterDefinition>

export type FunctionRegistry = ReadonlyMap<string, CallableValue>

/** Method body; the receiver is passed separately from the call arguments */
export type MethodFn = (receiver: Value, args: Value[]) => Value

export type MethodRegistry = ReadonlyMap<ValueType, ReadonlyMap<string, MethodFn>>

export interface Registries {
  filters: FilterRegistry
  functions: FunctionRegistry
  methods: MethodRegistry
}

// ============================================================================
// Construction
// ============================================================================

export interface RegistryOverrides {
  filters?: Record<string, FilterDefinition> | FilterRegistry
  functions?: Record<string, CallableValue> | FunctionRegistry
  methods?: Partial<Record<ValueType, Record<string, MethodFn>>> | MethodRegistry
}

function isMapLike<K, T>(source: object): source is ReadonlyMap<K, T> {
  return source instanceof Map
}

function toMap<T>(source: Record<string, T> | ReadonlyMap<string, T>): Map<string, T> {
  return isMapLike<string, T>(source) ? new Map(source) : new Map(Object.entries(source))
}

function mergeMethods(
  base: MethodRegistry,
  extra: Partial<Record<ValueType, Record<string, MethodFn>>> | MethodRegistry
): MethodRegistry {
  const merged = new Map<ValueType, Map<string, MethodFn>>()
  for (const [type, methods] of base) {
    merged.set(type, new Map(methods))
  }

  const additions: Array<[ValueType, ReadonlyMap<string, MethodFn>]> =
    isMapLike<ValueType, ReadonlyMap<string, MethodFn>>(extra)
      ? Array.from(extra.entries())
      : collectMethodRecords(extra)

  for (const [type, methods] of additions) {
    const target = merged.get(type) ?? new Map<string, MethodFn>()
    for (const [name, fn] of methods) target.set(name, fn)
    merged.set(type, target)
  }
  return merged
}

function collectMethodRecords(
  record: Partial<Record<ValueType, Record<string, MethodFn>>>
): Array<[ValueType, ReadonlyMap<string, MethodFn>]> {
  const out: Array<[ValueType, ReadonlyMap<string, MethodFn>]> = []
  const types: ValueType[] = ['null', 'bool', 'int', 'float', 'string', 'list', 'map', 'callable', 'object']
  for (const type of types) {
    const methods = record[type]
    if (methods) out.push([type, new Map(Object.entries(methods))])
  }
  return out
}

/**
 * Build registries from the defaults plus host additions. Host entries with
 * the same name replace the defaults.
 */
export function createRegistries(overrides: RegistryOverrides = {}): Registries {
  const filters = new Map(DEFAULT_FILTERS)
  if (overrides.filters) {
    for (const [name, def] of toMap(overrides.filters)) filters.set(name, def)
  }

  const functions = new Map(DEFAULT_FUNCTIONS)
  if (overrides.functions) {
    for (const [name, fn] of toMap(overrides.functions)) functions.set(name, fn)
  }

  const methods = overrides.methods ? mergeMethods(DEFAULT_METHODS, overrides.methods) : DEFAULT_METHODS

  return { filters, functions, methods }
}

/** Registries with nothing registered, for hosts that want full control */
export function emptyRegistries(): Registries {
  return { filters: new Map(), functions: new Map(), methods: new Map() }
}

export { DEFAULT_FILTERS } from './filters'
export { DEFAULT_FUNCTIONS, DEFAULT_METHODS } from './functions'
