/**
 * Default Filters
 *
 * The built-in `| name(args)` filters. Each receives the evaluated input and
 * arguments; a thrown Error is reported by the evaluator as a FilterError.
 */

import type { Value } from '../types'
import type { FilterDefinition } from './index'
import { TemplateError } from '../core/errors'
import { int, str, list, stringify, typeName, isTruthy } from '../core/values'

// ============================================================================
// Helpers
// ============================================================================

function stringArg(args: Value[], index: number, filter: string, what: string): string {
  const arg = args[index]
  if (arg === undefined || arg.type !== 'string') {
    throw new Error(`${filter} filter ${what} must be a string`)
  }
  return arg.value
}

/** Empty or false values that `default` replaces. Numbers never count. */
function isMissing(input: Value): boolean {
  switch (input.type) {
    case 'int':
    case 'float':
      return false
    default:
      return !isTruthy(input)
  }
}

function escapeChars(chars: string): string {
  return chars.replace(/[\\\]^-]/g, '\\$&')
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&#34;',
  "'": '&#39;',
}

// ============================================================================
// Filters
// ============================================================================

/**
 * `default(value[, falsy])` replaces an undefined input. With `falsy` true
 * (the default) it also replaces None, False, "" and empty collections.
 */
const defaultFilter: FilterDefinition = {
  resolvesUndefined: true,
  apply(input, args, invocation) {
    const fallback = args[0]
    if (fallback === undefined) {
      throw new Error('default filter requires a default value')
    }
    if (invocation.undefined) return fallback

    const replaceFalsy = args[1] === undefined ? true : isTruthy(args[1])
    return replaceFalsy && isMissing(input) ? fallback : input
  },
}

const join: FilterDefinition = {
  apply(input, args) {
    const separator = args.length > 0 ? stringArg(args, 0, 'join', 'separator') : ''
    switch (input.type) {
      case 'null':
        return str('')
      case 'string':
        return input
      case 'list':
        return str(input.items.map(stringify).join(separator))
      default:
        throw new Error(`join filter requires a list, got ${typeName(input)}`)
    }
  },
}

const upper: FilterDefinition = {
  apply: (input) => str(stringify(input).toUpperCase()),
}

const lower: FilterDefinition = {
  apply: (input) => str(stringify(input).toLowerCase()),
}

const capitalize: FilterDefinition = {
  apply(input) {
    const text = stringify(input)
    if (text === '') return str('')
    return str(text.charAt(0).toUpperCase() + text.slice(1).toLowerCase())
  },
}

const replace: FilterDefinition = {
  apply(input, args) {
    if (args.length < 2) {
      throw new Error('replace filter requires the old and new substrings')
    }
    const from = stringArg(args, 0, 'replace', 'arguments')
    const to = stringArg(args, 1, 'replace', 'arguments')
    const countArg = args[2]
    const count = countArg !== undefined && countArg.type === 'int' ? countArg.value : -1

    let text = stringify(input)
    if (count < 0) return str(text.split(from).join(to))

    let result = ''
    for (let done = 0; done < count; done++) {
      const at = text.indexOf(from)
      if (at === -1) break
      result += text.slice(0, at) + to
      text = text.slice(at + from.length)
      // an empty pattern matches between every character
      if (from === '' && text !== '') {
        result += text.charAt(0)
        text = text.slice(1)
      }
    }
    return str(result + text)
  },
}

const trim: FilterDefinition = {
  apply(input, args) {
    const text = stringify(input)
    if (args.length === 0) return str(text.trim())

    const chars = stringArg(args, 0, 'trim', 'characters')
    if (chars === '') return str(text)
    const set = escapeChars(chars)
    return str(text.replace(new RegExp(`^[${set}]+|[${set}]+$`, 'g'), ''))
  },
}

const toList: FilterDefinition = {
  apply(input) {
    switch (input.type) {
      case 'null':
        return list([])
      case 'string':
        return list(Array.from(input.value, (ch) => str(ch)))
      case 'list':
        return list([...input.items])
      default:
        return list([input])
    }
  },
}

const escape: FilterDefinition = {
  apply: (input) => str(stringify(input).replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch)),
}

const length: FilterDefinition = {
  apply(input) {
    switch (input.type) {
      case 'null':
        return int(0)
      case 'string':
        return int(Array.from(input.value).length)
      case 'list':
        return int(input.items.length)
      case 'map':
        return int(input.entries.size)
      default:
        throw new Error(`object of type ${typeName(input)} has no length`)
    }
  },
}

/** `items` turns a dict into a list of `[key, value]` pairs. */
const items: FilterDefinition = {
  apply(input) {
    switch (input.type) {
      case 'null':
        return list([])
      case 'map':
        return list(Array.from(input.entries, ([key, value]) => list([str(key), value])))
      default:
        throw new Error(`items filter requires a dict, got ${typeName(input)}`)
    }
  },
}

/**
 * `map(name, ...args)` applies the named filter to every element. Extra
 * arguments are passed on to that filter.
 */
const mapFilter: FilterDefinition = {
  apply(input, args, invocation) {
    const name = stringArg(args, 0, 'map', 'name')
    const inner = invocation.filters.get(name)
    if (!inner) {
      throw new TemplateError('UnknownFilter', `no filter named '${name}'`)
    }

    let elements: readonly Value[]
    switch (input.type) {
      case 'null':
        elements = []
        break
      case 'list':
        elements = input.items
        break
      default:
        throw new Error(`map filter requires a list, got ${typeName(input)}`)
    }

    const rest = args.slice(1)
    return list(elements.map((element) => inner.apply(element, rest, { ...invocation, undefined: false })))
  },
}

// ============================================================================
// Registry
// ============================================================================

export const DEFAULT_FILTERS: ReadonlyMap<string, FilterDefinition> = new Map<string, FilterDefinition>([
  ['default', defaultFilter],
  ['join', join],
  ['upper', upper],
  ['lower', lower],
  ['capitalize', capitalize],
  ['replace', replace],
  ['trim', trim],
  ['list', toList],
  ['escape', escape],
  ['length', length],
  ['items', items],
  ['map', mapFilter],
])
