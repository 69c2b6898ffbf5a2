/**
 * Operators
 *
 * Arithmetic, comparison and membership over Values. `and`/`or` live in the
 * evaluator because they short-circuit.
 */

import type { Value, BinaryOperator, UnaryOperator } from '../types'
import { TemplateError } from './errors'
import { bool, int, float, str, list, isTruthy, isNumeric, deepEquals, toFloat, toKey, typeName, repr } from './values'

type EagerOperator = Exclude<BinaryOperator, 'and' | 'or'>

function unsupported(op: string, left: Value, right: Value): TemplateError {
  return new TemplateError(
    'TypeError',
    `unsupported operand types for ${op}: '${typeName(left)}' and '${typeName(right)}'`
  )
}

function divisionByZero(op: string): TemplateError {
  return new TemplateError('DivisionByZero', `division by zero in '${op}'`)
}

// ============================================================================
// Arithmetic
// ============================================================================

function add(left: Value, right: Value): Value {
  if (left.type === 'int' && right.type === 'int') return int(left.value + right.value)
  if (isNumeric(left) && isNumeric(right)) return float(left.value + right.value)
  if (left.type === 'string' && right.type === 'string') return str(left.value + right.value)
  if (left.type === 'list' && right.type === 'list') return list([...left.items, ...right.items])
  throw unsupported('+', left, right)
}

function subtract(left: Value, right: Value): Value {
  if (left.type === 'int' && right.type === 'int') return int(left.value - right.value)
  if (isNumeric(left) && isNumeric(right)) return float(left.value - right.value)
  throw unsupported('-', left, right)
}

function repeat(sequence: Value, times: number): Value | undefined {
  const count = Math.max(0, times)
  if (sequence.type === 'string') return str(sequence.value.repeat(count))
  if (sequence.type === 'list') {
    const items: Value[] = []
    for (let i = 0; i < count; i++) items.push(...sequence.items)
    return list(items)
  }
  return undefined
}

function multiply(left: Value, right: Value): Value {
  if (left.type === 'int' && right.type === 'int') return int(left.value * right.value)
  if (isNumeric(left) && isNumeric(right)) return float(left.value * right.value)

  const repeated =
    right.type === 'int' ? repeat(left, right.value) : left.type === 'int' ? repeat(right, left.value) : undefined
  if (repeated) return repeated

  throw unsupported('*', left, right)
}

function divide(left: Value, right: Value): Value {
  if (!isNumeric(left) || !isNumeric(right)) throw unsupported('/', left, right)
  if (right.value === 0) throw divisionByZero('/')
  return float(left.value / right.value)
}

function floorDivide(left: Value, right: Value): Value {
  if (!isNumeric(left) || !isNumeric(right)) throw unsupported('//', left, right)
  if (right.value === 0) throw divisionByZero('//')
  const quotient = Math.floor(left.value / right.value)
  return left.type === 'int' && right.type === 'int' ? int(quotient) : float(quotient)
}

function modulo(left: Value, right: Value): Value {
  if (!isNumeric(left) || !isNumeric(right)) throw unsupported('%', left, right)
  if (right.value === 0) throw divisionByZero('%')
  if (left.type === 'int' && right.type === 'int') {
    // result takes the sign of the divisor
    return int(((left.value % right.value) + right.value) % right.value)
  }
  return float(left.value % right.value)
}

function power(left: Value, right: Value): Value {
  if (!isNumeric(left) || !isNumeric(right)) throw unsupported('**', left, right)
  if (left.value === 0 && right.value < 0) throw divisionByZero('**')
  if (left.type === 'int' && right.type === 'int' && right.value >= 0) {
    return int(left.value ** right.value)
  }
  return float(Math.pow(left.value, right.value))
}

// ============================================================================
// Comparison & Membership
// ============================================================================

function order(op: '<' | '>' | '<=' | '>=', left: Value, right: Value): boolean {
  const a = toFloat(left, `left side of '${op}'`)
  const b = toFloat(right, `right side of '${op}'`)
  switch (op) {
    case '<':
      return a < b
    case '>':
      return a > b
    case '<=':
      return a <= b
    case '>=':
      return a >= b
  }
}

/**
 * `item in container`: substring test for strings, element scan for lists,
 * key test for maps.
 */
export function contains(container: Value, item: Value): boolean {
  switch (container.type) {
    case 'string':
      if (item.type !== 'string') {
        throw new TemplateError('TypeError', `'in <string>' requires a string on the left, got ${typeName(item)}`)
      }
      return container.value.includes(item.value)
    case 'list':
      return container.items.some((element) => deepEquals(element, item))
    case 'map':
      return container.entries.has(toKey(item))
    case 'object':
      return container.target.getItem?.(item) !== undefined
    default:
      throw new TemplateError('TypeError', `argument of type '${typeName(container)}' is not a container`)
  }
}

// ============================================================================
// Dispatch
// ============================================================================

export function applyBinary(op: EagerOperator, left: Value, right: Value): Value {
  switch (op) {
    case '==':
    case 'is':
      return bool(deepEquals(left, right))
    case '!=':
    case 'is not':
      return bool(!deepEquals(left, right))
    case '<':
    case '>':
    case '<=':
    case '>=':
      return bool(order(op, left, right))
    case 'in':
      return bool(contains(right, left))
    case 'not in':
      return bool(!contains(right, left))
    case '+':
      return add(left, right)
    case '-':
      return subtract(left, right)
    case '*':
      return multiply(left, right)
    case '/':
      return divide(left, right)
    case '//':
      return floorDivide(left, right)
    case '%':
      return modulo(left, right)
    case '**':
      return power(left, right)
  }
}

export function applyUnary(op: UnaryOperator, operand: Value): Value {
  if (op === 'not') return bool(!isTruthy(operand))

  if (operand.type === 'int') return int(op === '-' ? -operand.value : operand.value)
  if (operand.type === 'float') return float(op === '-' ? -operand.value : operand.value)

  throw new TemplateError('TypeError', `bad operand type for unary ${op}: '${typeName(operand)}' ${repr(operand)}`)
}
