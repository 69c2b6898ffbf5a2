/**
 * Expression Evaluator
 *
 * Walks an expression AST against a context. Identifier misses are errors in
 * plain evaluation; the pipeline entry point instead reports them as an
 * undefined state that a rescuing filter such as `default` can resolve.
 */

import type {
  Value,
  Context,
  ExprNode,
  FilterNode,
  SubscriptNode,
  CallNode,
  BinaryOpNode,
} from '../types'
import type { Registries } from '../registry'
import { TemplateError, undefinedVariable, wrapHostError } from './errors'
import { applyBinary, applyUnary } from './operators'
import { pathRoot } from './expression'
import { NULL, str, list, map, callable, isTruthy, toInteger, toKey, typeName, repr } from './values'

// ============================================================================
// Types
// ============================================================================

/**
 * Whether an expression's root variable was found. `rescued` means it was
 * missing but a filter supplied a value.
 */
export type Definedness = 'defined' | 'undefined' | 'rescued'

export interface EvaluationResult {
  value: Value
  state: Definedness
  /** Name of the missing root variable when state is not `defined` */
  missing?: string
}

// ============================================================================
// Evaluator Class
// ============================================================================

export class Evaluator {
  constructor(private readonly registries: Registries) {}

  // ==========================================================================
  // Public API
  // ==========================================================================

  /**
   * Evaluate an expression. An undefined variable anywhere is an error unless
   * a filter rescues it.
   */
  evaluate(node: ExprNode, context: Context): Value {
    switch (node.type) {
      case 'literal':
        return node.value
      case 'identifier':
        return this.resolveIdentifier(node.name, context)
      case 'unary':
        return applyUnary(node.operator, this.evaluate(node.operand, context))
      case 'binary':
        return this.evaluateBinary(node, context)
      case 'attribute':
        return this.getAttribute(this.evaluate(node.object, context), node.name)
      case 'subscript':
        return this.evaluateSubscript(node, context)
      case 'call':
        return this.evaluateCall(node, context)
      case 'list':
        return list(node.items.map((item) => this.evaluate(item, context)))
      case 'dict':
        return map(
          node.entries.map(({ key, value }): [string, Value] => [
            toKey(this.evaluate(key, context)),
            this.evaluate(value, context),
          ])
        )
      case 'filter': {
        const result = this.evaluatePipeline(node, context)
        if (result.state === 'undefined') {
          throw undefinedVariable(result.missing ?? '')
        }
        return result.value
      }
    }
  }

  /**
   * Evaluate with tri-state definedness. A path expression (`a`, `a.b`,
   * `a[0]`) whose root is not bound yields Null in state `undefined` rather
   * than throwing.
   */
  evaluatePipeline(node: ExprNode, context: Context): EvaluationResult {
    if (node.type === 'filter') {
      return this.applyFilter(node, context)
    }

    const root = pathRoot(node)
    if (root !== undefined && !this.isBound(root, context)) {
      return { value: NULL, state: 'undefined', missing: root }
    }
    return { value: this.evaluate(node, context), state: 'defined' }
  }

  // ==========================================================================
  // Variables
  // ==========================================================================

  private isBound(name: string, context: Context): boolean {
    return context.has(name) || this.registries.functions.has(name)
  }

  private resolveIdentifier(name: string, context: Context): Value {
    const value = context.get(name) ?? this.registries.functions.get(name)
    if (value === undefined) {
      throw undefinedVariable(name)
    }
    return value
  }

  // ==========================================================================
  // Operators
  // ==========================================================================

  private evaluateBinary(node: BinaryOpNode, context: Context): Value {
    const left = this.evaluate(node.left, context)

    // and/or return an operand, not a bool
    if (node.operator === 'and') {
      return isTruthy(left) ? this.evaluate(node.right, context) : left
    }
    if (node.operator === 'or') {
      return isTruthy(left) ? left : this.evaluate(node.right, context)
    }

    return applyBinary(node.operator, left, this.evaluate(node.right, context))
  }

  // ==========================================================================
  // Access
  // ==========================================================================

  private bindMethod(receiver: Value, name: string): Value | undefined {
    const method = this.registries.methods.get(receiver.type)?.get(name)
    if (!method) return undefined
    return callable(`${typeName(receiver)}.${name}`, (args) => method(receiver, args))
  }

  private getAttribute(target: Value, name: string): Value {
    let found: Value | undefined

    if (target.type === 'map') {
      found = target.entries.get(name)
    } else if (target.type === 'object') {
      const getter = target.target.getAttribute
      if (getter) {
        const lookup = (key: string): Value | undefined => getter.call(target.target, key)
        found =
          lookup(name) ??
          lookup(name.toLowerCase()) ??
          lookup(name.charAt(0).toUpperCase() + name.slice(1))
      }
    }

    found = found ?? this.bindMethod(target, name)
    if (found === undefined) {
      throw new TemplateError('AttributeNotFound', `'${typeName(target)}' object has no attribute '${name}'`)
    }
    return found
  }

  private evaluateSubscript(node: SubscriptNode, context: Context): Value {
    const target = this.evaluate(node.object, context)
    const key = this.evaluate(node.key, context)
    return this.getItem(target, key)
  }

  private getItem(target: Value, key: Value): Value {
    switch (target.type) {
      case 'map': {
        const found = target.entries.get(toKey(key))
        if (found === undefined) {
          throw new TemplateError('AttributeNotFound', `key ${repr(key)} not found in dict`)
        }
        return found
      }
      case 'list':
        return target.items[this.resolveIndex(key, target.items.length)]
      case 'string': {
        const chars = Array.from(target.value)
        return str(chars[this.resolveIndex(key, chars.length)])
      }
      case 'object': {
        const found = target.target.getItem?.(key)
        if (found === undefined) {
          throw new TemplateError('AttributeNotFound', `key ${repr(key)} not found in ${target.name}`)
        }
        return found
      }
      default:
        throw new TemplateError('TypeError', `'${typeName(target)}' object is not subscriptable`)
    }
  }

  private resolveIndex(key: Value, length: number): number {
    const raw = toInteger(key)
    const index = raw < 0 ? raw + length : raw
    if (index < 0 || index >= length) {
      throw new TemplateError('IndexError', `index ${raw} out of range for length ${length}`)
    }
    return index
  }

  // ==========================================================================
  // Calls & Filters
  // ==========================================================================

  private evaluateCall(node: CallNode, context: Context): Value {
    const callee = this.evaluate(node.callee, context)
    const args = node.args.map((arg) => this.evaluate(arg, context))

    if (callee.type === 'callable') {
      try {
        return callee.call(args)
      } catch (error) {
        throw wrapHostError('CallError', callee.name, error)
      }
    }

    if (callee.type === 'object' && callee.target.call) {
      try {
        return callee.target.call(args)
      } catch (error) {
        throw wrapHostError('CallError', callee.name, error)
      }
    }

    throw new TemplateError('NotCallable', `'${typeName(callee)}' object is not callable`)
  }

  private applyFilter(node: FilterNode, context: Context): EvaluationResult {
    const definition = this.registries.filters.get(node.name)
    if (!definition) {
      throw new TemplateError('UnknownFilter', `no filter named '${node.name}'`)
    }

    const input = this.evaluatePipeline(node.input, context)
    const args = node.args.map((arg) => this.evaluate(arg, context))

    let value: Value
    try {
      value = definition.apply(input.value, args, {
        undefined: input.state === 'undefined',
        filters: this.registries.filters,
      })
    } catch (error) {
      throw wrapHostError('FilterError', `filter '${node.name}'`, error)
    }

    if (input.state === 'undefined' && definition.resolvesUndefined) {
      return { value, state: 'rescued', missing: input.missing }
    }
    return { ...input, value }
  }
}
