/**
 * Template Engine
 *
 * Entry point that wires parsing, evaluation and rendering together. Holds
 * configuration and the filter/function/method registries for its lifetime.
 */

import type { Value, Context, EngineConfig, TemplateNode, CallableValue, ValueType } from '../types'
import {
  createRegistries,
  type Registries,
  type FilterDefinition,
  type FilterRegistry,
  type FunctionRegistry,
  type MethodFn,
  type MethodRegistry,
} from '../registry'
import { Evaluator } from './evaluator'
import { TemplateRenderer } from './renderer'
import { parseTemplate } from './parser'
import { parseExpression } from './expression'
import { validateTemplate, type ValidationResult } from './validator'
import { createRenderState } from './context'
import { beginTraceNode, endTraceNode, extractTrace, type RenderTrace } from './trace'
import { createContext } from './values'

// ============================================================================
// Types
// ============================================================================

export interface EngineOptions {
  config?: Partial<EngineConfig>
  /** Extra or replacement filters, merged over the defaults */
  filters?: Record<string, FilterDefinition> | FilterRegistry
  /** Extra or replacement free functions, merged over the defaults */
  functions?: Record<string, CallableValue> | FunctionRegistry
  /** Extra or replacement methods by receiver type, merged over the defaults */
  methods?: Partial<Record<ValueType, Record<string, MethodFn>>> | MethodRegistry
}

export interface RenderOptions {
  /** Enable trace mode to capture execution details */
  enableTrace?: boolean
}

export interface TracedRender {
  output: string
  trace: RenderTrace | null
}

/** Variables may be given as Values or as plain JavaScript data */
export type ContextInput = Context | Record<string, unknown>

// ============================================================================
// Engine Class
// ============================================================================

export class TemplateEngine {
  private readonly config: EngineConfig
  private readonly registries: Registries
  private readonly evaluator: Evaluator
  private readonly renderer: TemplateRenderer

  constructor(options: EngineOptions = {}) {
    this.config = {
      maxDepth: options.config?.maxDepth ?? 100,
      warnOnUndefined: options.config?.warnOnUndefined ?? false,
      warnOnMalformed: options.config?.warnOnMalformed ?? false,
    }

    this.registries = createRegistries({
      filters: options.filters,
      functions: options.functions,
      methods: options.methods,
    })
    this.evaluator = new Evaluator(this.registries)
    this.renderer = new TemplateRenderer(this.evaluator)
  }

  // ==========================================================================
  // Parsing & Validation
  // ==========================================================================

  /**
   * Split a template into nodes
   */
  parse(template: string): readonly TemplateNode[] {
    return parseTemplate(template, {
      onMalformed: (opener, offset) => {
        if (this.config.warnOnMalformed) {
          console.warn(`Unclosed '${opener}' at offset ${offset} kept as literal text`)
        }
      },
    })
  }

  /**
   * Check a template for structural and syntax problems without rendering it
   */
  validate(template: string): ValidationResult {
    return validateTemplate(template, { filters: this.registries.filters })
  }

  // ==========================================================================
  // Rendering
  // ==========================================================================

  /**
   * Render a template string against a context.
   *
   * @example
   * engine.render('Hello {{ name | upper }}!', { name: 'ada' })  // 'Hello ADA!'
   */
  render(template: string | readonly TemplateNode[], context: ContextInput = {}, options?: RenderOptions): string {
    return this.renderWithTrace(template, context, { enableTrace: options?.enableTrace ?? false }).output
  }

  /**
   * Render and return the execution trace alongside the output. Tracing is
   * on unless `enableTrace` is explicitly false.
   */
  renderWithTrace(
    template: string | readonly TemplateNode[],
    context: ContextInput = {},
    options: RenderOptions = { enableTrace: true }
  ): TracedRender {
    const nodes = typeof template === 'string' ? this.parse(template) : template
    const state = createRenderState(this.config, options)

    beginTraceNode(state, 'root', 'Render', { raw: typeof template === 'string' ? template : '' })
    const output = this.renderer.render(nodes, toContext(context), state)
    endTraceNode(state, { value: output })

    return { output, trace: extractTrace(state) }
  }

  // ==========================================================================
  // Expressions
  // ==========================================================================

  /**
   * Evaluate a single expression. An undefined variable is always an error
   * here, unless a filter such as `default` rescues it.
   */
  evaluate(expression: string, context: ContextInput = {}): Value {
    return this.evaluator.evaluate(parseExpression(expression), toContext(context))
  }
}

function isContext(input: ContextInput): input is Context {
  return input instanceof Map
}

function toContext(input: ContextInput): Context {
  return isContext(input) ? input : createContext(input)
}

// ==========================================================================
// Default Engine
// ==========================================================================

let defaultEngine: TemplateEngine | undefined

function getDefaultEngine(): TemplateEngine {
  if (!defaultEngine) {
    defaultEngine = new TemplateEngine()
  }
  return defaultEngine
}

/**
 * Render a template with the default engine
 */
export function renderTemplate(template: string, context: ContextInput = {}): string {
  return getDefaultEngine().render(template, context)
}

/**
 * Evaluate an expression with the default engine
 */
export function evaluateExpression(expression: string, context: ContextInput = {}): Value {
  return getDefaultEngine().evaluate(expression, context)
}

// ==========================================================================
// Exports
// ==========================================================================

export { validateTemplate } from './validator'
export { parseTemplate, parseControlTag, parseForHeader, TemplateScanner } from './parser'
export { parseExpression } from './expression'
export { tokenize } from './lexer'
export { findBlock, findIfBranches } from './blocks'
export { Evaluator } from './evaluator'
export { TemplateError, isTemplateError } from './errors'
export { createContext, toValue, toNative, stringify, repr, isTruthy, deepEquals } from './values'
export { createRegistries, emptyRegistries } from '../registry'

// Re-export types
export type { ValidationResult, ValidationIssue } from './validator'
export type { EvaluationResult, Definedness } from './evaluator'
export type { TemplateErrorKind, ErrorLocation } from './errors'
export type { BlockSpan, IfBranch, IfStructure } from './blocks'
export type { RenderTrace, TraceNode, TraceNodeType, TraceStats } from './trace'
export type { Registries, FilterDefinition, FilterInvocation, MethodFn } from '../registry'
