/**
 * Template Renderer
 *
 * Interprets a parsed node list against a context: text is copied, comments
 * dropped, expressions evaluated and stringified, and if/for blocks executed.
 * Errors are tagged once with the location of the innermost failing node.
 */

import type { Value, Context, ExprNode, TemplateNode, ExpressionNode, ControlTagNode, ForHeader } from '../types'
import type { Evaluator } from './evaluator'
import type { RenderState } from './context'
import { TemplateError, isTemplateError } from './errors'
import { parseExpression } from './expression'
import { describeNode, parseForHeader } from './parser'
import { findBlock, findIfBranches } from './blocks'
import { incrementDepth, decrementDepth, createLoopContext, createIterationScope } from './context'
import { beginTraceNode, endTraceNode, addTraceLeaf } from './trace'
import { str, isTruthy, stringify, typeName } from './values'

// ============================================================================
// Renderer Class
// ============================================================================

export class TemplateRenderer {
  /** Parsed expressions keyed by the node they came from */
  private readonly parsed = new WeakMap<TemplateNode, ExprNode>()

  constructor(private readonly evaluator: Evaluator) {}

  /**
   * Render the nodes in `[start, end)`.
   */
  render(
    nodes: readonly TemplateNode[],
    context: Context,
    state: RenderState,
    start = 0,
    end = nodes.length
  ): string {
    let output = ''
    let i = start

    while (i < end) {
      const node = nodes[i]
      try {
        switch (node.type) {
          case 'text':
            output += node.content
            i++
            break
          case 'comment':
            i++
            break
          case 'expression':
            output += this.renderExpression(node, context, state)
            i++
            break
          case 'control': {
            const result = this.renderControl(nodes, i, end, context, state)
            output += result.output
            i = result.next
            break
          }
        }
      } catch (error) {
        if (isTemplateError(error)) {
          throw error.withLocation({ tag: describeNode(node), offset: node.offset, nodeIndex: i })
        }
        throw error
      }
    }

    return output
  }

  // ==========================================================================
  // Expressions
  // ==========================================================================

  private expressionFor(node: TemplateNode, source: string): ExprNode {
    const cached = this.parsed.get(node)
    if (cached) return cached
    const parsed = parseExpression(source)
    this.parsed.set(node, parsed)
    return parsed
  }

  private renderExpression(node: ExpressionNode, context: Context, state: RenderState): string {
    const expr = this.expressionFor(node, node.content)
    const result = this.evaluator.evaluatePipeline(expr, context)

    if (result.state === 'undefined') {
      if (state.config.warnOnUndefined) {
        console.warn(`Undefined variable '${result.missing ?? ''}' rendered as empty in ${describeNode(node)}`)
      }
      addTraceLeaf(state, 'expression', describeNode(node), { raw: node.content }, { value: '' }, {
        type: 'expression',
        state: result.state,
        missing: result.missing,
      })
      return ''
    }

    const text = stringify(result.value)
    addTraceLeaf(state, 'expression', describeNode(node), { raw: node.content }, { value: text }, {
      type: 'expression',
      state: result.state,
      missing: result.missing,
    })
    return text
  }

  private evaluateCondition(tag: ControlTagNode, context: Context): boolean {
    return isTruthy(this.evaluator.evaluate(this.expressionFor(tag, tag.expression), context))
  }

  // ==========================================================================
  // Control Flow
  // ==========================================================================

  private renderControl(
    nodes: readonly TemplateNode[],
    index: number,
    end: number,
    context: Context,
    state: RenderState
  ): { output: string; next: number } {
    const tag = nodes[index]
    if (tag.type !== 'control') {
      throw new TemplateError('MalformedControlTag', `expected a control tag at node ${index}`)
    }

    switch (tag.kind) {
      case 'if':
        return this.withDepth(state, () => this.renderIf(nodes, index, end, context, state))
      case 'for':
        return this.withDepth(state, () => this.renderFor(tag, nodes, index, end, context, state))
      case 'unknown':
        throw new TemplateError('MalformedControlTag', tag.expression)
      default:
        throw new TemplateError('MalformedControlTag', `unexpected {% ${tag.content} %} without a matching opening tag`)
    }
  }

  private withDepth<T>(state: RenderState, fn: () => T): T {
    if (!incrementDepth(state)) {
      decrementDepth(state)
      throw new TemplateError('RecursionLimit', `block nesting exceeds the limit of ${state.config.maxDepth}`)
    }
    try {
      return fn()
    } finally {
      decrementDepth(state)
    }
  }

  private renderIf(
    nodes: readonly TemplateNode[],
    index: number,
    end: number,
    context: Context,
    state: RenderState
  ): { output: string; next: number } {
    const structure = findIfBranches(nodes, index, end)
    const opener = structure.branches[0].tag

    beginTraceNode(state, 'conditional', describeNode(opener), { raw: opener.content })

    const evaluated: Array<{ condition: string; matched: boolean }> = []
    let chosen = -1
    for (let b = 0; b < structure.branches.length; b++) {
      const { tag } = structure.branches[b]
      if (tag.kind === 'else') {
        chosen = b
        break
      }
      const matched = this.evaluateCondition(tag, context)
      evaluated.push({ condition: tag.expression, matched })
      if (matched) {
        chosen = b
        break
      }
    }

    let output = ''
    const branch = structure.branches[chosen]
    if (branch) {
      output = this.render(nodes, context, state, branch.bodyStart, branch.bodyEnd)
    }

    endTraceNode(state, { value: output }, { type: 'conditional', branch: chosen, evaluated })
    return { output, next: structure.endIndex + 1 }
  }

  private renderFor(
    tag: ControlTagNode,
    nodes: readonly TemplateNode[],
    index: number,
    end: number,
    context: Context,
    state: RenderState
  ): { output: string; next: number } {
    const span = findBlock(nodes, index, 'endfor', [], end)
    const closer = nodes[span.closerIndex]
    if (closer.type === 'control' && closer.kind === 'unknown') {
      throw new TemplateError('MalformedControlTag', closer.expression)
    }

    const header = parseForHeader(tag.expression)
    const collection = this.evaluator.evaluate(this.expressionFor(tag, header.collection), context)
    const rows = iterationBindings(header, collection)

    beginTraceNode(state, 'loop', describeNode(tag), { raw: tag.content })

    let output = ''
    rows.forEach((bindings, i) => {
      const scope = createIterationScope(context, bindings, createLoopContext(i, rows.length))
      beginTraceNode(state, 'iteration', `iteration ${i + 1}`, { raw: tag.content })
      const text = this.render(nodes, scope, state, span.bodyStart, span.bodyEnd)
      endTraceNode(state, { value: text })
      output += text
    })

    endTraceNode(state, { value: output }, {
      type: 'loop',
      targets: [...header.targets],
      collection: header.collection,
      iterations: rows.length,
    })

    return { output, next: span.closerIndex + 1 }
  }
}

// ============================================================================
// Iteration
// ============================================================================

/**
 * Turn a collection into per-iteration variable bindings.
 * Lists yield items, strings characters, and maps their values (or key/value
 * pairs when two loop variables are given). None iterates zero times.
 */
function iterationBindings(header: ForHeader, collection: Value): Array<Array<[string, Value]>> {
  const [first, second] = header.targets

  if (collection.type === 'map') {
    return Array.from(collection.entries, ([key, value]): Array<[string, Value]> =>
      second === undefined ? [[first, value]] : [[first, str(key)], [second, value]]
    )
  }

  let items: readonly Value[]
  switch (collection.type) {
    case 'null':
      items = []
      break
    case 'list':
      items = collection.items
      break
    case 'string':
      items = Array.from(collection.value, (ch) => str(ch))
      break
    default:
      throw new TemplateError('NotIterable', `'${typeName(collection)}' object is not iterable`)
  }

  return items.map((item): Array<[string, Value]> => {
    if (second === undefined) return [[first, item]]
    if (item.type !== 'list' || item.items.length !== 2) {
      throw new TemplateError('TypeError', `cannot unpack ${typeName(item)} into 2 loop variables`)
    }
    return [[first, item.items[0]], [second, item.items[1]]]
  })
}
