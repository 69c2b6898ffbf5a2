/**
 * Trace Mode Module
 *
 * Records how a render produced its output: which expressions were evaluated
 * and to what, which branch of each if block was taken, and how many times
 * each loop ran.
 */

import type { RenderState } from './context'
import type { Definedness } from './evaluator'

// ============================================================================
// Core Types
// ============================================================================

/**
 * A single traced operation. Nodes form a tree via `children`.
 */
export interface TraceNode {
  /** Unique ID for this node */
  id: string

  type: TraceNodeType

  /** Human-readable label for display */
  label: string

  /** Timestamp when this operation started (ms) */
  startTime: number

  /** Duration of this operation (ms), set on completion */
  duration?: number

  input: TraceInput
  output: TraceOutput
  children: TraceNode[]
  metadata?: TraceMetadata
}

export type TraceNodeType =
  | 'root' // Whole render
  | 'expression' // {{ ... }} evaluation
  | 'conditional' // if/elif/else block
  | 'loop' // for block
  | 'iteration' // one pass through a loop body

export interface TraceInput {
  /** Tag or expression as written */
  raw: string
}

export interface TraceOutput {
  value: string
}

// ============================================================================
// Type-Specific Metadata
// ============================================================================

export type TraceMetadata = ExpressionMetadata | ConditionalMetadata | LoopMetadata

export interface ExpressionMetadata {
  type: 'expression'
  /** Whether the root variable was found, missing, or rescued by a filter */
  state: Definedness
  /** Root variable that was missing, if any */
  missing?: string
}

export interface ConditionalMetadata {
  type: 'conditional'
  /** Index of the branch taken, or -1 when none matched */
  branch: number
  /** Conditions evaluated before a branch was chosen */
  evaluated: Array<{ condition: string; matched: boolean }>
}

export interface LoopMetadata {
  type: 'loop'
  targets: string[]
  collection: string
  iterations: number
}

// ============================================================================
// Trace Result
// ============================================================================

export interface RenderTrace {
  root: TraceNode
  /** Total render time (ms) */
  totalTime: number
  stats: TraceStats
}

export interface TraceStats {
  nodeCount: number
  maxDepth: number
  typeBreakdown: Partial<Record<TraceNodeType, number>>
  /** Root variables that rendered as undefined */
  undefinedVariables: string[]
}

// ============================================================================
// Trace Context (carried on RenderState)
// ============================================================================

export interface TraceContext {
  /** Stack of open nodes (for building the tree) */
  nodeStack: TraceNode[]

  /** Counter for generating unique node IDs */
  idCounter: number

  startTime: number

  /** Saved once the root is pushed so it survives the stack emptying */
  rootNode?: TraceNode
}

// ============================================================================
// Helper Functions
// ============================================================================

function createNode(
  trace: TraceContext,
  type: TraceNodeType,
  label: string,
  input: TraceInput,
  output: TraceOutput = { value: '' }
): TraceNode {
  return {
    id: `trace-${trace.idCounter++}`,
    type,
    label,
    startTime: Date.now(),
    input,
    output,
    children: [],
  }
}

/**
 * Start a new trace node and push it onto the stack.
 * Returns the node if tracing is enabled, null otherwise.
 */
export function beginTraceNode(
  state: RenderState,
  type: TraceNodeType,
  label: string,
  input: TraceInput
): TraceNode | null {
  const trace = state.trace
  if (!trace) return null

  const node = createNode(trace, type, label, input)
  const parent = trace.nodeStack[trace.nodeStack.length - 1]
  if (parent) {
    parent.children.push(node)
  } else {
    trace.rootNode = node
  }

  trace.nodeStack.push(node)
  return node
}

/**
 * Complete the innermost open node and pop it from the stack
 */
export function endTraceNode(state: RenderState, output: TraceOutput, metadata?: TraceMetadata): void {
  const trace = state.trace
  if (!trace) return

  const node = trace.nodeStack.pop()
  if (node) {
    node.duration = Date.now() - node.startTime
    node.output = output
    if (metadata) {
      node.metadata = metadata
    }
  }
}

/**
 * Add a completed leaf under the innermost open node.
 */
export function addTraceLeaf(
  state: RenderState,
  type: TraceNodeType,
  label: string,
  input: TraceInput,
  output: TraceOutput,
  metadata?: TraceMetadata
): void {
  const trace = state.trace
  if (!trace) return

  const node = createNode(trace, type, label, input, output)
  node.duration = 0
  node.metadata = metadata

  const parent = trace.nodeStack[trace.nodeStack.length - 1]
  if (parent) {
    parent.children.push(node)
  }
}

export function createTraceContext(): TraceContext {
  return {
    nodeStack: [],
    idCounter: 0,
    startTime: Date.now(),
  }
}

/**
 * Extract the completed trace, or null when tracing was off or nothing ran.
 */
export function extractTrace(state: RenderState): RenderTrace | null {
  const trace = state.trace
  if (!trace || !trace.rootNode) {
    return null
  }

  const root = trace.rootNode
  return {
    root,
    totalTime: Date.now() - trace.startTime,
    stats: computeTraceStats(root),
  }
}

function computeTraceStats(root: TraceNode): TraceStats {
  const stats: TraceStats = {
    nodeCount: 0,
    maxDepth: 0,
    typeBreakdown: {},
    undefinedVariables: [],
  }

  function traverse(node: TraceNode, depth: number): void {
    stats.nodeCount++
    stats.maxDepth = Math.max(stats.maxDepth, depth)
    stats.typeBreakdown[node.type] = (stats.typeBreakdown[node.type] ?? 0) + 1

    const meta = node.metadata
    if (meta?.type === 'expression' && meta.state === 'undefined' && meta.missing) {
      stats.undefinedVariables.push(meta.missing)
    }

    for (const child of node.children) {
      traverse(child, depth + 1)
    }
  }

  traverse(root, 0)
  stats.undefinedVariables = [...new Set(stats.undefinedVariables)]

  return stats
}
