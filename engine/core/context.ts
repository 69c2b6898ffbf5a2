/**
 * Render Context
 *
 * Per-render state (block depth, configuration, optional trace) and the
 * helpers that build loop scopes. Variable contexts are never mutated; each
 * loop iteration gets its own copy.
 */

import type { EngineConfig, Context, Value, LoopContext } from '../types'
import type { TraceContext } from './trace'
import { createTraceContext } from './trace'
import { bool, int, map } from './values'

// ============================================================================
// Types
// ============================================================================

export interface RenderState {
  /** Current block nesting depth */
  depth: number

  /** Engine configuration */
  config: EngineConfig

  /** Optional trace context - only present when tracing is enabled */
  trace?: TraceContext
}

export interface CreateRenderStateOptions {
  /** Enable trace mode for this render */
  enableTrace?: boolean
}

// ============================================================================
// State Factory
// ============================================================================

/**
 * Create a fresh render state
 */
export function createRenderState(config: EngineConfig, options?: CreateRenderStateOptions): RenderState {
  return {
    depth: 0,
    config,
    trace: options?.enableTrace ? createTraceContext() : undefined,
  }
}

// ============================================================================
// Depth Tracking
// ============================================================================

/**
 * Enter a nested block. Returns true if within the configured limit.
 */
export function incrementDepth(state: RenderState): boolean {
  state.depth++
  return state.depth <= state.config.maxDepth
}

export function decrementDepth(state: RenderState): void {
  state.depth = Math.max(0, state.depth - 1)
}

// ============================================================================
// Loop Scopes
// ============================================================================

/**
 * Loop metadata for the iteration at `index0` of `length`.
 */
export function createLoopContext(index0: number, length: number): LoopContext {
  return {
    index: index0 + 1,
    index0,
    first: index0 === 0,
    last: index0 === length - 1,
    length,
    revindex: length - index0,
    revindex0: length - index0 - 1,
  }
}

/** The `loop` variable as seen by templates */
export function loopValue(loop: LoopContext): Value {
  return map([
    ['index', int(loop.index)],
    ['index0', int(loop.index0)],
    ['first', bool(loop.first)],
    ['last', bool(loop.last)],
    ['length', int(loop.length)],
    ['revindex', int(loop.revindex)],
    ['revindex0', int(loop.revindex0)],
  ])
}

/**
 * Copy of `context` with the loop bindings and `loop` added. Bindings shadow
 * outer variables of the same name for the iteration only.
 */
export function createIterationScope(
  context: Context,
  bindings: ReadonlyArray<[string, Value]>,
  loop: LoopContext
): Context {
  const scope = new Map(context)
  for (const [name, value] of bindings) {
    scope.set(name, value)
  }
  scope.set('loop', loopValue(loop))
  return scope
}
