/**
 * Context Tests
 *
 * Render state, depth tracking and loop scopes.
 */

import { describe, it, expect } from 'vitest'
import {
  createRenderState,
  incrementDepth,
  decrementDepth,
  createLoopContext,
  loopValue,
  createIterationScope,
} from './context'
import { int, str, bool, map } from './values'
import type { EngineConfig, Value } from '../types'

// ============================================================================
// Helper Functions
// ============================================================================

function createTestConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    maxDepth: 3,
    warnOnUndefined: false,
    warnOnMalformed: false,
    ...overrides,
  }
}

// ============================================================================
// Render State
// ============================================================================

describe('createRenderState', () => {
  it('should start at depth zero without a trace', () => {
    const state = createRenderState(createTestConfig())
    expect(state.depth).toBe(0)
    expect(state.trace).toBeUndefined()
  })

  it('should create a trace context when enabled', () => {
    const state = createRenderState(createTestConfig(), { enableTrace: true })
    expect(state.trace?.nodeStack).toEqual([])
    expect(state.trace?.idCounter).toBe(0)
  })
})

describe('depth tracking', () => {
  it('should allow nesting up to maxDepth', () => {
    const state = createRenderState(createTestConfig({ maxDepth: 2 }))
    expect(incrementDepth(state)).toBe(true)
    expect(incrementDepth(state)).toBe(true)
    expect(incrementDepth(state)).toBe(false)
    expect(state.depth).toBe(3)
  })

  it('should not go below zero', () => {
    const state = createRenderState(createTestConfig())
    decrementDepth(state)
    expect(state.depth).toBe(0)
  })
})

// ============================================================================
// Loop Scopes
// ============================================================================

describe('createLoopContext', () => {
  it('should describe the first of three iterations', () => {
    expect(createLoopContext(0, 3)).toEqual({
      index: 1,
      index0: 0,
      first: true,
      last: false,
      length: 3,
      revindex: 3,
      revindex0: 2,
    })
  })

  it('should mark the last iteration', () => {
    const loop = createLoopContext(2, 3)
    expect(loop.last).toBe(true)
    expect(loop.first).toBe(false)
    expect(loop.revindex).toBe(1)
    expect(loop.revindex0).toBe(0)
  })

  it('should treat a single iteration as both first and last', () => {
    const loop = createLoopContext(0, 1)
    expect(loop.first && loop.last).toBe(true)
  })
})

describe('loopValue', () => {
  it('should expose loop metadata as a map', () => {
    const value = loopValue(createLoopContext(1, 2))
    expect(value).toEqual(
      map([
        ['index', int(2)],
        ['index0', int(1)],
        ['first', bool(false)],
        ['last', bool(true)],
        ['length', int(2)],
        ['revindex', int(1)],
        ['revindex0', int(0)],
      ])
    )
  })
})

describe('createIterationScope', () => {
  const outer = new Map<string, Value>([
    ['item', str('outer')],
    ['title', str('List')],
  ])

  it('should shadow outer variables for the iteration', () => {
    const scope = createIterationScope(outer, [['item', int(1)]], createLoopContext(0, 1))
    expect(scope.get('item')).toEqual(int(1))
    expect(scope.get('title')).toEqual(str('List'))
  })

  it('should leave the outer context untouched', () => {
    createIterationScope(outer, [['item', int(1)]], createLoopContext(0, 1))
    expect(outer.get('item')).toEqual(str('outer'))
    expect(outer.has('loop')).toBe(false)
  })

  it('should bind loop last so it wins over a loop variable of the same name', () => {
    const scope = createIterationScope(outer, [['loop', int(9)]], createLoopContext(0, 1))
    expect(scope.get('loop')?.type).toBe('map')
  })
})
