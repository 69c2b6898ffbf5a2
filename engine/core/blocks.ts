/**
 * Block Matching
 *
 * Locates the extent of if/for blocks in a parsed node list. Pure functions;
 * nothing here evaluates expressions.
 */

import type { TemplateNode, ControlTagNode, ControlTagKind } from '../types'
import { TemplateError } from './errors'
import { describeNode } from './parser'

// ============================================================================
// Types
// ============================================================================

export interface BlockSpan {
  /** First body node (the node after the opening tag) */
  bodyStart: number
  /** One past the last body node */
  bodyEnd: number
  /** Index of the tag that ended the segment */
  closerIndex: number
}

export interface IfBranch {
  /** The if, elif or else tag opening this branch */
  tag: ControlTagNode
  tagIndex: number
  bodyStart: number
  bodyEnd: number
}

export interface IfStructure {
  branches: IfBranch[]
  endIndex: number
}

function controlKind(node: TemplateNode | undefined): ControlTagKind | undefined {
  return node !== undefined && node.type === 'control' ? node.kind : undefined
}

// ============================================================================
// findBlock
// ============================================================================

/**
 * Scan forward from the tag at `start` to the end of its current segment.
 *
 * Nested if/endif and for/endfor pairs are counted separately. While no nested
 * block is open, a stopper tag (such as elif or else) or an unknown tag ends
 * the segment, as does the expected closer.
 *
 * @throws TemplateError UnclosedBlock when `end` is reached first
 */
export function findBlock(
  nodes: readonly TemplateNode[],
  start: number,
  closer: 'endif' | 'endfor',
  stoppers: readonly ControlTagKind[] = [],
  end: number = nodes.length
): BlockSpan {
  let ifDepth = 0
  let forDepth = 0

  for (let i = start + 1; i < end; i++) {
    const kind = controlKind(nodes[i])
    if (kind === undefined) continue

    const outermost = ifDepth === 0 && forDepth === 0
    if (outermost && (kind === 'unknown' || stoppers.includes(kind) || kind === closer)) {
      return { bodyStart: start + 1, bodyEnd: i, closerIndex: i }
    }

    switch (kind) {
      case 'if':
        ifDepth++
        break
      case 'endif':
        if (ifDepth > 0) ifDepth--
        break
      case 'for':
        forDepth++
        break
      case 'endfor':
        if (forDepth > 0) forDepth--
        break
    }
  }

  const opener = nodes[start]
  const label = opener === undefined ? `node ${start}` : describeNode(opener)
  throw new TemplateError('UnclosedBlock', `${label} at node ${start} is never closed by {% ${closer} %}`)
}

// ============================================================================
// If Structure
// ============================================================================

/**
 * Collect every branch of the if block starting at `start`, up to its endif.
 *
 * @throws TemplateError UnclosedBlock, or MalformedControlTag when a branch is
 * ended by an unknown tag or something follows `else` other than endif
 */
export function findIfBranches(
  nodes: readonly TemplateNode[],
  start: number,
  end: number = nodes.length
): IfStructure {
  const branches: IfBranch[] = []
  let cursor = start

  for (;;) {
    const tag = nodes[cursor]
    if (tag === undefined || tag.type !== 'control') {
      throw new TemplateError('MalformedControlTag', `expected a control tag at node ${cursor}`)
    }

    const span = findBlock(nodes, cursor, 'endif', ['elif', 'else'], end)
    branches.push({ tag, tagIndex: cursor, bodyStart: span.bodyStart, bodyEnd: span.bodyEnd })

    const closer = nodes[span.closerIndex]
    if (closer === undefined || closer.type !== 'control') {
      throw new TemplateError('MalformedControlTag', `expected a control tag at node ${span.closerIndex}`)
    }

    switch (closer.kind) {
      case 'endif':
        return { branches, endIndex: span.closerIndex }
      case 'unknown':
        throw new TemplateError('MalformedControlTag', closer.expression)
      case 'elif':
      case 'else':
        if (tag.kind === 'else') {
          throw new TemplateError('MalformedControlTag', `unexpected {% ${closer.content} %} after {% else %}`)
        }
        cursor = span.closerIndex
        break
      default:
        throw new TemplateError('MalformedControlTag', `unexpected {% ${closer.content} %} inside if block`)
    }
  }
}
