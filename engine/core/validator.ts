/**
 * Template Validator
 *
 * Static checks over a template without rendering it: tag structure,
 * expression syntax, control tag shape and filter names.
 */

import type { ExprNode, TemplateNode, ControlTagNode } from '../types'
import type { FilterRegistry } from '../registry'
import { isTemplateError } from './errors'
import { parseExpression } from './expression'
import { parseTemplate, parseForHeader, describeNode } from './parser'

// ============================================================================
// Types
// ============================================================================

export type ValidationSeverity = 'error' | 'warning' | 'info'

export interface ValidationIssue {
  severity: ValidationSeverity
  code: string
  message: string
  path?: string // Node index and offset of the problematic tag
  suggestion?: string
}

export interface ValidationResult {
  valid: boolean
  issues: ValidationIssue[]
  errors: ValidationIssue[]
  warnings: ValidationIssue[]
}

export interface ValidateOptions {
  /** When given, filter names are checked against it */
  filters?: FilterRegistry
}

interface OpenBlock {
  tag: ControlTagNode
  index: number
  sawElse: boolean
}

// ============================================================================
// Main Validator
// ============================================================================

/**
 * Validate a template source string
 */
export function validateTemplate(source: string, options: ValidateOptions = {}): ValidationResult {
  const issues: ValidationIssue[] = []

  const nodes = parseTemplate(source, {
    onMalformed: (opener, offset) => {
      issues.push({
        severity: 'warning',
        code: 'UNCLOSED_TAG',
        message: `'${opener}' at offset ${offset} is never closed and will render as text`,
        path: `offset ${offset}`,
      })
    },
  })

  validateStructure(nodes, issues)

  for (let i = 0; i < nodes.length; i++) {
    const node = nodes[i]
    if (node.type === 'expression') {
      checkExpression(node.content, nodePath(node, i), issues, options)
    } else if (node.type === 'control') {
      validateControlTag(node, nodePath(node, i), issues, options)
    }
  }

  const errors = issues.filter((issue) => issue.severity === 'error')
  const warnings = issues.filter((issue) => issue.severity === 'warning')

  return {
    valid: errors.length === 0,
    issues,
    errors,
    warnings,
  }
}

function nodePath(node: TemplateNode, index: number): string {
  return `nodes[${index}] (offset ${node.offset})`
}

// ============================================================================
// Block Structure
// ============================================================================

function validateStructure(nodes: readonly TemplateNode[], issues: ValidationIssue[]): void {
  const stack: OpenBlock[] = []

  for (let i = 0; i < nodes.length; i++) {
    const node = nodes[i]
    if (node.type !== 'control') continue

    const path = nodePath(node, i)
    const top = stack[stack.length - 1]

    switch (node.kind) {
      case 'if':
      case 'for':
        stack.push({ tag: node, index: i, sawElse: false })
        break

      case 'elif':
      case 'else':
        if (!top || top.tag.kind !== 'if') {
          issues.push(orphan(node, path, 'if'))
        } else if (top.sawElse) {
          issues.push({
            severity: 'error',
            code: 'BRANCH_AFTER_ELSE',
            message: `${describeNode(node)} follows {% else %} in the same if block`,
            path,
            suggestion: 'Move the else branch last',
          })
        } else if (node.kind === 'else') {
          top.sawElse = true
        }
        break

      case 'endif':
      case 'endfor': {
        const opener = node.kind === 'endif' ? 'if' : 'for'
        if (!top || top.tag.kind !== opener) {
          issues.push(orphan(node, path, opener))
        } else {
          stack.pop()
        }
        break
      }

      case 'unknown':
        break
    }
  }

  for (const open of stack) {
    const closer = open.tag.kind === 'if' ? 'endif' : 'endfor'
    issues.push({
      severity: 'error',
      code: 'UNCLOSED_BLOCK',
      message: `${describeNode(open.tag)} is never closed`,
      path: nodePath(open.tag, open.index),
      suggestion: `Add {% ${closer} %}`,
    })
  }
}

function orphan(node: ControlTagNode, path: string, opener: string): ValidationIssue {
  return {
    severity: 'error',
    code: 'ORPHAN_TAG',
    message: `${describeNode(node)} has no matching {% ${opener} %}`,
    path,
  }
}

// ============================================================================
// Tags & Expressions
// ============================================================================

function validateControlTag(
  node: ControlTagNode,
  path: string,
  issues: ValidationIssue[],
  options: ValidateOptions
): void {
  switch (node.kind) {
    case 'unknown':
      issues.push({
        severity: 'error',
        code: 'INVALID_CONTROL_TAG',
        message: node.expression,
        path,
        suggestion: 'Supported tags are if, elif, else, endif, for and endfor',
      })
      break

    case 'if':
    case 'elif':
      checkExpression(node.expression, path, issues, options)
      break

    case 'for': {
      const header = parseForHeader(node.expression)
      checkExpression(header.collection, path, issues, options)
      if (header.targets.includes('loop')) {
        issues.push({
          severity: 'warning',
          code: 'LOOP_SHADOWED',
          message: `Loop variable 'loop' is replaced by loop metadata inside ${describeNode(node)}`,
          path,
          suggestion: 'Rename the loop variable',
        })
      }
      break
    }

    default:
      break
  }
}

function checkExpression(source: string, path: string, issues: ValidationIssue[], options: ValidateOptions): void {
  let expr: ExprNode
  try {
    expr = parseExpression(source)
  } catch (error) {
    if (!isTemplateError(error)) throw error
    issues.push({
      severity: 'error',
      code: 'EXPRESSION_SYNTAX',
      message: `${error.kind} in '${source.trim()}': ${error.detail}`,
      path,
    })
    return
  }

  const filters = options.filters
  if (!filters) return

  for (const name of collectFilterNames(expr)) {
    if (!filters.has(name)) {
      issues.push({
        severity: 'error',
        code: 'UNKNOWN_FILTER',
        message: `Unknown filter '${name}'`,
        path,
      })
    }
  }
}

function collectFilterNames(node: ExprNode, names: Set<string> = new Set()): Set<string> {
  switch (node.type) {
    case 'filter':
      names.add(node.name)
      collectFilterNames(node.input, names)
      node.args.forEach((arg) => collectFilterNames(arg, names))
      break
    case 'unary':
      collectFilterNames(node.operand, names)
      break
    case 'binary':
      collectFilterNames(node.left, names)
      collectFilterNames(node.right, names)
      break
    case 'attribute':
      collectFilterNames(node.object, names)
      break
    case 'subscript':
      collectFilterNames(node.object, names)
      collectFilterNames(node.key, names)
      break
    case 'call':
      collectFilterNames(node.callee, names)
      node.args.forEach((arg) => collectFilterNames(arg, names))
      break
    case 'list':
      node.items.forEach((item) => collectFilterNames(item, names))
      break
    case 'dict':
      for (const entry of node.entries) {
        collectFilterNames(entry.key, names)
        collectFilterNames(entry.value, names)
      }
      break
    default:
      break
  }
  return names
}
