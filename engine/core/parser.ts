/**
 * Template Parser
 *
 * Splits raw template text into text, `{{ expression }}`, `{# comment #}` and
 * `{% control %}` nodes. Tags that never close are kept as literal text.
 */

import type { TemplateNode, ControlTagKind, ForHeader } from '../types'
import { TemplateError } from './errors'

// ============================================================================
// Types
// ============================================================================

export interface ScannerOptions {
  /** Called when an opener has no closer and is kept as text */
  onMalformed?: (opener: string, offset: number) => void
}

export interface ControlTagInfo {
  kind: ControlTagKind
  expression: string
}

const OPENERS = ['{{', '{%', '{#'] as const

const CLOSERS: Record<'{{' | '{%', string> = {
  '{{': '}}',
  '{%': '%}',
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/

// ============================================================================
// Tag Scanning
// ============================================================================

/**
 * Find the closer matching the opener at `start`. Nested pairs of the same
 * family are counted and quoted strings are skipped. Returns the index of the
 * closer, or -1 when it is missing or a string is left open.
 */
function findCloser(source: string, start: number, opener: '{{' | '{%'): number {
  const closer = CLOSERS[opener]
  let level = 1
  let i = start + 2

  while (i < source.length) {
    const char = source[i]

    if (char === '"' || char === "'") {
      i++
      let closed = false
      while (i < source.length) {
        if (source[i] === '\\') {
          i += 2
          continue
        }
        if (source[i] === char) {
          closed = true
          i++
          break
        }
        i++
      }
      if (!closed) return -1
      continue
    }

    const pair = source.slice(i, i + 2)
    if (pair === opener) {
      level++
      i += 2
    } else if (pair === closer) {
      level--
      if (level === 0) return i
      i += 2
    } else {
      i++
    }
  }

  return -1
}

function nextOpener(source: string, from: number): number {
  let earliest = -1
  for (const opener of OPENERS) {
    const at = source.indexOf(opener, from)
    if (at !== -1 && (earliest === -1 || at < earliest)) {
      earliest = at
    }
  }
  return earliest
}

// ============================================================================
// Scanner
// ============================================================================

/**
 * Resumable scanner. Each call to `next()` yields one node, or undefined once
 * the input is exhausted.
 *
 * @example
 * const scanner = new TemplateScanner('Hi {{ name }}!')
 * scanner.next() // { type: 'text', content: 'Hi ', offset: 0 }
 * scanner.next() // { type: 'expression', content: ' name ', offset: 3 }
 */
export class TemplateScanner {
  private pos = 0

  constructor(
    private readonly source: string,
    private readonly options: ScannerOptions = {}
  ) {}

  next(): TemplateNode | undefined {
    if (this.pos >= this.source.length) return undefined

    const start = this.pos
    const opener = this.source.slice(start, start + 2)

    if (opener === '{#') {
      const end = this.source.indexOf('#}', start + 2)
      if (end !== -1) {
        this.pos = end + 2
        return { type: 'comment', content: this.source.slice(start + 2, end), offset: start }
      }
      return this.literal(opener, start)
    }

    if (opener === '{{' || opener === '{%') {
      const end = findCloser(this.source, start, opener)
      if (end === -1) return this.literal(opener, start)

      this.pos = end + 2
      const content = this.source.slice(start + 2, end)
      if (opener === '{{') {
        return { type: 'expression', content, offset: start }
      }

      const trimmed = content.trim()
      const info = parseControlTag(trimmed)
      return { type: 'control', kind: info.kind, expression: info.expression, content: trimmed, offset: start }
    }

    const next = nextOpener(this.source, start)
    const end = next === -1 ? this.source.length : next
    this.pos = end
    return { type: 'text', content: this.source.slice(start, end), offset: start }
  }

  /** Emit an unclosed opener and the text after it, up to the next opener */
  private literal(opener: string, start: number): TemplateNode {
    this.options.onMalformed?.(opener, start)
    const next = nextOpener(this.source, start + 1)
    const end = next === -1 ? this.source.length : next
    this.pos = end
    return { type: 'text', content: this.source.slice(start, end), offset: start }
  }
}

/**
 * Parse a whole template. The returned node list is frozen.
 */
export function parseTemplate(source: string, options: ScannerOptions = {}): readonly TemplateNode[] {
  const scanner = new TemplateScanner(source, options)
  const nodes: TemplateNode[] = []

  for (let node = scanner.next(); node !== undefined; node = scanner.next()) {
    nodes.push(Object.freeze(node))
  }

  return Object.freeze(nodes)
}

// ============================================================================
// Control Tags
// ============================================================================

function describeTagError(content: string, reason: string): ControlTagInfo {
  return { kind: 'unknown', expression: `Error parsing tag '${content}': ${reason}` }
}

/**
 * Classify the trimmed interior of a `{% ... %}` tag. Malformed tags come
 * back as `unknown` with a diagnostic in `expression`.
 */
export function parseControlTag(content: string): ControlTagInfo {
  const trimmed = content.trim()
  if (trimmed === '') {
    return describeTagError(content, 'empty control tag')
  }

  const head = trimmed.split(/\s/, 1)[0]
  const keyword = head.toLowerCase()
  const rest = trimmed.slice(head.length).trim()

  switch (keyword) {
    case 'if':
    case 'elif':
      if (rest === '') {
        return describeTagError(content, `${keyword} tag requires a condition`)
      }
      return { kind: keyword, expression: rest }

    case 'else':
    case 'endif':
    case 'endfor':
      if (rest !== '') {
        return describeTagError(content, `${keyword} tag does not take arguments`)
      }
      return { kind: keyword, expression: '' }

    case 'for': {
      const header = readForHeader(rest)
      if (typeof header === 'string') {
        return describeTagError(content, header)
      }
      return { kind: 'for', expression: formatForHeader(header) }
    }

    default:
      return { kind: 'unknown', expression: content }
  }
}

/**
 * Split `x in xs` or `k, v in m` into targets and collection source. Returns
 * a reason string when the header is malformed.
 */
function readForHeader(header: string): ForHeader | string {
  const match = /^([\s\S]*?)\s+in\s+([\s\S]+)$/.exec(header)
  if (!match) {
    return "for tag requires 'in', e.g. {% for item in items %}"
  }

  const names = match[1].split(',').map((name) => name.trim())
  if (names.some((name) => !IDENTIFIER.test(name))) {
    return `invalid loop variable '${match[1].trim()}'`
  }

  const collection = match[2].trim()
  if (names.length === 1) return { targets: [names[0]], collection }
  if (names.length === 2) return { targets: [names[0], names[1]], collection }
  return `cannot unpack into ${names.length} loop variables`
}

function formatForHeader(header: ForHeader): string {
  return `${header.targets.join(', ')} in ${header.collection}`
}

/**
 * Parse the normalized header stored on a `for` node.
 */
export function parseForHeader(expression: string): ForHeader {
  const header = readForHeader(expression)
  if (typeof header === 'string') {
    throw new TemplateError('MalformedControlTag', header)
  }
  return header
}

// ============================================================================
// Utilities
// ============================================================================

/**
 * Source form of a node, used in error locations and validation messages.
 */
export function describeNode(node: TemplateNode): string {
  switch (node.type) {
    case 'text':
      return node.content
    case 'expression':
      return `{{${node.content}}}`
    case 'comment':
      return `{#${node.content}#}`
    case 'control':
      return `{% ${node.content} %}`
  }
}
