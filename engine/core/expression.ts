/**
 * Expression Parser
 *
 * Precedence-climbing recursive descent over lexer tokens. Produces the
 * expression AST, including filter pipelines (`value | name(args)`).
 */

import type { Token, TokenKind, ExprNode, BinaryOperator, UnaryOperator } from '../types'
import { TemplateError } from './errors'
import { tokenize } from './lexer'
import { NULL, bool, int, float, str } from './values'

// ============================================================================
// Precedence
// ============================================================================

const BINARY_PRECEDENCE: Record<BinaryOperator, number> = {
  or: 10,
  and: 20,
  '==': 40,
  '!=': 40,
  '>': 40,
  '<': 40,
  '>=': 40,
  '<=': 40,
  in: 40,
  'not in': 40,
  is: 40,
  'is not': 40,
  '+': 50,
  '-': 50,
  '*': 60,
  '/': 60,
  '//': 60,
  '%': 60,
  '**': 70,
}

const UNARY_PRECEDENCE: Record<UnaryOperator, number> = {
  not: 30,
  '-': 70,
  '+': 70,
}

function isBinaryOperator(text: string): text is BinaryOperator {
  return Object.prototype.hasOwnProperty.call(BINARY_PRECEDENCE, text)
}

function isUnaryOperator(text: string): text is UnaryOperator {
  return Object.prototype.hasOwnProperty.call(UNARY_PRECEDENCE, text)
}

const CLOSERS: Partial<Record<TokenKind, string>> = {
  rparen: ')',
  rbracket: ']',
  rbrace: '}',
}

// ============================================================================
// Parser
// ============================================================================

class ExpressionParser {
  private pos = 0

  constructor(private readonly tokens: Token[]) {}

  /**
   * Grammar:
   *   pipeline → binary(0) ('|' IDENT ('(' args ')')?)*
   *   binary   → unary (OP binary(prec + 1))*
   *   unary    → ('not' | '-' | '+') binary(prec) | postfix
   *   postfix  → primary ('.' IDENT | '[' pipeline ']' | '(' args ')')*
   *   primary  → literal | IDENT | '(' pipeline ')' | list | dict
   */
  parse(): ExprNode {
    const node = this.parsePipeline()
    const trailing = this.current()
    if (trailing.kind !== 'eof') {
      throw this.error(`unexpected token '${trailing.text}' after end of expression`, trailing)
    }
    return node
  }

  private current(): Token {
    return this.tokens[this.pos] ?? { kind: 'eof', text: '', offset: 0 }
  }

  private advance(): Token {
    const token = this.current()
    if (token.kind !== 'eof') {
      this.pos++
    }
    return token
  }

  private check(kind: TokenKind): boolean {
    return this.current().kind === kind
  }

  private expect(kind: TokenKind, what: string): Token {
    const token = this.current()
    if (token.kind !== kind) {
      const found = token.kind === 'eof' ? 'end of expression' : `'${token.text}'`
      throw this.error(`expected ${what}, found ${found}`, token)
    }
    return this.advance()
  }

  private error(message: string, token: Token): TemplateError {
    return new TemplateError('SyntaxError', `${message} at position ${token.offset}`)
  }

  // ==========================================================================
  // Pipelines & Operators
  // ==========================================================================

  private parsePipeline(): ExprNode {
    let node = this.parseBinary(0)

    while (this.check('pipe')) {
      this.advance()
      const name = this.expect('identifier', 'filter name after \'|\'').text
      const args = this.check('lparen') ? this.parseArguments() : []
      node = { type: 'filter', input: node, name, args }
    }

    return node
  }

  private parseBinary(minPrecedence: number): ExprNode {
    let left = this.parseUnary()

    for (;;) {
      const token = this.current()
      if (token.kind !== 'operator' || !isBinaryOperator(token.text)) break

      const precedence = BINARY_PRECEDENCE[token.text]
      if (precedence < minPrecedence) break

      this.advance()
      const right = this.parseBinary(precedence + 1)
      left = { type: 'binary', operator: token.text, left, right }
    }

    return left
  }

  private parseUnary(): ExprNode {
    const token = this.current()
    if (token.kind === 'operator' && isUnaryOperator(token.text)) {
      this.advance()
      const operand = this.parseBinary(UNARY_PRECEDENCE[token.text])
      return { type: 'unary', operator: token.text, operand }
    }
    return this.parsePostfix(this.parsePrimary())
  }

  private parsePostfix(node: ExprNode): ExprNode {
    let current = node

    for (;;) {
      if (this.check('dot')) {
        this.advance()
        const name = this.expect('identifier', 'attribute name after \'.\'').text
        current = { type: 'attribute', object: current, name }
      } else if (this.check('lbracket')) {
        this.advance()
        const key = this.parsePipeline()
        this.expect('rbracket', "']'")
        current = { type: 'subscript', object: current, key }
      } else if (this.check('lparen')) {
        current = { type: 'call', callee: current, args: this.parseArguments() }
      } else {
        return current
      }
    }
  }

  // ==========================================================================
  // Primaries
  // ==========================================================================

  private parsePrimary(): ExprNode {
    const token = this.advance()

    switch (token.kind) {
      case 'string':
        return { type: 'literal', value: str(token.text) }
      case 'int': {
        const parsed = parseInt(token.text, 10)
        if (!Number.isSafeInteger(parsed)) {
          throw new TemplateError('TypeError', `integer overflow: literal ${token.text} at position ${token.offset}`)
        }
        return { type: 'literal', value: int(parsed) }
      }
      case 'float':
        return { type: 'literal', value: float(parseFloat(token.text)) }
      case 'bool':
        return { type: 'literal', value: bool(token.text.toLowerCase() === 'true') }
      case 'none':
        return { type: 'literal', value: NULL }
      case 'identifier':
        return { type: 'identifier', name: token.text }
      case 'lparen': {
        const inner = this.parsePipeline()
        this.expect('rparen', "')'")
        return inner
      }
      case 'lbracket':
        return { type: 'list', items: this.parseSequence('rbracket') }
      case 'lbrace':
        return this.parseDict()
      case 'eof':
        throw this.error('unexpected end of expression', token)
      default:
        throw this.error(`unexpected token '${token.text}'`, token)
    }
  }

  /** Comma-separated expressions up to the closer, which is consumed */
  private parseSequence(closer: TokenKind): ExprNode[] {
    const items: ExprNode[] = []
    const closeText = CLOSERS[closer] ?? closer

    if (this.check(closer)) {
      this.advance()
      return items
    }

    for (;;) {
      items.push(this.parsePipeline())
      if (this.check(closer)) {
        this.advance()
        return items
      }
      this.expect('comma', `',' or '${closeText}'`)
    }
  }

  private parseArguments(): ExprNode[] {
    this.expect('lparen', "'('")
    return this.parseSequence('rparen')
  }

  private parseDict(): ExprNode {
    const entries: Array<{ key: ExprNode; value: ExprNode }> = []

    if (this.check('rbrace')) {
      this.advance()
      return { type: 'dict', entries }
    }

    for (;;) {
      const key = this.parsePipeline()
      this.expect('colon', "':' after dictionary key")
      const value = this.parsePipeline()
      entries.push({ key, value })

      if (this.check('rbrace')) {
        this.advance()
        return { type: 'dict', entries }
      }
      this.expect('comma', "',' or '}'")
    }
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Parse a token list into an expression AST.
 */
export function parseTokens(tokens: Token[]): ExprNode {
  return new ExpressionParser(tokens).parse()
}

/**
 * Tokenize and parse an expression source string.
 *
 * @example
 * parseExpression('user.name | upper')
 * // { type: 'filter', name: 'upper', input: { type: 'attribute', ... }, args: [] }
 */
export function parseExpression(source: string): ExprNode {
  return parseTokens(tokenize(source))
}

/**
 * Return the root identifier of a path expression (identifier followed by
 * attribute and subscript steps), or undefined for anything else.
 */
export function pathRoot(node: ExprNode): string | undefined {
  switch (node.type) {
    case 'identifier':
      return node.name
    case 'attribute':
    case 'subscript':
      return pathRoot(node.object)
    default:
      return undefined
  }
}
