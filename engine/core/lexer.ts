/**
 * Expression Lexer
 *
 * Tokenizes the expression sublanguage used inside {{ ... }} and control tags.
 */

import type { Token, TokenKind } from '../types'
import { TemplateError } from './errors'

// ============================================================================
// Tables
// ============================================================================

const PUNCTUATION: Record<string, TokenKind> = {
  '(': 'lparen',
  ')': 'rparen',
  '[': 'lbracket',
  ']': 'rbracket',
  '{': 'lbrace',
  '}': 'rbrace',
  ',': 'comma',
  '.': 'dot',
  ':': 'colon',
  '|': 'pipe',
}

const TWO_CHAR_OPERATORS = new Set(['==', '!=', '>=', '<=', '**', '//'])
const ONE_CHAR_OPERATORS = new Set(['+', '-', '*', '/', '%', '<', '>'])
const WORD_OPERATORS = new Set(['and', 'or', 'not', 'in', 'is'])

const KEYWORD_LITERALS: Record<string, TokenKind> = {
  True: 'bool',
  true: 'bool',
  False: 'bool',
  false: 'bool',
  None: 'none',
  none: 'none',
}

const ESCAPES: Record<string, string> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  n: '\n',
  t: '\t',
  r: '\r',
}

// ============================================================================
// Character Classes
// ============================================================================

function isWhitespace(char: string): boolean {
  return char === ' ' || char === '\t' || char === '\n' || char === '\r'
}

function isDigit(char: string | undefined): boolean {
  return char !== undefined && char >= '0' && char <= '9'
}

function isIdentifierStart(char: string | undefined): boolean {
  return char !== undefined && /[A-Za-z_]/.test(char)
}

function isIdentifierPart(char: string | undefined): boolean {
  return char !== undefined && /[A-Za-z0-9_]/.test(char)
}

// ============================================================================
// Tokenizer
// ============================================================================

class Lexer {
  private readonly tokens: Token[] = []
  private pos = 0

  constructor(private readonly input: string) {}

  run(): Token[] {
    while (this.pos < this.input.length) {
      const char = this.input[this.pos]

      if (isWhitespace(char)) {
        this.pos++
        continue
      }

      const punctuation = PUNCTUATION[char]
      if (punctuation) {
        this.push(punctuation, char, this.pos)
        this.pos++
        continue
      }

      if (char === '"' || char === "'") {
        this.readString(char)
        continue
      }

      if (isDigit(char)) {
        this.readNumber()
        continue
      }

      if (this.readOperator()) {
        continue
      }

      if (isIdentifierStart(char)) {
        this.readWord()
        continue
      }

      throw new TemplateError('LexError', `unexpected character '${char}' at position ${this.pos}`)
    }

    this.push('eof', '', this.input.length)
    return this.tokens
  }

  private push(kind: TokenKind, text: string, offset: number): void {
    this.tokens.push({ kind, text, offset })
  }

  private readString(quoteChar: string): void {
    const start = this.pos
    let value = ''
    this.pos++ // Skip opening quote

    while (this.pos < this.input.length) {
      const char = this.input[this.pos]

      if (char === quoteChar) {
        this.pos++
        this.push('string', value, start)
        return
      }

      if (char === '\\' && this.pos + 1 < this.input.length) {
        const next = this.input[this.pos + 1]
        value += ESCAPES[next] ?? `\\${next}`
        this.pos += 2
        continue
      }

      value += char
      this.pos++
    }

    throw new TemplateError('LexError', `unterminated string literal at position ${start}`)
  }

  private readNumber(): void {
    const start = this.pos
    let sawDot = false

    while (this.pos < this.input.length) {
      const char = this.input[this.pos]
      if (isDigit(char)) {
        this.pos++
      } else if (char === '.' && !sawDot && isDigit(this.input[this.pos + 1])) {
        sawDot = true
        this.pos++
      } else {
        break
      }
    }

    const text = this.input.slice(start, this.pos)
    this.push(sawDot ? 'float' : 'int', text, start)
  }

  /**
   * Multi-word operators first, then two-character, then single-character.
   */
  private readOperator(): boolean {
    const rest = this.input.slice(this.pos)

    const multiWord = /^(not\s+in|is\s+not)(?![A-Za-z0-9_])/.exec(rest)
    if (multiWord) {
      const text = multiWord[1].startsWith('not') ? 'not in' : 'is not'
      this.push('operator', text, this.pos)
      this.pos += multiWord[0].length
      return true
    }

    const two = rest.slice(0, 2)
    if (TWO_CHAR_OPERATORS.has(two)) {
      this.push('operator', two, this.pos)
      this.pos += 2
      return true
    }

    const one = rest[0]
    if (ONE_CHAR_OPERATORS.has(one)) {
      this.push('operator', one, this.pos)
      this.pos++
      return true
    }

    return false
  }

  private readWord(): void {
    const start = this.pos
    while (isIdentifierPart(this.input[this.pos])) {
      this.pos++
    }
    const word = this.input.slice(start, this.pos)

    if (WORD_OPERATORS.has(word)) {
      this.push('operator', word, start)
    } else if (KEYWORD_LITERALS[word]) {
      this.push(KEYWORD_LITERALS[word], word, start)
    } else {
      this.push('identifier', word, start)
    }
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Tokenize an expression. The returned list always ends with an `eof` token.
 *
 * @example
 * tokenize('a not in b')  // identifier, operator "not in", identifier, eof
 */
export function tokenize(input: string): Token[] {
  return new Lexer(input).run()
}
