/**
 * Template Engine - TypeScript Types
 *
 * Shared value model, AST shapes, template nodes and configuration used by
 * every engine module.
 */

// ============================================================================
// Values
// ============================================================================

export type Value =
  | NullValue
  | BoolValue
  | IntValue
  | FloatValue
  | StringValue
  | ListValue
  | MapValue
  | CallableValue
  | ObjectValue

export type ValueType = Value['type']

export interface NullValue {
  type: 'null'
}

export interface BoolValue {
  type: 'bool'
  value: boolean
}

export interface IntValue {
  type: 'int'
  value: number
}

export interface FloatValue {
  type: 'float'
  value: number
}

export interface StringValue {
  type: 'string'
  value: string
}

export interface ListValue {
  type: 'list'
  items: readonly Value[]
}

export interface MapValue {
  type: 'map'
  entries: ReadonlyMap<string, Value>
}

export interface CallableValue {
  type: 'callable'
  /** Display name used in error messages and stringification */
  name: string
  call: (args: Value[]) => Value
}

/**
 * Host object exposed through explicit capabilities instead of reflection.
 * Every capability is optional; a missing one behaves like a lookup miss.
 */
export interface NativeObject {
  getAttribute?(name: string): Value | undefined
  getItem?(key: Value): Value | undefined
  call?(args: Value[]): Value
}

export interface ObjectValue {
  type: 'object'
  name: string
  target: NativeObject
}

/** Variable bindings for one render or evaluate call */
export type Context = ReadonlyMap<string, Value>

// ============================================================================
// Expression Tokens
// ============================================================================

export type TokenKind =
  | 'string'
  | 'int'
  | 'float'
  | 'bool'
  | 'none'
  | 'identifier'
  | 'operator'
  | 'lparen'
  | 'rparen'
  | 'lbracket'
  | 'rbracket'
  | 'lbrace'
  | 'rbrace'
  | 'comma'
  | 'dot'
  | 'colon'
  | 'pipe'
  | 'eof'

export interface Token {
  kind: TokenKind
  /** Source text; for strings, the unescaped content without quotes */
  text: string
  /** Offset of the token in the expression source */
  offset: number
}

// ============================================================================
// Expression AST
// ============================================================================

export type UnaryOperator = 'not' | '-' | '+'

export type BinaryOperator =
  | 'or'
  | 'and'
  | '=='
  | '!='
  | '>'
  | '<'
  | '>='
  | '<='
  | 'in'
  | 'not in'
  | 'is'
  | 'is not'
  | '+'
  | '-'
  | '*'
  | '/'
  | '//'
  | '%'
  | '**'

export type ExprNode =
  | LiteralNode
  | IdentifierNode
  | UnaryOpNode
  | BinaryOpNode
  | AttributeNode
  | SubscriptNode
  | CallNode
  | ListLiteralNode
  | DictLiteralNode
  | FilterNode

export interface LiteralNode {
  type: 'literal'
  value: Value
}

export interface IdentifierNode {
  type: 'identifier'
  name: string
}

export interface UnaryOpNode {
  type: 'unary'
  operator: UnaryOperator
  operand: ExprNode
}

export interface BinaryOpNode {
  type: 'binary'
  operator: BinaryOperator
  left: ExprNode
  right: ExprNode
}

export interface AttributeNode {
  type: 'attribute'
  object: ExprNode
  name: string
}

export interface SubscriptNode {
  type: 'subscript'
  object: ExprNode
  key: ExprNode
}

export interface CallNode {
  type: 'call'
  callee: ExprNode
  args: ExprNode[]
}

export interface ListLiteralNode {
  type: 'list'
  items: ExprNode[]
}

export interface DictLiteralNode {
  type: 'dict'
  entries: Array<{ key: ExprNode; value: ExprNode }>
}

/** One `| name(args)` step of a filter pipeline */
export interface FilterNode {
  type: 'filter'
  input: ExprNode
  name: string
  args: ExprNode[]
}

// ============================================================================
// Template Nodes
// ============================================================================

export type ControlTagKind = 'if' | 'elif' | 'else' | 'endif' | 'for' | 'endfor' | 'unknown'

export type TemplateNode = TextNode | ExpressionNode | CommentNode | ControlTagNode

export interface TextNode {
  type: 'text'
  content: string
  offset: number
}

export interface ExpressionNode {
  type: 'expression'
  /** Raw content between the delimiters, untrimmed */
  content: string
  offset: number
}

export interface CommentNode {
  type: 'comment'
  content: string
  offset: number
}

export interface ControlTagNode {
  type: 'control'
  kind: ControlTagKind
  /**
   * Condition for if/elif, loop header (`x in xs` / `k, v in m`) for for,
   * empty for closers, and the diagnostic message for unknown tags.
   */
  expression: string
  /** Trimmed tag interior as written */
  content: string
  offset: number
}

/** Parsed loop header of a `{% for %}` tag */
export interface ForHeader {
  /** One name, or two for key/value unpacking */
  targets: [string] | [string, string]
  collection: string
}

// ============================================================================
// Loop Metadata
// ============================================================================

export interface LoopContext {
  index: number
  index0: number
  first: boolean
  last: boolean
  length: number
  revindex: number
  revindex0: number
}

// ============================================================================
// Configuration
// ============================================================================

export interface EngineConfig {
  /** Maximum nesting of blocks during a render (default: 100) */
  maxDepth: number
  /** Log a warning when an undefined expression renders as empty text */
  warnOnUndefined: boolean
  /** Log a warning when an unclosed tag is kept as literal text */
  warnOnMalformed: boolean
}
