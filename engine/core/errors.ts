/**
 * Template Errors
 *
 * Single error class for every failure the engine can raise. The `kind`
 * field carries the taxonomy; `location` is attached once by the renderer.
 */

// ============================================================================
// Types
// ============================================================================

export type TemplateErrorKind =
  | 'LexError'
  | 'SyntaxError'
  | 'UndefinedVariable'
  | 'TypeError'
  | 'IndexError'
  | 'AttributeNotFound'
  | 'DivisionByZero'
  | 'NotCallable'
  | 'NotIterable'
  | 'UnclosedBlock'
  | 'MalformedControlTag'
  | 'UnknownFilter'
  | 'FilterError'
  | 'CallError'
  | 'RecursionLimit'

export interface ErrorLocation {
  /** Tag or expression as written, e.g. `{{ user.name }}` */
  tag: string
  /** Offset of the tag in the template source */
  offset: number
  /** Index of the node in the parsed template */
  nodeIndex?: number
}

export interface TemplateErrorOptions {
  location?: ErrorLocation
  cause?: unknown
  /** Variable name for UndefinedVariable errors */
  name?: string
}

// ============================================================================
// Error Class
// ============================================================================

export class TemplateError extends Error {
  readonly kind: TemplateErrorKind
  readonly location?: ErrorLocation
  readonly variable?: string
  /** Message without location prefix */
  readonly detail: string

  constructor(kind: TemplateErrorKind, detail: string, options: TemplateErrorOptions = {}) {
    super(formatMessage(kind, detail, options.location), { cause: options.cause })
    this.name = 'TemplateError'
    this.kind = kind
    this.detail = detail
    this.location = options.location
    this.variable = options.name
  }

  /**
   * Return a copy carrying the given location. An error that already has one
   * keeps the innermost location.
   */
  withLocation(location: ErrorLocation): TemplateError {
    if (this.location) return this
    return new TemplateError(this.kind, this.detail, {
      location,
      cause: this.cause,
      name: this.variable,
    })
  }
}

function formatMessage(kind: TemplateErrorKind, detail: string, location?: ErrorLocation): string {
  if (!location) return `${kind}: ${detail}`
  return `${kind}: ${detail} (in ${location.tag} at offset ${location.offset})`
}

// ============================================================================
// Helpers
// ============================================================================

export function isTemplateError(error: unknown): error is TemplateError {
  return error instanceof TemplateError
}

export function undefinedVariable(name: string): TemplateError {
  return new TemplateError('UndefinedVariable', `variable '${name}' is undefined`, { name })
}

/**
 * Wrap a failure thrown by a host callable. TemplateErrors pass through
 * unchanged so their kind survives.
 */
export function wrapHostError(kind: 'FilterError' | 'CallError', label: string, error: unknown): TemplateError {
  if (error instanceof TemplateError) return error
  const reason = error instanceof Error ? error.message : String(error)
  return new TemplateError(kind, `${label}: ${reason}`, { cause: error })
}
