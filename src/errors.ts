/**
 * Error classes for tag extraction and value coercion.
 *
 * Every error raised by the library extends {@link RecordTagError}. Wrapping
 * errors keep the underlying failure on `cause`.
 */

function messageOf(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}

/**
 * Base class for all recordtag errors.
 */
export class RecordTagError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'RecordTagError'
    Error.captureStackTrace?.(this, this.constructor)
  }
}

/**
 * Thrown when the Tag Walker is given something other than a record.
 */
export class NotARecordError extends RecordTagError {
  readonly actual: string

  constructor(actual: string) {
    super(`expected input to be a record; got ${actual}`)
    this.name = 'NotARecordError'
    this.actual = actual
  }
}

/**
 * Wraps an error thrown by a caller-supplied processor.
 */
export class ProcessorError extends RecordTagError {
  readonly field: string

  constructor(field: string, cause: unknown) {
    super(`error processing field '${field}': ${messageOf(cause)}`, { cause })
    this.name = 'ProcessorError'
    this.field = field
  }
}

/**
 * Thrown by `fieldRef()` for a key the record schema does not declare.
 */
export class UnknownFieldError extends RecordTagError {
  readonly field: string

  constructor(field: string) {
    super(`record has no field '${field}'`)
    this.name = 'UnknownFieldError'
    this.field = field
  }
}

/**
 * Base class for Coercion Engine failures.
 */
export abstract class CoercionError extends RecordTagError {}

export class NotAReferenceError extends CoercionError {
  readonly actual: string

  constructor(actual: string) {
    super(`field must be a FieldRef, got ${actual}`)
    this.name = 'NotAReferenceError'
    this.actual = actual
  }
}

export class NilReferenceError extends CoercionError {
  readonly key: string

  constructor(key: string) {
    super(`field reference '${key}' is nil`)
    this.name = 'NilReferenceError'
    this.key = key
  }
}

export class ReadonlyFieldError extends CoercionError {
  readonly key: string

  constructor(key: string) {
    super(`field '${key}' is not settable`)
    this.name = 'ReadonlyFieldError'
    this.key = key
  }
}

/**
 * A string could not be parsed as the destination's primitive kind.
 */
export class ParseError extends CoercionError {
  readonly kind: string
  readonly text: string

  constructor(kind: string, text: string, reason?: string) {
    super(`cannot parse ${JSON.stringify(text)} as ${kind}${reason ? `: ${reason}` : ''}`)
    this.name = 'ParseError'
    this.kind = kind
    this.text = text
  }
}

/**
 * No coercion rule matched the source value and destination type.
 */
export class UnsupportedConversionError extends CoercionError {
  readonly from: string
  readonly to: string

  constructor(from: string, to: string) {
    super(`cannot convert ${from} to ${to}`)
    this.name = 'UnsupportedConversionError'
    this.from = from
    this.to = to
  }
}

export class ElementConversionError extends CoercionError {
  readonly index: number

  constructor(index: number, cause: unknown) {
    super(`error converting element ${index}: ${messageOf(cause)}`, { cause })
    this.name = 'ElementConversionError'
    this.index = index
  }
}

export class FieldConversionError extends CoercionError {
  readonly field: string

  constructor(field: string, cause: unknown) {
    super(`error setting field ${field}: ${messageOf(cause)}`, { cause })
    this.name = 'FieldConversionError'
    this.field = field
  }
}

/**
 * Raised instead of overflowing the stack on self-referential records.
 */
export class RecursionLimitError extends RecordTagError {
  readonly limit: number
  readonly path: string

  constructor(limit: number, path: string) {
    super(`recursion limit of ${limit} exceeded${path ? ` at '${path}'` : ''}`)
    this.name = 'RecursionLimitError'
    this.limit = limit
    this.path = path
  }
}

export class TypeAssertionError extends RecordTagError {
  readonly expected: string
  readonly value: unknown

  constructor(expected: string, value: unknown, detail: string) {
    super(`type assertion to ${expected} failed: ${detail}`)
    this.name = 'TypeAssertionError'
    this.expected = expected
    this.value = value
  }
}

/**
 * Follow an error's `cause` chain to the innermost error.
 */
export function rootCause(error: unknown): unknown {
  const seen = new Set<unknown>()
  let current = error
  while (current instanceof Error && current.cause !== undefined && !seen.has(current)) {
    seen.add(current)
    current = current.cause
  }
  return current
}
