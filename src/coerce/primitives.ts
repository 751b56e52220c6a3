/**
 * Scalar conversions: parsing strings into primitives and narrowing numbers
 * between the numeric families.
 */

import { ParseError, UnsupportedConversionError } from '../errors'
import { type NumericDescriptor, type TypeDescriptor, typeName } from '../schema/descriptor'

const SIGNED_INTEGER = /^[+-]?\d+$/
const UNSIGNED_INTEGER = /^\d+$/
const DECIMAL_FLOAT = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/
const INFINITY = /^([+-]?)(?:inf|infinity)$/i
const NOT_A_NUMBER = /^nan$/i

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n
const UINT64_MAX = 2n ** 64n - 1n

/**
 * Parse `text` with the canonical grammar of a primitive destination.
 *
 * Integers are base 10 and must fit 64 bits before being narrowed to the
 * destination width. Booleans accept exactly `true`, `false`, `1` and `0`.
 */
export function parsePrimitive(text: string, type: TypeDescriptor): unknown {
  switch (type.kind) {
    case 'string':
      return text
    case 'bool':
      return parseBool(text)
    case 'int':
    case 'uint':
    case 'bigint':
      return narrowInteger(parseInteger(text, type), type)
    case 'float':
      return narrowFloat(parseFloat64(text), type)
    default:
      throw new UnsupportedConversionError('string', typeName(type))
  }
}

function parseBool(text: string): boolean {
  switch (text) {
    case 'true':
    case '1':
      return true
    case 'false':
    case '0':
      return false
    default:
      throw new ParseError('bool', text, 'invalid syntax')
  }
}

function parseInteger(text: string, type: NumericDescriptor): bigint {
  const signed = type.kind === 'int' || (type.kind === 'bigint' && type.signed)
  const kind = signed ? 'int' : 'uint'

  if (!(signed ? SIGNED_INTEGER : UNSIGNED_INTEGER).test(text)) {
    throw new ParseError(kind, text, 'invalid syntax')
  }

  const value = BigInt(text)
  const unbounded = type.kind === 'bigint' && type.bits === null
  if (!unbounded) {
    const inRange = signed ? value >= INT64_MIN && value <= INT64_MAX : value <= UINT64_MAX
    if (!inRange) throw new ParseError(kind, text, 'value out of range')
  }
  return value
}

function parseFloat64(text: string): number {
  if (NOT_A_NUMBER.test(text)) return Number.NaN

  const infinity = INFINITY.exec(text)
  if (infinity) return infinity[1] === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY

  if (!DECIMAL_FLOAT.test(text)) throw new ParseError('float', text, 'invalid syntax')

  const value = Number(text)
  if (!Number.isFinite(value)) throw new ParseError('float', text, 'value out of range')
  return value
}

/**
 * Convert between numeric families. Floats truncate toward zero when the
 * destination is an integer; integers wrap silently to the destination
 * width. Plain (non 32-bit) integer destinations behave as 64-bit integers.
 */
export function convertNumber(value: number | bigint, type: NumericDescriptor): number | bigint {
  if (type.kind === 'float') {
    return narrowFloat(typeof value === 'bigint' ? Number(value) : value, type)
  }
  return narrowInteger(toBigInt(value), type)
}

function toBigInt(value: number | bigint): bigint {
  if (typeof value === 'bigint') return value
  // NaN and the infinities have no integer value
  if (!Number.isFinite(value)) return 0n
  return BigInt(Math.trunc(value))
}

function narrowInteger(value: bigint, type: NumericDescriptor): number | bigint {
  switch (type.kind) {
    case 'int':
      return Number(BigInt.asIntN(type.bits, value))
    case 'uint':
      return Number(BigInt.asUintN(type.bits, value))
    case 'bigint':
      if (type.bits === null) return value
      return type.signed ? BigInt.asIntN(64, value) : BigInt.asUintN(64, value)
    case 'float':
      return narrowFloat(Number(value), type)
  }
}

function narrowFloat(value: number, type: Extract<TypeDescriptor, { kind: 'float' }>): number {
  return type.bits === 32 ? Math.fround(value) : value
}
