/**
 * Value predicates over type descriptors: zero values, zero checks and
 * direct assignability.
 */

import { z } from 'zod'
import { getConfiguration } from '../config'
import { RecursionLimitError } from '../errors'
import { isRecordLike } from '../utils'
import { type RecordDescriptor, type TypeDescriptor, fieldsOf } from './descriptor'

const INT32_MIN = -0x80000000
const INT32_MAX = 0x7fffffff
const UINT32_MAX = 0xffffffff

function guardDepth(depth: number): void {
  const { maxDepth } = getConfiguration()
  if (depth > maxDepth) throw new RecursionLimitError(maxDepth, '')
}

/**
 * The zero value of a type: '' / 0 / 0n / false for primitives, the absent
 * value for optionals, empty containers, and records of zero fields.
 */
export function zeroValue(type: TypeDescriptor, depth = 0): unknown {
  guardDepth(depth)

  switch (type.kind) {
    case 'string':
      return ''
    case 'bool':
      return false
    case 'int':
    case 'uint':
    case 'float':
      return 0
    case 'bigint':
      return 0n
    case 'optional':
      return type.absent
    case 'sequence':
      return []
    case 'mapping':
      return type.container === 'map' ? new Map() : {}
    case 'record':
      return zeroRecord(type, depth)
    case 'dynamic':
    case 'other':
      return undefined
  }
}

/**
 * A fresh record with every field at its zero value. Optional fields whose
 * zero is `undefined` are left out.
 */
export function zeroRecord(type: RecordDescriptor, depth = 0): Record<string, unknown> {
  const result: Record<string, unknown> = {}
  for (const field of fieldsOf(type)) {
    const zero = zeroValue(field.type, depth + 1)
    if (zero !== undefined) result[field.name] = zero
  }
  return result
}

/**
 * Whether a value is the zero value of its declared type. Absent values
 * are always zero; optionals are judged by the value they hold.
 */
export function isZero(value: unknown, type: TypeDescriptor, depth = 0): boolean {
  guardDepth(depth)
  if (value === undefined || value === null) return true

  switch (type.kind) {
    case 'string':
      return value === ''
    case 'bool':
      return value === false
    case 'int':
    case 'uint':
    case 'float':
      return value === 0
    case 'bigint':
      return value === 0n
    case 'optional':
      return isZero(value, type.inner, depth + 1)
    case 'sequence':
      return Array.isArray(value) && value.length === 0
    case 'mapping':
      if (value instanceof Map) return value.size === 0
      return isRecordLike(value) && Object.keys(value).length === 0
    case 'record':
      return (
        isRecordLike(value) &&
        fieldsOf(type).every(field => isZero(Reflect.get(value, field.name), field.type, depth + 1))
      )
    case 'dynamic':
    case 'other':
      return false
  }
}

/**
 * Whether a value already has the runtime shape of a type, so it can be
 * stored without conversion. Records must carry only declared keys.
 */
export function isAssignable(value: unknown, type: TypeDescriptor, depth = 0): boolean {
  guardDepth(depth)

  switch (type.kind) {
    case 'string':
      return typeof value === 'string'
    case 'bool':
      return typeof value === 'boolean'
    case 'int':
      if (typeof value !== 'number') return false
      return type.bits === 32
        ? Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX
        : Number.isSafeInteger(value)
    case 'uint':
      if (typeof value !== 'number' || value < 0) return false
      return type.bits === 32
        ? Number.isInteger(value) && value <= UINT32_MAX
        : Number.isSafeInteger(value)
    case 'float':
      if (typeof value !== 'number') return false
      return type.bits === 64 || Object.is(Math.fround(value), value)
    case 'bigint':
      if (typeof value !== 'bigint') return false
      if (type.bits === null) return true
      return type.signed ? BigInt.asIntN(64, value) === value : BigInt.asUintN(64, value) === value
    case 'optional':
      return value === type.absent || isAssignable(value, type.inner, depth + 1)
    case 'sequence':
      return Array.isArray(value) && value.every(item => isAssignable(item, type.element, depth + 1))
    case 'mapping':
      if (type.container === 'map') {
        if (!(value instanceof Map)) return false
        for (const [k, v] of value) {
          if (!isAssignable(k, type.key, depth + 1) || !isAssignable(v, type.value, depth + 1)) {
            return false
          }
        }
        return true
      }
      return (
        isRecordLike(value) &&
        Object.values(value).every(item => isAssignable(item, type.value, depth + 1))
      )
    case 'record': {
      if (!isRecordLike(value)) return false
      const fields = fieldsOf(type)
      const declared = new Set(fields.map(field => field.name))
      return (
        Object.keys(value).every(key => declared.has(key)) &&
        fields.every(field => isAssignable(Reflect.get(value, field.name), field.type, depth + 1))
      )
    }
    case 'dynamic':
      return true
    case 'other':
      return z.safeParse(type.schema, value).success
  }
}
