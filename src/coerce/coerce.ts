/**
 * The Coercion Engine.
 *
 * Converts an arbitrary runtime value into the declared type of a field.
 * Conversion builds the new value first and writes it once, so a failed
 * conversion leaves the destination untouched.
 */

import { getConfiguration } from '../config'
import {
  type CoercionError,
  ElementConversionError,
  FieldConversionError,
  NilReferenceError,
  NotAReferenceError,
  RecordTagError,
  RecursionLimitError,
  UnsupportedConversionError
} from '../errors'
import {
  type RecordDescriptor,
  type TypeDescriptor,
  annotationOf,
  describe,
  fieldsOf,
  isNumericType,
  typeName
} from '../schema/descriptor'
import type { AnySchema } from '../schema/metadata'
import { isAssignable, zeroRecord, zeroValue } from '../schema/values'
import { formatValue, isRecordLike, valueTypeName } from '../utils'
import { FieldRef } from './field'
import { convertNumber, parsePrimitive } from './primitives'

type ConvertContext = {
  /** Tag key naming a field's serialization name */
  serializationKey: string
  maxDepth: number
}

/**
 * Coerce `value` into the field behind `field` and store it.
 *
 * @example
 * ```ts
 * const Query = z.object({ ids: z.array(z.int()), limit: z.int().optional() })
 * const query = { ids: [] }
 * setField(fieldRef(Query, query, 'ids'), '1, 2, 3')
 * setField(fieldRef(Query, query, 'limit'), 42.9)
 * // query => { ids: [1, 2, 3], limit: 42 }
 * ```
 */
export function setField(field: unknown, value: unknown): void {
  if (!(field instanceof FieldRef)) {
    throw new NotAReferenceError(valueTypeName(field))
  }
  if (field.isNil) {
    throw new NilReferenceError(field.key)
  }
  field.set(coerceValue(field.schema, value))
}

export type SetFieldResult = { success: true } | { success: false; error: RecordTagError }

/**
 * Like {@link setField}, but reports failure as a result instead of throwing.
 */
export function safeSetField(field: unknown, value: unknown): SetFieldResult {
  try {
    setField(field, value)
    return { success: true }
  } catch (error) {
    if (error instanceof RecordTagError) return { success: false, error }
    throw error
  }
}

/**
 * Coerce `value` into the type declared by `schema` and return it.
 */
export function coerceValue(schema: AnySchema, value: unknown): unknown {
  const { serializationKey, maxDepth } = getConfiguration()
  return convert(value, describe(schema), { serializationKey, maxDepth }, 0)
}

function convert(value: unknown, type: TypeDescriptor, ctx: ConvertContext, depth: number): unknown {
  if (depth > ctx.maxDepth) throw new RecursionLimitError(ctx.maxDepth, '')

  if (value === undefined || value === null) return zeroValue(type)
  if (isAssignable(value, type)) return value

  switch (type.kind) {
    case 'optional':
      return convert(value, type.inner, ctx, depth + 1)
    case 'dynamic':
      return value
    case 'record':
      return convertRecord(value, type, ctx, depth)
    case 'sequence':
      return convertSequence(value, type, ctx, depth)
    case 'mapping':
      throw unsupported(value, type)
    case 'string':
      return formatValue(value)
  }

  if (typeof value === 'string') return parsePrimitive(value, type)

  if ((typeof value === 'number' || typeof value === 'bigint') && isNumericType(type)) {
    return convertNumber(value, type)
  }

  throw unsupported(value, type)
}

function unsupported(value: unknown, type: TypeDescriptor): CoercionError {
  return new UnsupportedConversionError(valueTypeName(value), typeName(type))
}

/**
 * Build a record from a string-keyed mapping. Each field is looked up by
 * its serialization name, then by its declared name; fields with no match
 * keep their zero value and unmatched keys are ignored.
 */
function convertRecord(
  value: unknown,
  type: RecordDescriptor,
  ctx: ConvertContext,
  depth: number
): Record<string, unknown> {
  const source = asStringKeyedMapping(value)
  if (!source) throw unsupported(value, type)

  const result = zeroRecord(type)
  for (const field of fieldsOf(type)) {
    if (field.internal) continue

    const tag = annotationOf(field, ctx.serializationKey)
    if (tag === '-') continue

    const tagName = tag.split(',')[0] || field.name
    let found = source.lookup(tagName)
    if (!found.present && tagName !== field.name) found = source.lookup(field.name)
    if (!found.present) continue

    try {
      result[field.name] = convert(found.value, field.type, ctx, depth + 1)
    } catch (error) {
      if (error instanceof RecursionLimitError) throw error
      throw new FieldConversionError(field.name, error)
    }
  }
  return result
}

type Lookup = { present: true; value: unknown } | { present: false }

type StringKeyedMapping = { lookup(key: string): Lookup }

function asStringKeyedMapping(value: unknown): StringKeyedMapping | undefined {
  if (value instanceof Map) {
    const map: Map<unknown, unknown> = value
    for (const key of map.keys()) {
      if (typeof key !== 'string') return undefined
    }
    return {
      lookup: key => (map.has(key) ? { present: true, value: map.get(key) } : { present: false })
    }
  }
  if (isRecordLike(value)) {
    const object: object = value
    return {
      lookup: key =>
        Object.hasOwn(object, key) ? { present: true, value: Reflect.get(object, key) } : { present: false }
    }
  }
  return undefined
}

function convertSequence(
  value: unknown,
  type: Extract<TypeDescriptor, { kind: 'sequence' }>,
  ctx: ConvertContext,
  depth: number
): unknown[] {
  if (typeof value === 'string') {
    if (value === '') return []
    return convertElements(
      value.split(',').map(part => part.trim()),
      type.element,
      ctx,
      depth
    )
  }

  if (Array.isArray(value)) {
    return convertElements(value, type.element, ctx, depth)
  }

  if (isAssignable(value, type.element)) return [value]

  throw unsupported(value, type)
}

function convertElements(
  items: readonly unknown[],
  element: TypeDescriptor,
  ctx: ConvertContext,
  depth: number
): unknown[] {
  return items.map((item, index) => {
    try {
      return convert(item, element, ctx, depth + 1)
    } catch (error) {
      if (error instanceof RecursionLimitError) throw error
      throw new ElementConversionError(index, error)
    }
  })
}
