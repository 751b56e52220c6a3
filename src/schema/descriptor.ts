/**
 * Type descriptors.
 *
 * A closed description of the shapes the walker and the coercion engine
 * understand, derived once per zod schema and cached.
 */

import { z } from 'zod'
import { type AnySchema, readTagMeta } from './metadata'
import { warn } from '../utils'

export type IntegerBits = 32 | 64

export type TypeDescriptor =
  | { kind: 'string' }
  | { kind: 'bool' }
  | { kind: 'int'; bits: IntegerBits }
  | { kind: 'uint'; bits: IntegerBits }
  | { kind: 'float'; bits: 32 | 64 }
  /** bits is null for unbounded `z.bigint()` */
  | { kind: 'bigint'; bits: 64 | null; signed: boolean }
  /** absent is the value standing for "no value": undefined for optional, null for nullable */
  | { kind: 'optional'; inner: TypeDescriptor; absent: null | undefined }
  | { kind: 'sequence'; element: TypeDescriptor }
  | { kind: 'mapping'; container: 'object' | 'map'; key: TypeDescriptor; value: TypeDescriptor }
  | { kind: 'record'; schema: z.ZodObject }
  | { kind: 'dynamic' }
  | { kind: 'other'; type: string; schema: AnySchema }

export type RecordDescriptor = Extract<TypeDescriptor, { kind: 'record' }>

export type NumericDescriptor = Extract<TypeDescriptor, { kind: 'int' | 'uint' | 'float' | 'bigint' }>

/**
 * One declared field of a record.
 */
export type FieldDescriptor = {
  name: string
  schema: AnySchema
  type: TypeDescriptor
  /** Raw annotation strings keyed by annotation key */
  tags: Record<string, string>
  /** Anonymous composition of another record */
  embedded: boolean
  /** Not externally visible (name starts with `_`) */
  internal: boolean
}

const DESCRIPTOR_CACHE = new WeakMap<AnySchema, TypeDescriptor>()
const FIELDS_CACHE = new WeakMap<z.ZodObject, FieldDescriptor[]>()

/**
 * Describe the declared type behind a schema.
 *
 * @example
 * ```ts
 * describe(z.array(z.int32()).optional())
 * // => { kind: 'optional', absent: undefined, inner: { kind: 'sequence', element: { kind: 'int', bits: 32 } } }
 * ```
 */
export function describe(schema: AnySchema): TypeDescriptor {
  const cached = DESCRIPTOR_CACHE.get(schema)
  if (cached) return cached

  const descriptor = describeUncached(schema)
  DESCRIPTOR_CACHE.set(schema, descriptor)
  return descriptor
}

function describeUncached(schema: AnySchema): TypeDescriptor {
  const defType = schema._zod.def.type

  // String formats (z.email(), z.uuid(), ...) are not ZodString instances
  if (defType === 'string') return { kind: 'string' }
  if (defType === 'boolean') return { kind: 'bool' }
  if (defType === 'any' || defType === 'unknown') return { kind: 'dynamic' }

  if (schema instanceof z.ZodNumber) return describeNumber(schema)
  if (schema instanceof z.ZodBigInt) return describeBigInt(schema)

  if (schema instanceof z.ZodOptional) {
    return { kind: 'optional', inner: describe(schema._zod.def.innerType), absent: undefined }
  }
  if (schema instanceof z.ZodNullable) {
    return { kind: 'optional', inner: describe(schema._zod.def.innerType), absent: null }
  }
  if (
    schema instanceof z.ZodDefault ||
    schema instanceof z.ZodPrefault ||
    schema instanceof z.ZodCatch ||
    schema instanceof z.ZodReadonly ||
    schema instanceof z.ZodNonOptional
  ) {
    return describe(schema._zod.def.innerType)
  }
  if (schema instanceof z.ZodLazy) return describe(schema._zod.def.getter())

  if (schema instanceof z.ZodArray) {
    return { kind: 'sequence', element: describe(schema._zod.def.element) }
  }
  if (schema instanceof z.ZodRecord) {
    return {
      kind: 'mapping',
      container: 'object',
      key: describe(schema._zod.def.keyType),
      value: describe(schema._zod.def.valueType)
    }
  }
  if (schema instanceof z.ZodMap) {
    return {
      kind: 'mapping',
      container: 'map',
      key: describe(schema._zod.def.keyType),
      value: describe(schema._zod.def.valueType)
    }
  }
  if (schema instanceof z.ZodObject) return { kind: 'record', schema }

  return { kind: 'other', type: defType, schema }
}

function describeNumber(schema: z.ZodNumber): TypeDescriptor {
  switch (schema.format) {
    case 'int32':
      return { kind: 'int', bits: 32 }
    case 'uint32':
      return { kind: 'uint', bits: 32 }
    case 'float32':
      return { kind: 'float', bits: 32 }
  }
  if (schema.isInt) {
    const unsigned = schema.minValue !== null && schema.minValue >= 0
    return { kind: unsigned ? 'uint' : 'int', bits: 64 }
  }
  return { kind: 'float', bits: 64 }
}

function describeBigInt(schema: z.ZodBigInt): TypeDescriptor {
  switch (schema.format) {
    case 'int64':
      return { kind: 'bigint', bits: 64, signed: true }
    case 'uint64':
      return { kind: 'bigint', bits: 64, signed: false }
  }
  const unsigned = schema.minValue !== null && schema.minValue >= 0n
  return { kind: 'bigint', bits: null, signed: !unsigned }
}

/**
 * Declared fields of a record, in declaration order.
 */
export function fieldsOf(record: RecordDescriptor): FieldDescriptor[] {
  const cached = FIELDS_CACHE.get(record.schema)
  if (cached) return cached

  const fields: FieldDescriptor[] = []
  for (const [name, value] of Object.entries(record.schema.shape)) {
    const schema: AnySchema = value
    const type = describe(schema)
    const meta = readTagMeta(schema, name)

    let embedded = meta.embedded
    if (embedded && !recordOf(type)) {
      warn(`Field '${name}' is marked embedded but is not a record; treating it as a regular field`)
      embedded = false
    }

    fields.push({ name, schema, type, tags: meta.tags, embedded, internal: name.startsWith('_') })
  }

  FIELDS_CACHE.set(record.schema, fields)
  return fields
}

/**
 * Raw annotation a field carries under `key`, or '' when it has none.
 * Only own entries count, so keys such as `constructor` match nothing.
 */
export function annotationOf(field: FieldDescriptor, key: string): string {
  if (!Object.hasOwn(field.tags, key)) return ''
  return field.tags[key] ?? ''
}

/**
 * The record a type resolves to once optional wrappers are removed.
 */
export function recordOf(type: TypeDescriptor): RecordDescriptor | undefined {
  let current = type
  while (current.kind === 'optional') current = current.inner
  return current.kind === 'record' ? current : undefined
}

export function isNumericType(type: TypeDescriptor): type is NumericDescriptor {
  return type.kind === 'int' || type.kind === 'uint' || type.kind === 'float' || type.kind === 'bigint'
}

/**
 * Type name used in error messages.
 *
 * @example
 * ```ts
 * typeName(describe(z.array(z.int32()))) // => 'int32[]'
 * ```
 */
export function typeName(type: TypeDescriptor): string {
  switch (type.kind) {
    case 'string':
      return 'string'
    case 'bool':
      return 'bool'
    case 'int':
    case 'uint':
      return type.bits === 32 ? `${type.kind}32` : type.kind
    case 'float':
      return `float${type.bits}`
    case 'bigint':
      if (type.bits === null) return 'bigint'
      return type.signed ? 'int64' : 'uint64'
    case 'optional':
      return `${typeName(type.inner)} | ${type.absent === null ? 'null' : 'undefined'}`
    case 'sequence': {
      const element = typeName(type.element)
      return element.includes(' ') ? `(${element})[]` : `${element}[]`
    }
    case 'mapping': {
      const container = type.container === 'map' ? 'Map' : 'Record'
      return `${container}<${typeName(type.key)}, ${typeName(type.value)}>`
    }
    case 'record':
      return `record{${Object.keys(type.schema.shape).join(', ')}}`
    case 'dynamic':
      return 'unknown'
    case 'other':
      return type.type
  }
}
