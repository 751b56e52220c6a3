/**
 * Schema layer - type descriptors and metadata read from zod schemas.
 */

export type { AnySchema, TagMeta } from './metadata'
export { getMetadata, readTagMeta, unwrapOnce } from './metadata'

export type {
  TypeDescriptor,
  RecordDescriptor,
  NumericDescriptor,
  FieldDescriptor,
  IntegerBits
} from './descriptor'
export { describe, fieldsOf, annotationOf, recordOf, isNumericType, typeName } from './descriptor'

export { zeroValue, zeroRecord, isZero, isAssignable } from './values'
