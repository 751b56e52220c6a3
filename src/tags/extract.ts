/**
 * The Tag Walker.
 *
 * Walks a record's declared fields, reads the annotation stored under a key
 * in each field's `.meta({ tags })`, and returns one entry per annotated
 * field. Nested records are walked in place; embedded records are walked
 * after the enclosing record's own fields.
 */

import { FieldRef } from '../coerce/field'
import { getConfiguration } from '../config'
import { NotARecordError, ProcessorError, RecursionLimitError } from '../errors'
import {
  type RecordDescriptor,
  annotationOf,
  describe,
  fieldsOf,
  recordOf,
  typeName
} from '../schema/descriptor'
import type { AnySchema } from '../schema/metadata'
import { isZero } from '../schema/values'
import { isRecordLike, snapshot, valueTypeName } from '../utils'
import type { TagEntry, TagProcessor } from './types'

const SKIP = '-'
const OMIT_EMPTY = 'omitempty'

type WalkContext = {
  key: string
  processor: TagProcessor | undefined
  maxDepth: number
}

/**
 * Extract all tags stored under `key` from a record.
 *
 * A field is skipped when its annotation is `-`, when the annotation
 * contains `omitempty` and the value is the zero value of its type, or when
 * its annotation name is empty.
 *
 * @example
 * ```ts
 * const Example = z.object({
 *   field1: z.string().meta({ tags: { json: 'field1' } }),
 *   field2: z.int().meta({ tags: { json: 'field2,omitempty' } }),
 *   field3: z.boolean().meta({ tags: { json: '-' } })
 * })
 *
 * getTags('json', Example, { field1: 'value1', field2: 0, field3: true })
 * // => [{ key: 'json', name: 'field1', options: [], value: 'value1', field: 'field1' }]
 * ```
 */
export function getTags(key: string, schema: AnySchema, record: unknown): TagEntry[] {
  return extractTags(key, schema, record)
}

/**
 * Extract all tags stored under `key`, calling `processor` for each one.
 *
 * The processor receives a {@link FieldRef} to the original field and may
 * write through it. The first processor failure aborts the walk with a
 * {@link ProcessorError}; no partial result is returned.
 *
 * @example
 * ```ts
 * const Query = z.object({
 *   page: z.int().meta({ tags: { query: 'page' } })
 * })
 * const params = new URLSearchParams('page=3')
 * const query = { page: 0 }
 *
 * extractTags('query', Query, query, {
 *   process: (field, tag) => setField(field, params.get(tag.name))
 * })
 * // query.page === 3
 * ```
 */
export function extractTags(
  key: string,
  schema: AnySchema,
  record: unknown,
  processor?: TagProcessor
): TagEntry[] {
  const type = recordOf(describe(schema))
  if (!type) {
    throw new NotARecordError(typeName(describe(schema)))
  }
  if (!isRecordLike(record)) {
    throw new NotARecordError(valueTypeName(record))
  }

  const ctx: WalkContext = { key, processor, maxDepth: getConfiguration().maxDepth }
  return walk(ctx, type, record, '', 0)
}

function walk(
  ctx: WalkContext,
  type: RecordDescriptor,
  record: object,
  path: string,
  depth: number
): TagEntry[] {
  if (depth > ctx.maxDepth) throw new RecursionLimitError(ctx.maxDepth, path)

  const tags: TagEntry[] = []
  const embedded: Array<{ type: RecordDescriptor; value: object; path: string }> = []

  for (const field of fieldsOf(type)) {
    if (field.internal && !field.embedded) continue

    const fieldPath = path ? `${path}.${field.name}` : field.name
    let value = resolve(Reflect.get(record, field.name))

    const annotation = ctx.key ? annotationOf(field, ctx.key) : ''
    if (annotation === SKIP || (annotation.includes(OMIT_EMPTY) && isZero(value, field.type))) {
      continue
    }

    const nested = recordOf(field.type)

    if (field.embedded) {
      if (nested && isRecordLike(value)) {
        // Embedded fields are promoted: their paths stay relative to this record
        embedded.push({ type: nested, value, path })
      }
      continue
    }

    if (annotation !== '') {
      const tag = parse(ctx.key, annotation, fieldPath, value)
      if (tag.name !== '') {
        if (ctx.processor) {
          const ref = new FieldRef(record, field.name, field.schema)
          try {
            ctx.processor.process(ref, tag)
          } catch (error) {
            throw new ProcessorError(fieldPath, error)
          }
          value = resolve(ref.get())
          tag.value = snapshot(value)
        }
        tags.push(tag)
      }
    }

    if (nested && isRecordLike(value)) {
      tags.push(...walk(ctx, nested, value, fieldPath, depth + 1))
    }
  }

  for (const entry of embedded) {
    tags.push(...walk(ctx, entry.type, entry.value, entry.path, depth + 1))
  }

  return tags
}

/**
 * Absent (null or undefined) values resolve to undefined.
 */
function resolve(value: unknown): unknown {
  return value === null ? undefined : value
}

/**
 * Split a raw annotation into its name and options.
 */
function parse(key: string, annotation: string, field: string, value: unknown): TagEntry {
  const comma = annotation.indexOf(',')
  const name = comma === -1 ? annotation : annotation.slice(0, comma)
  const options = comma === -1 ? [] : annotation.slice(comma + 1).split(',')
  return { key, name, options, value: snapshot(value), field }
}
