/**
 * Field metadata lookup.
 *
 * Annotations live in zod's global registry, attached with `.meta()`:
 *
 * ```ts
 * z.object({
 *   ids: z.array(z.string()).meta({ tags: { body: 'text,comma,omitempty' } }),
 *   base: Base.meta({ embedded: true })
 * })
 * ```
 */

import { z } from 'zod'
import { warn } from '../utils'

export type AnySchema = z.core.$ZodType

const tagMetaSchema = z.object({
  tags: z.record(z.string(), z.string()).optional(),
  embedded: z.boolean().optional()
})

/**
 * The parts of a field's metadata this library reads.
 */
export type TagMeta = {
  /** Raw annotation strings keyed by annotation key */
  tags: Record<string, string>
  /** Field is an anonymous composition of another record */
  embedded: boolean
}

const METADATA_CACHE = new WeakMap<AnySchema, Record<string, unknown> | undefined>()

/**
 * Get metadata from a schema, looking through optional, nullable, default
 * and similar wrappers until some layer carries `.meta()`.
 *
 * @example
 * ```ts
 * const schema = z.string().meta({ tags: { json: 'name' } }).optional()
 * getMetadata(schema)
 * // => { tags: { json: 'name' } }
 * ```
 */
export function getMetadata(schema: AnySchema): Record<string, unknown> | undefined {
  if (METADATA_CACHE.has(schema)) {
    return METADATA_CACHE.get(schema)
  }

  const visited = new Set<AnySchema>()
  let current: AnySchema | undefined = schema

  while (current) {
    if (visited.has(current)) break
    visited.add(current)

    const meta = z.globalRegistry.get(current)
    if (meta !== undefined) {
      METADATA_CACHE.set(schema, meta)
      return meta
    }

    current = unwrapOnce(current)
  }

  METADATA_CACHE.set(schema, undefined)
  return undefined
}

/**
 * Strip one wrapper layer. Returns undefined for schemas that wrap nothing.
 */
export function unwrapOnce(schema: AnySchema): AnySchema | undefined {
  if (
    schema instanceof z.ZodOptional ||
    schema instanceof z.ZodNullable ||
    schema instanceof z.ZodDefault ||
    schema instanceof z.ZodPrefault ||
    schema instanceof z.ZodCatch ||
    schema instanceof z.ZodReadonly ||
    schema instanceof z.ZodNonOptional
  ) {
    return schema._zod.def.innerType
  }
  if (schema instanceof z.ZodLazy) {
    return schema._zod.def.getter()
  }
  if (schema instanceof z.ZodPipe) {
    return schema._zod.def.in
  }
  return undefined
}

/**
 * Read the tag annotations and embedding flag of a field. Malformed
 * metadata is ignored with a warning.
 */
export function readTagMeta(schema: AnySchema, field: string): TagMeta {
  const meta = getMetadata(schema)
  if (meta === undefined) return { tags: {}, embedded: false }

  const parsed = tagMetaSchema.safeParse(meta)
  if (!parsed.success) {
    warn(`Ignoring malformed tag metadata on field '${field}': ${parsed.error.issues[0]?.message}`)
    return { tags: {}, embedded: false }
  }

  return { tags: parsed.data.tags ?? {}, embedded: parsed.data.embedded ?? false }
}
