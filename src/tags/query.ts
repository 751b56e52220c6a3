/**
 * Helpers over extracted tag lists.
 */

import { z } from 'zod'
import { TypeAssertionError } from '../errors'
import { describe, typeName } from '../schema/descriptor'
import { formatValue, formatZodIssues } from '../utils'
import type { TagEntry } from './types'

/**
 * Tags that satisfy the predicate, in order.
 *
 * @example
 * ```ts
 * // Keep only tags whose field had a value
 * const present = filterTags(tags, tag => tag.value !== undefined)
 * ```
 */
export function filterTags(tags: readonly TagEntry[], predicate: (tag: TagEntry) => boolean): TagEntry[] {
  return tags.filter(tag => predicate(tag))
}

/**
 * First tag that satisfies the predicate, or undefined.
 */
export function findTag(
  tags: readonly TagEntry[],
  predicate: (tag: TagEntry) => boolean
): TagEntry | undefined {
  return tags.find(tag => predicate(tag))
}

/**
 * Check a tag's captured value against a schema and return the tag with
 * its value typed accordingly.
 *
 * @example
 * ```ts
 * const tag = findTag(tags, t => t.name === 'limit')
 * if (tag) {
 *   const limit = assertTagValue(tag, z.number()).value // number
 * }
 * ```
 */
export function assertTagValue<S extends z.core.$ZodType>(
  tag: TagEntry,
  schema: S
): TagEntry<z.output<S>> {
  const result = z.safeParse(schema, tag.value)
  if (!result.success) {
    throw new TypeAssertionError(typeName(describe(schema)), tag.value, formatZodIssues(result.error))
  }
  return { ...tag, value: result.data }
}

/**
 * Readable one-line form of a tag, for debugging and logs.
 *
 * @example
 * ```ts
 * formatTag({ key: 'query', name: 'ptr_int', options: ['opt1', 'opt2'], value: 42, field: 'count' })
 * // => 'Tag(key=query, name=ptr_int, options=[opt1, opt2], value=42)'
 * ```
 */
export function formatTag(tag: TagEntry): string {
  return `Tag(key=${tag.key}, name=${tag.name}, options=[${tag.options.join(', ')}], value=${formatValue(tag.value)})`
}
