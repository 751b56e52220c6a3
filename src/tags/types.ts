/**
 * Tag layer type definitions.
 */

import type { FieldRef } from '../coerce/field'

/**
 * One annotation occurrence extracted from a record field.
 *
 * For a field declared as
 *
 * ```ts
 * ids: z.array(z.string()).meta({ tags: { body: 'text,comma,omitempty' } })
 * ```
 *
 * extraction with key `body` yields `name: 'text'` and
 * `options: ['comma', 'omitempty']`, with `value` holding the field's data.
 */
export type TagEntry<TValue = unknown> = {
  /** Annotation key used for this extraction pass */
  readonly key: string
  /** First comma-separated token of the annotation */
  name: string
  /** Remaining tokens, in order */
  options: string[]
  /** The field's value when it was extracted (shallow copy for containers) */
  value: TValue
  /** Dot-notation path of the field within the walked record (e.g. 'address.city') */
  readonly field: string
}

/**
 * Custom processing applied to every extracted tag.
 *
 * `field` writes through to the original record, typically with
 * `setField()`. The entry may be rewritten in place; its `value` is re-read
 * from the field once `process` returns.
 */
export interface TagProcessor {
  process(field: FieldRef, tag: TagEntry): void
}
