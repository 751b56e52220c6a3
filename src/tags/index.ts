/**
 * Tag layer - extraction of per-field annotations from records.
 *
 * This module provides:
 * - Walking a record and collecting its tags (getTags, extractTags)
 * - Per-tag processing hooks that write back into the record (TagProcessor)
 * - Helpers over tag lists (filterTags, findTag, assertTagValue, formatTag)
 *
 * @example
 * ```ts
 * import { extractTags } from 'recordtag/tags'
 *
 * const Request = z.object({
 *   ids: z.array(z.string()).meta({ tags: { body: 'text,comma,omitempty' } })
 * })
 *
 * const tags = extractTags('body', Request, { ids: ['a', 'b'] })
 * // => [{ key: 'body', name: 'text', options: ['comma', 'omitempty'], value: ['a', 'b'], field: 'ids' }]
 * ```
 */

// Types
export type { TagEntry, TagProcessor } from './types'

// Extraction
export { getTags, extractTags } from './extract'

// Helpers
export { filterTags, findTag, assertTagValue, formatTag } from './query'
