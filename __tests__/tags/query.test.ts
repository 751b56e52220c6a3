import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import { TypeAssertionError } from '../../src/errors'
import { assertTagValue, filterTags, findTag, formatTag } from '../../src/tags/query'
import type { TagEntry } from '../../src/tags/types'

const tags: TagEntry[] = [
  { key: 'query', name: 'page', options: [], value: 2, field: 'page' },
  { key: 'query', name: 'ids', options: ['comma'], value: [1, 2], field: 'ids' },
  { key: 'query', name: 'limit', options: ['omitempty'], value: undefined, field: 'limit' }
]

describe('tags/query.ts', () => {
  describe('filterTags', () => {
    it('should keep matching tags in order', () => {
      const filtered = filterTags(tags, tag => tag.value !== undefined)

      expect(filtered.map(tag => tag.name)).toEqual(['page', 'ids'])
    })

    it('should return a new list', () => {
      expect(filterTags(tags, () => true)).not.toBe(tags)
    })
  })

  describe('findTag', () => {
    it('should return the first matching tag', () => {
      expect(findTag(tags, tag => tag.options.includes('comma'))?.field).toBe('ids')
    })

    it('should return undefined when nothing matches', () => {
      expect(findTag(tags, tag => tag.name === 'sort')).toBeUndefined()
    })
  })

  describe('assertTagValue', () => {
    it('should return the tag with a typed value', () => {
      const [page] = tags
      if (!page) throw new Error('missing fixture')

      const typed = assertTagValue(page, z.number())
      const doubled: number = typed.value * 2

      expect(doubled).toBe(4)
      expect(typed).toEqual(page)
    })

    it('should check containers element by element', () => {
      const ids = findTag(tags, tag => tag.name === 'ids')
      if (!ids) throw new Error('missing fixture')

      expect(assertTagValue(ids, z.array(z.int())).value).toEqual([1, 2])
      expect(() => assertTagValue(ids, z.array(z.string()))).toThrow(/^type assertion to string\[\] failed: /)
    })

    it('should throw a TypeAssertionError on mismatch', () => {
      const [page] = tags
      if (!page) throw new Error('missing fixture')
      let caught: unknown

      try {
        assertTagValue(page, z.string())
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(TypeAssertionError)
      if (caught instanceof TypeAssertionError) {
        expect(caught.expected).toBe('string')
        expect(caught.value).toBe(2)
        expect(caught.message.startsWith('type assertion to string failed: ')).toBe(true)
      }
    })
  })

  describe('formatTag', () => {
    it('should render key, name, options and value', () => {
      const tag: TagEntry = {
        key: 'query',
        name: 'ptr_int',
        options: ['opt1', 'opt2'],
        value: 42,
        field: 'count'
      }

      expect(formatTag(tag)).toBe('Tag(key=query, name=ptr_int, options=[opt1, opt2], value=42)')
    })

    it('should render containers and absent values', () => {
      expect(formatTag({ key: 'json', name: 'ids', options: [], value: { a: [1, 2] }, field: 'ids' })).toBe(
        'Tag(key=json, name=ids, options=[], value={a: [1, 2]})'
      )
      expect(formatTag({ key: 'json', name: 'x', options: [], value: undefined, field: 'x' })).toBe(
        'Tag(key=json, name=x, options=[], value=undefined)'
      )
    })
  })
})
