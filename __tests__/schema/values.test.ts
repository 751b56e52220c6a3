/**
 * Tests for src/schema/values.ts
 */

import { afterEach, describe, expect, it } from 'vitest'
import { z } from 'zod'
import { configure, resetConfiguration } from '../../src/config'
import { RecursionLimitError } from '../../src/errors'
import { describe as describeType } from '../../src/schema/descriptor'
import { isAssignable, isZero, zeroRecord, zeroValue } from '../../src/schema/values'

const Address = z.object({
  city: z.string(),
  zip: z.string().optional(),
  floor: z.int().nullable()
})

describe('schema/values.ts', () => {
  afterEach(() => {
    resetConfiguration()
  })

  describe('zeroValue', () => {
    it('should return the zero value of primitives', () => {
      expect(zeroValue(describeType(z.string()))).toBe('')
      expect(zeroValue(describeType(z.boolean()))).toBe(false)
      expect(zeroValue(describeType(z.int()))).toBe(0)
      expect(zeroValue(describeType(z.number()))).toBe(0)
      expect(zeroValue(describeType(z.bigint()))).toBe(0n)
    })

    it('should return the absent value of optionals', () => {
      expect(zeroValue(describeType(z.int().optional()))).toBeUndefined()
      expect(zeroValue(describeType(z.int().nullable()))).toBeNull()
    })

    it('should return fresh empty containers', () => {
      const sequence = describeType(z.array(z.int()))

      expect(zeroValue(sequence)).toEqual([])
      expect(zeroValue(sequence)).not.toBe(zeroValue(sequence))
      expect(zeroValue(describeType(z.record(z.string(), z.int())))).toEqual({})
      expect(zeroValue(describeType(z.map(z.string(), z.int())))).toEqual(new Map())
    })

    it('should return undefined for dynamic and other types', () => {
      expect(zeroValue(describeType(z.unknown()))).toBeUndefined()
      expect(zeroValue(describeType(z.enum(['a'])))).toBeUndefined()
    })
  })

  describe('zeroRecord', () => {
    it('should leave out fields whose zero value is undefined', () => {
      const descriptor = describeType(Address)
      if (descriptor.kind !== 'record') throw new Error('expected a record descriptor')

      expect(zeroRecord(descriptor)).toEqual({ city: '', floor: null })
      expect(Object.keys(zeroRecord(descriptor))).toEqual(['city', 'floor'])
    })

    it('should nest zero records', () => {
      const Person = z.object({ name: z.string(), address: Address })
      const descriptor = describeType(Person)
      if (descriptor.kind !== 'record') throw new Error('expected a record descriptor')

      expect(zeroRecord(descriptor)).toEqual({ name: '', address: { city: '', floor: null } })
    })
  })

  describe('isZero', () => {
    it('should treat absent values as zero', () => {
      expect(isZero(undefined, describeType(z.string()))).toBe(true)
      expect(isZero(null, describeType(z.unknown()))).toBe(true)
    })

    it('should compare primitives against their zero value', () => {
      expect(isZero('', describeType(z.string()))).toBe(true)
      expect(isZero('a', describeType(z.string()))).toBe(false)
      expect(isZero(0, describeType(z.int()))).toBe(true)
      expect(isZero(-1, describeType(z.int()))).toBe(false)
      expect(isZero(false, describeType(z.boolean()))).toBe(true)
      expect(isZero(0n, describeType(z.bigint()))).toBe(true)
      expect(isZero(1n, describeType(z.bigint()))).toBe(false)
    })

    it('should judge optionals by the value they hold', () => {
      expect(isZero(0, describeType(z.int().optional()))).toBe(true)
      expect(isZero(4, describeType(z.int().optional()))).toBe(false)
    })

    it('should treat empty containers as zero', () => {
      expect(isZero([], describeType(z.array(z.int())))).toBe(true)
      expect(isZero([0], describeType(z.array(z.int())))).toBe(false)
      expect(isZero({}, describeType(z.record(z.string(), z.int())))).toBe(true)
      expect(isZero(new Map(), describeType(z.map(z.string(), z.int())))).toBe(true)
      expect(isZero(new Map([['a', 1]]), describeType(z.map(z.string(), z.int())))).toBe(false)
    })

    it('should treat records as zero when every field is', () => {
      const descriptor = describeType(Address)

      expect(isZero({ city: '', floor: null }, descriptor)).toBe(true)
      expect(isZero({ city: '', zip: 'x', floor: null }, descriptor)).toBe(false)
    })

    it('should never treat present dynamic values as zero', () => {
      expect(isZero(0, describeType(z.unknown()))).toBe(false)
      expect(isZero('', describeType(z.enum(['', 'a'])))).toBe(false)
    })
  })

  describe('isAssignable', () => {
    it('should check integer ranges', () => {
      const int32 = describeType(z.int32())

      expect(isAssignable(2147483647, int32)).toBe(true)
      expect(isAssignable(2147483648, int32)).toBe(false)
      expect(isAssignable(-2147483648, int32)).toBe(true)
      expect(isAssignable(1.5, describeType(z.int()))).toBe(false)
      expect(isAssignable(2 ** 53, describeType(z.int()))).toBe(false)
      expect(isAssignable(-1, describeType(z.uint32()))).toBe(false)
      expect(isAssignable(4294967295, describeType(z.uint32()))).toBe(true)
    })

    it('should accept only single-precision values for float32', () => {
      expect(isAssignable(0.5, describeType(z.float32()))).toBe(true)
      expect(isAssignable(0.1, describeType(z.float32()))).toBe(false)
      expect(isAssignable(0.1, describeType(z.number()))).toBe(true)
    })

    it('should check 64-bit bigint ranges', () => {
      expect(isAssignable(2n ** 63n - 1n, describeType(z.int64()))).toBe(true)
      expect(isAssignable(2n ** 63n, describeType(z.int64()))).toBe(false)
      expect(isAssignable(-1n, describeType(z.uint64()))).toBe(false)
      expect(isAssignable(2n ** 100n, describeType(z.bigint()))).toBe(true)
      expect(isAssignable(1, describeType(z.bigint()))).toBe(false)
    })

    it('should accept only the matching absent value for optionals', () => {
      expect(isAssignable(undefined, describeType(z.int().optional()))).toBe(true)
      expect(isAssignable(null, describeType(z.int().optional()))).toBe(false)
      expect(isAssignable(null, describeType(z.int().nullable()))).toBe(true)
      expect(isAssignable(3, describeType(z.int().nullable()))).toBe(true)
    })

    it('should check container elements', () => {
      expect(isAssignable([1, 2], describeType(z.array(z.int())))).toBe(true)
      expect(isAssignable([1, '2'], describeType(z.array(z.int())))).toBe(false)
      expect(isAssignable({ a: 1 }, describeType(z.record(z.string(), z.int())))).toBe(true)
      expect(isAssignable(new Map([['a', 1]]), describeType(z.map(z.string(), z.int())))).toBe(true)
      expect(isAssignable(new Map([[1, 1]]), describeType(z.map(z.string(), z.int())))).toBe(false)
      expect(isAssignable({ a: 1 }, describeType(z.map(z.string(), z.int())))).toBe(false)
    })

    it('should require records to carry only declared, well-typed fields', () => {
      const descriptor = describeType(Address)

      expect(isAssignable({ city: 'Oslo', floor: 2 }, descriptor)).toBe(true)
      expect(isAssignable({ city: 'Oslo', floor: 2, country: 'NO' }, descriptor)).toBe(false)
      expect(isAssignable({ floor: 2 }, descriptor)).toBe(false)
      expect(isAssignable(new Map([['city', 'Oslo']]), descriptor)).toBe(false)
    })

    it('should validate other schemas with zod', () => {
      const descriptor = describeType(z.literal('on'))

      expect(isAssignable('on', descriptor)).toBe(true)
      expect(isAssignable('off', descriptor)).toBe(false)
    })

    it('should accept anything for dynamic types', () => {
      expect(isAssignable(Symbol('x'), describeType(z.any()))).toBe(true)
    })
  })

  describe('depth guard', () => {
    it('should raise a recursion error for self-referential values', () => {
      const Node: z.ZodType = z.lazy(() => z.object({ next: Node.optional(), label: z.string() }))
      const loop: { next?: unknown; label: string } = { label: '' }
      loop.next = loop

      configure({ maxDepth: 10 })

      expect(() => isZero(loop, describeType(Node))).toThrow(RecursionLimitError)
    })
  })
})
