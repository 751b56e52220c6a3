import type { z } from 'zod'
import { NilReferenceError, ReadonlyFieldError, UnknownFieldError } from '../errors'
import { type TypeDescriptor, describe } from '../schema/descriptor'
import type { AnySchema } from '../schema/metadata'

/**
 * A writable handle to one storage location: a property of a holder
 * object, together with the schema that declares its type.
 *
 * A reference whose holder is `null` or `undefined` is nil.
 */
export class FieldRef {
  constructor(
    readonly holder: object | null | undefined,
    readonly key: string,
    readonly schema: AnySchema
  ) {}

  get isNil(): boolean {
    return this.holder === null || this.holder === undefined
  }

  get type(): TypeDescriptor {
    return describe(this.schema)
  }

  get(): unknown {
    if (this.holder === null || this.holder === undefined) return undefined
    return Reflect.get(this.holder, this.key)
  }

  set(value: unknown): void {
    if (this.holder === null || this.holder === undefined) {
      throw new NilReferenceError(this.key)
    }
    if (!Reflect.set(this.holder, this.key, value)) {
      throw new ReadonlyFieldError(this.key)
    }
  }
}

/**
 * Reference to a declared field of a record.
 *
 * @example
 * ```ts
 * const User = z.object({ age: z.int() })
 * const user = { age: 0 }
 * setField(fieldRef(User, user, 'age'), '42')
 * // user.age === 42
 * ```
 */
export function fieldRef(schema: z.ZodObject, record: object, key: string): FieldRef {
  if (!Object.hasOwn(schema.shape, key)) throw new UnknownFieldError(key)
  const fieldSchema: AnySchema = schema.shape[key]
  return new FieldRef(record, key, fieldSchema)
}

/**
 * A standalone reference holding a single value of the given type.
 *
 * @example
 * ```ts
 * const ids = ref(z.array(z.int()))
 * setField(ids, '1,2,3')
 * ids.get() // => [1, 2, 3]
 * ```
 */
export function ref(schema: AnySchema, initial?: unknown): FieldRef {
  return new FieldRef({ value: initial }, 'value', schema)
}
