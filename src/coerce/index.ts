/**
 * Coercion layer - converts dynamically typed values into declared field types.
 *
 * @example
 * ```ts
 * import { ref, setField } from 'recordtag/coerce'
 *
 * const ids = ref(z.array(z.int()))
 * setField(ids, '1,2,3')
 * ids.get() // => [1, 2, 3]
 * ```
 */

export { FieldRef, fieldRef, ref } from './field'
export { setField, safeSetField, coerceValue, type SetFieldResult } from './coerce'
export { parsePrimitive, convertNumber } from './primitives'
