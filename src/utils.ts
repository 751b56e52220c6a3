import { getConfiguration } from './config'

/**
 * Write a diagnostic through `console.warn` unless warnings are disabled or
 * NODE_ENV is production.
 */
export function warn(message: string): void {
  if (!getConfiguration().warnings) return
  if (process.env.NODE_ENV === 'production') return
  console.warn(`[recordtag] ${message}`)
}

// Format ZodError issues into a compact one-line summary
export function formatZodIssues(error: {
  issues: ReadonlyArray<{ path: readonly PropertyKey[]; message: string }>
}): string {
  return error.issues
    .map(issue => {
      const path = issue.path.map(segment => String(segment)).join('.')
      return path ? `${path}: ${issue.message}` : issue.message
    })
    .join('; ')
}

export function isObjectLike(value: unknown): value is object {
  return typeof value === 'object' && value !== null
}

/**
 * True for objects that can stand in for a record or a string-keyed
 * mapping: anything object-like except arrays, maps, sets and dates.
 */
export function isRecordLike(value: unknown): value is object {
  return (
    isObjectLike(value) &&
    !Array.isArray(value) &&
    !(value instanceof Map) &&
    !(value instanceof Set) &&
    !(value instanceof Date)
  )
}

/**
 * Runtime type name used in error messages.
 */
export function valueTypeName(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  if (value instanceof Map) return 'Map'
  if (value instanceof Set) return 'Set'
  if (value instanceof Date) return 'Date'
  return typeof value
}

/**
 * Default textual representation of a value, used for string destinations
 * and by `formatTag`.
 *
 * @example
 * ```ts
 * formatValue([1, 2]) // => '[1, 2]'
 * formatValue({ a: 'x' }) // => '{a: x}'
 * ```
 */
export function formatValue(value: unknown): string {
  const seen = new WeakSet<object>()

  function format(val: unknown): string {
    if (!isObjectLike(val)) return String(val)
    if (val instanceof Date) return val.toISOString()
    if (seen.has(val)) return '[Circular]'
    seen.add(val)

    let text: string
    if (Array.isArray(val)) {
      text = `[${val.map(format).join(', ')}]`
    } else if (val instanceof Map) {
      const entries = Array.from(val.entries(), ([k, v]) => `${format(k)}: ${format(v)}`)
      text = `Map{${entries.join(', ')}}`
    } else {
      const entries = Object.entries(val).map(([k, v]) => `${k}: ${format(v)}`)
      text = `{${entries.join(', ')}}`
    }

    seen.delete(val)
    return text
  }

  return format(value)
}

/**
 * Shallow copy of arrays, maps and plain objects so a captured value does
 * not alias the field it was read from.
 */
export function snapshot(value: unknown): unknown {
  if (Array.isArray(value)) return [...value]
  if (value instanceof Map) return new Map(value)
  if (isRecordLike(value) && isPlainObject(value)) return { ...value }
  return value
}

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}
