/**
 * Global configuration.
 */

import { z } from 'zod'

export const configurationSchema = z.object({
  /** Tag key whose name token is the field's serialization name in record-from-mapping coercion */
  serializationKey: z.string().min(1),
  /** Maximum record nesting followed by the walker and the coercion engine */
  maxDepth: z.number().int().positive(),
  /** Emit `console.warn` diagnostics (always silent when NODE_ENV is production) */
  warnings: z.boolean()
})

export type RecordTagConfiguration = z.infer<typeof configurationSchema>

const DEFAULTS: RecordTagConfiguration = {
  serializationKey: 'json',
  maxDepth: 64,
  warnings: true
}

let configuration: RecordTagConfiguration = { ...DEFAULTS }

export function getConfiguration(): Readonly<RecordTagConfiguration> {
  return configuration
}

/**
 * Override parts of the configuration. Invalid values throw a `ZodError`
 * and leave the current configuration untouched.
 *
 * @example
 * ```ts
 * configure({ serializationKey: 'query', maxDepth: 16 })
 * ```
 */
export function configure(overrides: Partial<RecordTagConfiguration>): void {
  const parsed = configurationSchema.partial().parse(overrides)
  configuration = { ...configuration, ...stripUndefined(parsed) }
}

export function resetConfiguration(): void {
  configuration = { ...DEFAULTS }
}

function stripUndefined(
  overrides: Partial<RecordTagConfiguration>
): Partial<RecordTagConfiguration> {
  const result: Partial<RecordTagConfiguration> = {}
  if (overrides.serializationKey !== undefined) result.serializationKey = overrides.serializationKey
  if (overrides.maxDepth !== undefined) result.maxDepth = overrides.maxDepth
  if (overrides.warnings !== undefined) result.warnings = overrides.warnings
  return result
}
