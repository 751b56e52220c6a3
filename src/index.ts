/**
 * recordtag - tagged record introspection and value coercion over zod schemas.
 *
 * Re-exports the tag, coercion and schema layers together with the error
 * classes and configuration.
 *
 * @example
 * // Full import
 * import { extractTags, setField } from 'recordtag'
 *
 * // Layer imports
 * import { extractTags } from 'recordtag/tags'
 * import { setField } from 'recordtag/coerce'
 */

export * from './tags'
export * from './coerce'
export * from './schema'
export * from './errors'
export { configure, getConfiguration, resetConfiguration, type RecordTagConfiguration } from './config'
