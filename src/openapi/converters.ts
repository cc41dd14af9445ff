/**
 * Converter Schema Table
 *
 * Maps a path converter tag and its arguments to the JSON schema of the path
 * parameter. Unknown tags fall back to a plain string schema.
 */

import type { ConverterArg } from '../routing/types.js'
import type { JsonSchema } from './types.js'

function pick(kwargs: Record<string, ConverterArg>, keys: Array<[from: string, to: string]>): JsonSchema {
  const picked: JsonSchema = {}
  for (const [from, to] of keys) {
    if (Object.prototype.hasOwnProperty.call(kwargs, from)) {
      picked[to] = kwargs[from]
    }
  }
  return picked
}

/**
 * Get the JSON schema for a converter
 *
 * @example
 * getConverterSchema('int', [], { min: 1 })  // { type: 'integer', format: 'int32', minimum: 1 }
 * getConverterSchema('foo')                  // { type: 'string' }
 */
export function getConverterSchema(
  converter: string,
  args: readonly ConverterArg[] = [],
  kwargs: Record<string, ConverterArg> = {}
): JsonSchema {
  switch (converter) {
    case 'any':
      return { type: 'array', items: { type: 'string', enum: [...args] } }
    case 'int':
      return {
        type: 'integer',
        format: 'int32',
        ...pick(kwargs, [
          ['min', 'minimum'],
          ['max', 'maximum'],
        ]),
      }
    case 'float':
      return { type: 'number', format: 'float' }
    case 'uuid':
      return { type: 'string', format: 'uuid' }
    case 'path':
      return { type: 'string', format: 'path' }
    case 'string':
      return {
        type: 'string',
        ...pick(kwargs, [
          ['length', 'length'],
          ['maxLength', 'maxLength'],
          ['minLength', 'minLength'],
        ]),
      }
    default:
      return { type: 'string' }
  }
}
