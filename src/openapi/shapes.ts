/**
 * Declared data shapes
 *
 * A data shape is a named type that can describe itself as JSON Schema. The
 * generator only calls `schema()`; nested named types travel in the returned
 * `definitions` map and are referenced as `#/definitions/<Name>`.
 */

import type { ZodTypeAny } from 'zod'
import { zodToJsonSchema } from 'zod-to-json-schema'
import type { JsonSchema } from './types.js'

export interface DataShape {
  /** Name the schema is registered under in `components.schemas` */
  readonly name: string
  /** JSON schema of the shape, optionally with nested `definitions` */
  schema(): JsonSchema
}

export interface DefineShapeOptions {
  /** Named sub-schemas emitted under `definitions` and referenced by `$ref` */
  definitions?: Record<string, ZodTypeAny>
}

/**
 * Create a data shape from a zod schema
 *
 * @example
 * ```typescript
 * const Address = z.object({ city: z.string() })
 * const User = defineShape('User', z.object({ home: Address }), { definitions: { Address } })
 *
 * User.schema()
 * // { type: 'object', properties: { home: { $ref: '#/definitions/Address' } }, ...,
 * //   definitions: { Address: { type: 'object', ... } } }
 * ```
 */
export function defineShape(
  name: string,
  schema: ZodTypeAny,
  options: DefineShapeOptions = {}
): DataShape {
  return {
    name,
    schema(): JsonSchema {
      const converted = zodToJsonSchema(schema, {
        target: 'openApi3',
        $refStrategy: 'root',
        definitionPath: 'definitions',
        definitions: options.definitions,
      })

      // $schema is not part of an OpenAPI schema object
      const result: JsonSchema = {}
      for (const [key, value] of Object.entries(converted)) {
        if (key !== '$schema') {
          result[key] = value
        }
      }
      return result
    },
  }
}
