/**
 * Path Spec Builder
 *
 * Turns a route template into an OpenAPI path (`/items/{id}`) and the list of
 * path parameters described by the converter schema table.
 */

import { parseRule } from '../routing/rule-parser.js'
import { parseConverterArgs } from '../routing/converter-args.js'
import { getConverterSchema } from './converters.js'
import type { ConverterArgs } from '../routing/types.js'
import type { OpenAPIParameter } from './types.js'

export interface ParsedUrl {
  path: string
  parameters: OpenAPIParameter[]
}

/**
 * Parse a route template into an OpenAPI path and its path parameters
 *
 * @example
 * parseUrl('/items/<int(min=1,max=10):id>')
 * // { path: '/items/{id}', parameters: [{ name: 'id', in: 'path', required: true,
 * //   schema: { type: 'integer', format: 'int32', minimum: 1, maximum: 10 } }] }
 */
export function parseUrl(rule: string): ParsedUrl {
  const parts: string[] = []
  const parameters: OpenAPIParameter[] = []

  for (const segment of parseRule(rule)) {
    if (segment.kind === 'static') {
      parts.push(segment.text)
      continue
    }

    parts.push(`{${segment.name}}`)

    const { args, kwargs }: ConverterArgs = segment.args
      ? parseConverterArgs(segment.args)
      : { args: [], kwargs: {} }

    parameters.push({
      name: segment.name,
      in: 'path',
      required: true,
      schema: getConverterSchema(segment.converter, args, kwargs),
    })
  }

  return { path: parts.join(''), parameters }
}
