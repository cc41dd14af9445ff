/**
 * Operation Aggregator
 *
 * Builds the operation object of one (path, method) pair from the route's
 * documentation record and its path parameters, registering every declared
 * data shape in the schema registry on the way.
 */

import { capitalize } from '../utils/text.js'
import type { HttpMethod } from '../routing/types.js'
import { getSummaryDescription, hasDeclaredShapes, type RouteDocs } from './docs.js'
import type { DataShape } from './shapes.js'
import type { SchemaRegistry } from './schema-registry.js'
import type {
  JsonSchema,
  OpenAPIOperation,
  OpenAPIParameter,
  OpenAPIRequestBody,
  OpenAPIResponse,
} from './types.js'

export const SUCCESS_DESCRIPTION = 'Successful Response'
export const VALIDATION_ERROR_DESCRIPTION = 'Validation Error'

export interface BuildOperationInput {
  /** Endpoint name, used for the operation id and the fallback summary */
  endpoint: string
  method: HttpMethod
  docs?: RouteDocs
  /** Path parameters of the rule, in template order */
  parameters: readonly OpenAPIParameter[]
  registry: SchemaRegistry
}

/**
 * HEAD and OPTIONS are answered automatically and never documented
 */
export function isDocumentedMethod(method: HttpMethod): boolean {
  return method !== 'HEAD' && method !== 'OPTIONS'
}

/**
 * Reference to a registered component schema
 */
export function schemaRef(name: string): JsonSchema {
  return { $ref: `#/components/schemas/${name}` }
}

function jsonContent(name: string): Record<string, { schema: JsonSchema }> {
  return { 'application/json': { schema: schemaRef(name) } }
}

function registerShape(registry: SchemaRegistry, shape: DataShape | undefined): void {
  if (shape) {
    registry.register(shape.name, shape.schema())
  }
}

function buildRequestBody(docs: RouteDocs | undefined): OpenAPIRequestBody | undefined {
  const shape = docs?.form ?? docs?.body
  return shape ? { content: jsonContent(shape.name) } : undefined
}

function buildResponses(docs: RouteDocs | undefined): Record<string, OpenAPIResponse> {
  const responses: Record<string, OpenAPIResponse> = {}
  let has2xx = false

  for (const [code, message] of Object.entries(docs?.exceptions ?? {})) {
    if (code.startsWith('2')) {
      has2xx = true
    }
    responses[code] = { description: message }
  }

  if (docs?.response) {
    responses['200'] = {
      description: SUCCESS_DESCRIPTION,
      content: jsonContent(docs.response.name),
    }
  } else if (!has2xx) {
    responses['200'] = { description: SUCCESS_DESCRIPTION }
  }

  if (hasDeclaredShapes(docs)) {
    responses['400'] = { description: VALIDATION_ERROR_DESCRIPTION }
  }

  return responses
}

/**
 * Build one operation
 *
 * @example
 * buildOperation({ endpoint: 'list_items', method: 'GET', parameters: [], registry })
 * // { summary: 'List_items', description: '', operationID: 'list_items__get', tags: [],
 * //   parameters: [], responses: { '200': { description: 'Successful Response' } } }
 */
export function buildOperation(input: BuildOperationInput): OpenAPIOperation {
  const { endpoint, method, docs, registry } = input

  registerShape(registry, docs?.query)
  registerShape(registry, docs?.body)
  registerShape(registry, docs?.form)
  registerShape(registry, docs?.response)

  const { summary, description } = getSummaryDescription(docs?.doc)

  const operation: OpenAPIOperation = {
    summary: summary || capitalize(endpoint),
    description: description || '',
    operationID: `${endpoint}__${method.toLowerCase()}`,
    tags: docs?.tags ? [...docs.tags] : [],
    parameters: [...input.parameters],
    responses: buildResponses(docs),
  }

  const requestBody = buildRequestBody(docs)
  if (requestBody) {
    operation.requestBody = requestBody
  }

  if (docs?.query) {
    operation.parameters.push({
      name: docs.query.name,
      in: 'query',
      required: true,
      schema: schemaRef(docs.query.name),
    })
  }

  return operation
}
