/**
 * OpenAPI document types
 *
 * The fixed document layout produced by the generator: an OpenAPI 3.0 document
 * plus a top-level `definitions` map holding hoisted nested schema definitions.
 */

import type { HttpMethod } from '../routing/types.js'

/** A JSON-schema object or fragment */
export type JsonSchema = { [key: string]: unknown }

export interface OpenAPIInfo {
  title: string
  version: string
  description?: string
  [key: string]: unknown
}

export interface OpenAPITag {
  name: string
}

export interface OpenAPIParameter {
  name: string
  in: 'path' | 'query'
  required: boolean
  schema: JsonSchema
}

export interface OpenAPIMediaType {
  schema: JsonSchema
}

export interface OpenAPIRequestBody {
  content: Record<string, OpenAPIMediaType>
}

export interface OpenAPIResponse {
  description: string
  content?: Record<string, OpenAPIMediaType>
}

export interface OpenAPIOperation {
  summary: string
  description: string
  operationID: string
  tags: string[]
  requestBody?: OpenAPIRequestBody
  parameters: OpenAPIParameter[]
  responses: Record<string, OpenAPIResponse>
}

/** Operations of one path, keyed by lower-case method */
export type OpenAPIPathItem = Partial<Record<Lowercase<HttpMethod>, OpenAPIOperation>>

export interface OpenAPIDocument {
  openapi: string
  info: OpenAPIInfo
  tags: OpenAPITag[]
  paths: Record<string, OpenAPIPathItem>
  components: {
    schemas: Record<string, JsonSchema>
    [key: string]: unknown
  }
  definitions: Record<string, JsonSchema>
  [key: string]: unknown
}
