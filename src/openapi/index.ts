/**
 * OpenAPI Module
 *
 * Generates an OpenAPI 3.0 document from any route source.
 */

export {
  OpenAPI,
  getOpenAPI,
  addOpenAPISpec,
  assembleOpenAPI,
  generateOpenAPI,
  generateOpenAPIJson,
  isExcludedByMode,
  type AssembleResult,
} from './generator.js'

export {
  OPENAPI_VERSION,
  OPENAPI_ENDPOINT,
  OPENAPI_FILENAME,
  OPENAPI_STATIC_PREFIX,
  OPENAPI_INFO,
  openApiOptionsSchema,
  openApiModeSchema,
  openApiUiSchema,
  resolveOpenAPIConfig,
  docsBasePath,
  type OpenAPIOptions,
  type OpenAPIConfig,
  type OpenAPIMode,
  type OpenAPIUi,
} from './config.js'

export {
  OPENAPI_SCHEME,
  APIError,
  openapiDocs,
  getSummaryDescription,
  hasDeclaredShapes,
  type RouteDocs,
  type OpenAPIDocsOptions,
} from './docs.js'

export {
  buildOperation,
  isDocumentedMethod,
  schemaRef,
  SUCCESS_DESCRIPTION,
  VALIDATION_ERROR_DESCRIPTION,
  type BuildOperationInput,
} from './operation.js'

export { defineShape, type DataShape, type DefineShapeOptions } from './shapes.js'
export { createSchemaRegistry, type SchemaRegistry } from './schema-registry.js'
export { getConverterSchema } from './converters.js'
export { parseUrl, type ParsedUrl } from './path.js'
export { mergeDeep } from './merge.js'

export type {
  JsonSchema,
  OpenAPIDocument,
  OpenAPIInfo,
  OpenAPITag,
  OpenAPIParameter,
  OpenAPIMediaType,
  OpenAPIRequestBody,
  OpenAPIResponse,
  OpenAPIOperation,
  OpenAPIPathItem,
} from './types.js'
