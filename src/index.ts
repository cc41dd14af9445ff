/**
 * routedoc - OpenAPI documents derived from route templates
 */

// === Routing ===
export * from './routing/index.js'

// === OpenAPI ===
export * from './openapi/index.js'

// === HTTP ===
export * from './http/index.js'

// === Docs UI ===
export { generateDocsHTML, generateSwaggerHTML, generateRedocHTML } from './docs/ui/index.js'

// === Errors ===
export {
  RouteDocError,
  isRouteDocError,
  Errors,
  ErrorCodes,
  getErrorCode,
  getStatusForCode,
  isServerError,
  type ErrorCode,
  type ErrorCodeDef,
} from './errors/index.js'

// === Utils ===
export { createLogger, getLogger } from './utils/logger.js'
