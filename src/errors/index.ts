/**
 * Error Module
 *
 * Error type, error code definitions and pre-built factories.
 */

export { Errors } from './factories.js'

export {
  ErrorCodes,
  type ErrorCode,
  type ErrorCodeDef,
  getErrorCode,
  getStatusForCode,
  isServerError,
} from './codes.js'

export { RouteDocError, isRouteDocError } from './error.js'
