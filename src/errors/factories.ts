/**
 * Error Factories
 *
 * Pre-built error helpers for the failures routedoc can raise.
 * Each factory creates a RouteDocError with both string code and numeric status.
 */

import { RouteDocError } from './error.js'

/**
 * Pre-built error factories for consistent error handling
 *
 * @example
 * ```typescript
 * throw Errors.duplicateParameter('id', '/items/<id>/<id>')
 * // Creates: { code: 'DUPLICATE_PARAMETER_NAME', status: 400, message: "variable name 'id' used twice." }
 * ```
 */
export const Errors = {
  /**
   * Invalid argument passed to a registration or generator call
   */
  invalidArgument(message: string, details?: unknown): RouteDocError {
    return new RouteDocError('INVALID_ARGUMENT', message, details)
  },

  /**
   * A placeholder name appears twice in one route template
   */
  duplicateParameter(name: string, rule: string): RouteDocError {
    return new RouteDocError('DUPLICATE_PARAMETER_NAME', `variable name '${name}' used twice.`, {
      name,
      rule,
    })
  },

  /**
   * Unconsumed template text still holds `<` or `>`
   */
  malformedTemplate(rule: string): RouteDocError {
    return new RouteDocError('MALFORMED_TEMPLATE', `malformed url rule: '${rule}'`, { rule })
  },

  /**
   * Invalid generator or mount options
   * @param issues - Field-level problems, as `path: message` pairs
   */
  invalidConfig(issues: Array<{ path: string; message: string }>): RouteDocError {
    const message = issues.map((i) => `${i.path}: ${i.message}`).join('; ')
    return new RouteDocError('INVALID_CONFIG', `Invalid configuration: ${message}`, { issues })
  },

  /**
   * Rule registered twice with the same endpoint and methods
   */
  alreadyExists(resource: string, identifier?: string): RouteDocError {
    const message = identifier
      ? `${resource} with ${identifier} already exists`
      : `${resource} already exists`
    return new RouteDocError('ALREADY_EXISTS', message, { resource, identifier })
  },

  /**
   * No route matches the request path
   */
  notFound(path: string): RouteDocError {
    return new RouteDocError('NOT_FOUND', `No route matches '${path}'`, { path })
  },

  /**
   * A route matches the path but not the method
   */
  methodNotAllowed(method: string, path: string, allowed: string[]): RouteDocError {
    return new RouteDocError('METHOD_NOT_ALLOWED', `Method ${method} not allowed on '${path}'`, {
      method,
      path,
      allowed,
    })
  },

  /**
   * Internal server error
   */
  internal(message?: string, details?: unknown): RouteDocError {
    return new RouteDocError('INTERNAL_ERROR', message || 'An internal error occurred', details)
  },
} as const
