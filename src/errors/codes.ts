/**
 * Error Codes
 *
 * Central definition of every routedoc error code with its string identifier
 * and numeric status. Numeric codes follow HTTP semantics so the serving layer
 * can answer with them directly.
 *
 * Status Code Ranges:
 * - 400-499: Client errors (bad template, bad configuration, unknown route)
 * - 500-599: Server errors
 */

/**
 * Error code definition with string identifier and numeric status
 */
export interface ErrorCodeDef {
  /** String identifier (e.g., 'NOT_FOUND') */
  code: string
  /** Numeric status code (e.g., 404) */
  status: number
  /** Default message */
  message: string
}

/**
 * All routedoc error codes
 */
export const ErrorCodes = {
  // ─────────────────────────────────────────────────────────────
  // 4xx - Client Errors
  // ─────────────────────────────────────────────────────────────

  /** Invalid argument provided */
  INVALID_ARGUMENT: {
    code: 'INVALID_ARGUMENT',
    status: 400,
    message: 'Invalid argument',
  },

  /** A route template reuses a parameter name */
  DUPLICATE_PARAMETER_NAME: {
    code: 'DUPLICATE_PARAMETER_NAME',
    status: 400,
    message: 'Duplicate parameter name',
  },

  /** A route template has stray angle brackets */
  MALFORMED_TEMPLATE: {
    code: 'MALFORMED_TEMPLATE',
    status: 400,
    message: 'Malformed route template',
  },

  /** Options passed to the generator or the docs mount are invalid */
  INVALID_CONFIG: {
    code: 'INVALID_CONFIG',
    status: 400,
    message: 'Invalid configuration',
  },

  /** Route not found */
  NOT_FOUND: {
    code: 'NOT_FOUND',
    status: 404,
    message: 'Not found',
  },

  /** Route exists but not for this method */
  METHOD_NOT_ALLOWED: {
    code: 'METHOD_NOT_ALLOWED',
    status: 405,
    message: 'Method not allowed',
  },

  /** Route already registered */
  ALREADY_EXISTS: {
    code: 'ALREADY_EXISTS',
    status: 409,
    message: 'Already exists',
  },

  // ─────────────────────────────────────────────────────────────
  // 5xx - Server Errors
  // ─────────────────────────────────────────────────────────────

  /** Internal server error */
  INTERNAL_ERROR: {
    code: 'INTERNAL_ERROR',
    status: 500,
    message: 'Internal error',
  },
} as const satisfies Record<string, ErrorCodeDef>

/**
 * Error code type (string union)
 */
export type ErrorCode = keyof typeof ErrorCodes

function isKnownCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ErrorCodes, code)
}

/**
 * Get error code definition by string code
 */
export function getErrorCode(code: string): ErrorCodeDef {
  if (isKnownCode(code)) {
    return ErrorCodes[code]
  }

  // Return unknown for unrecognized codes
  return {
    code,
    status: 500,
    message: code,
  }
}

/**
 * Get numeric status for a string code
 */
export function getStatusForCode(code: string): number {
  return getErrorCode(code).status
}

/**
 * Check if status code is a server error (5xx)
 */
export function isServerError(status: number): boolean {
  return status >= 500 && status < 600
}
