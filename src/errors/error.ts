/**
 * RouteDocError - the single error type raised by routedoc
 */

import { getStatusForCode } from './codes.js'

export class RouteDocError extends Error {
  /**
   * Numeric status code (HTTP-compatible)
   *
   * - 400-499: Client errors
   * - 500-599: Server errors
   */
  public readonly status: number

  constructor(
    /** String error code (e.g., 'MALFORMED_TEMPLATE', 'NOT_FOUND') */
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
    /** Optional explicit status override */
    status?: number
  ) {
    super(message)
    this.name = 'RouteDocError'
    this.status = status ?? getStatusForCode(code)
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): { code: string; status: number; message: string; details?: unknown } {
    return {
      code: this.code,
      status: this.status,
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
    }
  }
}

/**
 * Narrow an unknown thrown value to a RouteDocError, optionally with a given code
 */
export function isRouteDocError(err: unknown, code?: string): err is RouteDocError {
  return err instanceof RouteDocError && (code === undefined || err.code === code)
}
