/**
 * Object helpers
 */

/**
 * Check for a plain mapping: a non-null object that is not an array
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
