/**
 * Recursive Merge
 */

import { isPlainObject } from '../utils/objects.js'

function mergeInto(base: Record<string, unknown>, overlay: Record<string, unknown>): void {
  for (const [key, value] of Object.entries(overlay)) {
    if (key === '__proto__') continue
    const current = base[key]
    if (isPlainObject(current) && isPlainObject(value)) {
      mergeInto(current, value)
    } else {
      base[key] = value
    }
  }
}

/**
 * Merge `overlay` into `base` and return `base`.
 *
 * Mappings present on both sides are merged key by key; any other value from
 * the overlay replaces the base value. Keys only in `base` are left alone.
 * The overlay itself is not modified, but its values are inserted by reference.
 *
 * @example
 * mergeDeep({ c: { a: 1 } }, { c: { b: 2 } }) // { c: { a: 1, b: 2 } }
 * mergeDeep({ c: 1 }, { c: { b: 2 } })        // { c: { b: 2 } }
 */
export function mergeDeep<T extends Record<string, unknown>>(
  base: T,
  overlay: Record<string, unknown>
): T {
  mergeInto(base, overlay)
  return base
}
