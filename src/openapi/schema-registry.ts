/**
 * Schema Registry
 *
 * Collects the JSON schemas of declared data shapes while a document is
 * assembled, then hoists their nested `definitions` to the document level.
 * One registry lives for one assembly pass.
 */

import { isPlainObject } from '../utils/objects.js'
import type { JsonSchema } from './types.js'

export interface SchemaRegistry {
  /** Register (or silently replace) a schema under a name */
  register(name: string, schema: JsonSchema): void

  has(name: string): boolean

  get(name: string): JsonSchema | undefined

  /** Registered names in first-registration order */
  names(): string[]

  readonly size: number

  /** Snapshot of all registered schemas */
  schemas(): Record<string, JsonSchema>

  /**
   * Move every nested `definitions` entry into one map and remove the nested
   * maps from their parents. Later entries with the same name win.
   */
  flatten(): Record<string, JsonSchema>
}

/**
 * Create an empty schema registry
 */
export function createSchemaRegistry(): SchemaRegistry {
  const entries = new Map<string, JsonSchema>()

  return {
    register(name: string, schema: JsonSchema): void {
      entries.set(name, { ...schema })
    },

    has(name: string): boolean {
      return entries.has(name)
    },

    get(name: string): JsonSchema | undefined {
      return entries.get(name)
    },

    names(): string[] {
      return Array.from(entries.keys())
    },

    get size(): number {
      return entries.size
    },

    schemas(): Record<string, JsonSchema> {
      return Object.fromEntries(entries)
    },

    flatten(): Record<string, JsonSchema> {
      const definitions: Record<string, JsonSchema> = {}

      for (const schema of entries.values()) {
        const nested = schema.definitions
        if (!isPlainObject(nested)) continue

        for (const [key, value] of Object.entries(nested)) {
          if (isPlainObject(value)) {
            definitions[key] = value
          }
        }
        delete schema.definitions
      }

      return definitions
    },
  }
}
