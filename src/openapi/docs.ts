/**
 * Route documentation records
 *
 * A `RouteDocs` record is attached to a rule when it is registered. The
 * generator reads it as plain data: doc text, declared data shapes, declared
 * error responses, tags, and the scheme that produced the record.
 */

import { cleanDoc } from '../utils/text.js'
import type { DataShape } from './shapes.js'

/** Scheme marker stamped on records created by {@link openapiDocs} */
export const OPENAPI_SCHEME = 'routedoc/openapi'

export interface RouteDocs {
  /**
   * Which documentation scheme produced this record. Records from another
   * scheme are skipped in `normal` and `strict` modes.
   */
  scheme?: string
  /** Summary, then a blank line, then the description */
  doc?: string
  /** Query string shape, documented as one required query parameter */
  query?: DataShape
  /** JSON body shape */
  body?: DataShape
  /** Form body shape; takes precedence over `body` */
  form?: DataShape
  /** Shape of the 200 response */
  response?: DataShape
  /** Declared responses, status code → description */
  exceptions?: Record<string, string>
  tags?: string[]
}

/**
 * A declared error response of a route
 *
 * @example
 * openapiDocs({ exceptions: [new APIError(404, 'Item not found')] })
 */
export class APIError {
  constructor(
    readonly code: number,
    readonly message: string
  ) {}

  toString(): string {
    return `${this.code} ${this.message}`
  }
}

export interface OpenAPIDocsOptions {
  doc?: string
  query?: DataShape
  body?: DataShape
  form?: DataShape
  response?: DataShape
  exceptions?: APIError[]
  tags?: string[]
}

/**
 * Build the documentation record of a route
 *
 * @example
 * ```typescript
 * app.get('/items/<int:id>', getItem, {
 *   docs: openapiDocs({
 *     doc: 'Get an item',
 *     response: ItemShape,
 *     exceptions: [new APIError(404, 'Item not found')],
 *     tags: ['items'],
 *   }),
 * })
 * ```
 */
export function openapiDocs(options: OpenAPIDocsOptions = {}): RouteDocs {
  const docs: RouteDocs = { scheme: OPENAPI_SCHEME }

  if (options.doc !== undefined) docs.doc = options.doc
  if (options.query) docs.query = options.query
  if (options.body) docs.body = options.body
  if (options.form) docs.form = options.form
  if (options.response) docs.response = options.response

  const exceptions: Record<string, string> = {}
  for (const error of options.exceptions ?? []) {
    exceptions[String(error.code)] = error.message
  }
  if (Object.keys(exceptions).length > 0) {
    docs.exceptions = exceptions
  }

  if (options.tags && options.tags.length > 0) {
    docs.tags = [...options.tags]
  }

  return docs
}

/**
 * Split doc text into summary and description on the first blank line
 *
 * @example
 * getSummaryDescription('List items\n\nReturns every item.')
 * // { summary: 'List items', description: 'Returns every item.' }
 */
export function getSummaryDescription(doc: string | undefined): {
  summary?: string
  description?: string
} {
  if (!doc) return {}

  const cleaned = cleanDoc(doc)
  if (!cleaned) return {}

  const split = cleaned.indexOf('\n\n')
  if (split === -1) {
    return { summary: cleaned }
  }

  return {
    summary: cleaned.slice(0, split),
    description: cleaned.slice(split + 2),
  }
}

/**
 * Whether any request or response shape is declared
 */
export function hasDeclaredShapes(docs: RouteDocs | undefined): boolean {
  return Boolean(docs && (docs.query || docs.body || docs.form || docs.response))
}
