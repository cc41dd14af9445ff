/**
 * Routing Types
 */

import type { RouteDocs } from '../openapi/docs.js'

/** HTTP methods */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS' | 'HEAD'

const LOWER_CASE_METHODS: Record<HttpMethod, Lowercase<HttpMethod>> = {
  GET: 'get',
  POST: 'post',
  PUT: 'put',
  PATCH: 'patch',
  DELETE: 'delete',
  OPTIONS: 'options',
  HEAD: 'head',
}

export function isHttpMethod(value: string): value is HttpMethod {
  return Object.prototype.hasOwnProperty.call(LOWER_CASE_METHODS, value)
}

export function toLowerMethod(method: HttpMethod): Lowercase<HttpMethod> {
  return LOWER_CASE_METHODS[method]
}

/**
 * One segment of a parsed route template.
 *
 * Static segments carry literal text; dynamic segments carry the converter tag,
 * its raw argument string (undefined when absent or empty) and the placeholder name.
 */
export type RuleSegment =
  | { kind: 'static'; text: string }
  | { kind: 'dynamic'; converter: string; args: string | undefined; name: string }

/** A scalar converter argument after tokenizing */
export type ConverterArg = string | number | boolean | null

/** Positional and keyword converter arguments */
export interface ConverterArgs {
  args: ConverterArg[]
  kwargs: Record<string, ConverterArg>
}

/**
 * A rule as seen by documentation generators: template, methods, endpoint name
 * and the documentation record attached when the rule was registered.
 */
export interface RouteRule {
  /** Route template, e.g. `/items/<int:id>` */
  readonly rule: string
  /** Methods the rule answers, including automatic HEAD/OPTIONS */
  readonly methods: ReadonlySet<HttpMethod>
  /** Endpoint name (defaults to the handler function name) */
  readonly endpoint: string
  /** Documentation record, when one was attached */
  readonly docs?: RouteDocs
}

/**
 * Anything that can enumerate its rules in registration order
 */
export interface RouteSource {
  iterRules(): Iterable<RouteRule>
}
