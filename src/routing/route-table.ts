/**
 * Route Table
 *
 * Stores rules in registration order together with their handlers and
 * documentation records. Rules are kept as raw templates and compiled on first
 * dispatch, so a malformed template surfaces when it is first matched or
 * documented.
 */

import { Errors } from '../errors/index.js'
import type { RouteDocs } from '../openapi/docs.js'
import { compileRule, matchRule, type CompiledRule, type RouteParams } from './matcher.js'
import type { HttpMethod, RouteRule, RouteSource } from './types.js'

export interface RouteEntry<H> extends RouteRule {
  readonly handler: H
}

export interface AddRouteInput<H> {
  rule: string
  /** Declared methods; HEAD (for GET) and OPTIONS are added automatically */
  methods: readonly HttpMethod[]
  endpoint: string
  handler: H
  docs?: RouteDocs
}

export interface RouteMatch<H> {
  entry: RouteEntry<H>
  params: RouteParams
}

export interface RouteTable<H> extends RouteSource {
  add(input: AddRouteInput<H>): RouteEntry<H>

  iterRules(): IterableIterator<RouteEntry<H>>

  /** Every entry whose template matches the path, in registration order */
  match(pathname: string): RouteMatch<H>[]

  readonly size: number
}

/**
 * Methods a rule answers: the declared ones, HEAD when GET is declared, and
 * OPTIONS always
 */
export function normalizeMethods(methods: readonly HttpMethod[]): Set<HttpMethod> {
  const normalized = new Set<HttpMethod>(methods)
  if (normalized.has('GET')) {
    normalized.add('HEAD')
  }
  normalized.add('OPTIONS')
  return normalized
}

/**
 * Create an empty route table
 */
export function createRouteTable<H>(): RouteTable<H> {
  const entries: RouteEntry<H>[] = []
  const compiled = new Map<RouteEntry<H>, CompiledRule>()

  function compiledFor(entry: RouteEntry<H>): CompiledRule {
    let rule = compiled.get(entry)
    if (!rule) {
      rule = compileRule(entry.rule)
      compiled.set(entry, rule)
    }
    return rule
  }

  return {
    add(input: AddRouteInput<H>): RouteEntry<H> {
      if (input.methods.length === 0) {
        throw Errors.invalidArgument('At least one method is required', { rule: input.rule })
      }

      for (const existing of entries) {
        if (existing.rule !== input.rule) continue
        const clash = input.methods.find((method) => existing.methods.has(method))
        if (clash) {
          throw Errors.alreadyExists('Route', `${clash} ${input.rule}`)
        }
      }

      const entry: RouteEntry<H> = {
        rule: input.rule,
        methods: normalizeMethods(input.methods),
        endpoint: input.endpoint,
        handler: input.handler,
        docs: input.docs,
      }
      entries.push(entry)
      return entry
    },

    iterRules(): IterableIterator<RouteEntry<H>> {
      return entries.values()
    },

    match(pathname: string): RouteMatch<H>[] {
      const matches: RouteMatch<H>[] = []
      for (const entry of entries) {
        const params = matchRule(compiledFor(entry), pathname)
        if (params) {
          matches.push({ entry, params })
        }
      }
      return matches
    },

    get size(): number {
      return entries.length
    },
  }
}
