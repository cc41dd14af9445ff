/**
 * HttpApp - route table with request dispatch
 *
 * Rules use placeholder templates (`/items/<int:id>`). The app is also a
 * `RouteSource`, so the OpenAPI generator can document it directly.
 *
 * - Routes: get, post, put, patch, delete, route (several methods)
 * - Automatic HEAD for GET rules and OPTIONS for every rule
 * - Error handling: RouteDocError → its status, anything else → 500
 * - Fetch handler: fetch() for the Node.js serve helper or tests
 */

import { Errors, RouteDocError, isServerError } from '../errors/index.js'
import { createRouteTable, type RouteEntry, type RouteTable } from '../routing/route-table.js'
import type { HttpMethod, RouteSource } from '../routing/types.js'
import { isHttpMethod } from '../routing/types.js'
import type { RouteDocs } from '../openapi/docs.js'
import { createLogger } from '../utils/logger.js'
import { RequestContext } from './context.js'

const logger = createLogger('http')

/** Handler function for routes */
export type RouteHandler = (c: RequestContext) => Response | Promise<Response>

/** Route registration options */
export interface RouteOptions {
  /** Methods for `route()` (default: GET) */
  methods?: HttpMethod[]
  /** Endpoint name (default: handler name, then the rule) */
  endpoint?: string
  /** Documentation record, usually from `openapiDocs()` */
  docs?: RouteDocs
}

function errorResponse(error: RouteDocError, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify({ error: error.toJSON() }), {
    status: error.status,
    headers: { 'Content-Type': 'application/json; charset=UTF-8', ...headers },
  })
}

/**
 * HttpApp
 *
 * @example
 * const app = new HttpApp()
 *
 * app.get('/items', function list_items(c) {
 *   return c.json([])
 * })
 * app.get('/items/<int:id>', function get_item(c) {
 *   return c.json({ id: c.params.id })
 * }, { docs: openapiDocs({ doc: 'Get one item', tags: ['items'] }) })
 *
 * serve({ fetch: app.fetch, port: 3000 })
 */
export class HttpApp implements RouteSource {
  private readonly table: RouteTable<RouteHandler> = createRouteTable<RouteHandler>()

  /**
   * Register a rule for several methods
   */
  route(rule: string, handler: RouteHandler, options: RouteOptions = {}): this {
    this.table.add({
      rule,
      methods: options.methods ?? ['GET'],
      endpoint: options.endpoint ?? (handler.name || rule),
      handler,
      docs: options.docs,
    })
    return this
  }

  get(rule: string, handler: RouteHandler, options: Omit<RouteOptions, 'methods'> = {}): this {
    return this.route(rule, handler, { ...options, methods: ['GET'] })
  }

  post(rule: string, handler: RouteHandler, options: Omit<RouteOptions, 'methods'> = {}): this {
    return this.route(rule, handler, { ...options, methods: ['POST'] })
  }

  put(rule: string, handler: RouteHandler, options: Omit<RouteOptions, 'methods'> = {}): this {
    return this.route(rule, handler, { ...options, methods: ['PUT'] })
  }

  patch(rule: string, handler: RouteHandler, options: Omit<RouteOptions, 'methods'> = {}): this {
    return this.route(rule, handler, { ...options, methods: ['PATCH'] })
  }

  delete(rule: string, handler: RouteHandler, options: Omit<RouteOptions, 'methods'> = {}): this {
    return this.route(rule, handler, { ...options, methods: ['DELETE'] })
  }

  /**
   * Registered rules in registration order
   */
  iterRules(): IterableIterator<RouteEntry<RouteHandler>> {
    return this.table.iterRules()
  }

  /**
   * Fetch handler - compatible with the Web Fetch API
   *
   * @example
   * const res = await app.fetch(new Request('http://localhost/items/1'))
   */
  fetch = async (request: Request): Promise<Response> => {
    const pathname = new URL(request.url).pathname
    const method = request.method.toUpperCase()

    try {
      const matches = this.table.match(pathname)
      if (matches.length === 0) {
        return errorResponse(Errors.notFound(pathname))
      }

      const allowed = new Set<HttpMethod>()
      for (const match of matches) {
        for (const m of match.entry.methods) allowed.add(m)
      }
      const allow = Array.from(allowed).join(', ')

      if (method === 'OPTIONS') {
        return new Response(null, { status: 204, headers: { Allow: allow } })
      }

      const lookup = method === 'HEAD' ? 'GET' : method
      const matched = isHttpMethod(lookup)
        ? matches.find((match) => match.entry.methods.has(lookup))
        : undefined

      if (!matched) {
        return errorResponse(Errors.methodNotAllowed(method, pathname, Array.from(allowed)), {
          Allow: allow,
        })
      }

      const ctx = new RequestContext(request, matched.params, matched.entry.endpoint)
      const response = await matched.entry.handler(ctx)

      if (method === 'HEAD') {
        return new Response(null, { status: response.status, headers: response.headers })
      }
      return response
    } catch (err) {
      if (err instanceof RouteDocError) {
        if (isServerError(err.status)) {
          logger.error({ err, method, path: pathname }, 'Handler failed')
        } else {
          logger.debug({ code: err.code, method, path: pathname }, 'Handler rejected request')
        }
        return errorResponse(err)
      }

      logger.error({ err, method, path: pathname }, 'Unhandled error')
      return errorResponse(Errors.internal())
    }
  }
}
