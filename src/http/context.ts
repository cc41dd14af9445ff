/**
 * RequestContext - per-request helpers handed to route handlers
 *
 * Provides:
 * - Request data: c.req, c.params, c.query()
 * - Response helpers: c.json(), c.text(), c.html()
 */

import type { RouteParams } from '../routing/matcher.js'

/** Extra response headers */
export type ResponseHeaders = Record<string, string>

export class RequestContext {
  private parsedUrl: URL | undefined

  constructor(
    /** Raw Request object */
    readonly req: Request,
    /** Converted path parameters */
    readonly params: RouteParams,
    /** Endpoint name of the matched rule */
    readonly endpoint: string
  ) {}

  get url(): URL {
    if (!this.parsedUrl) {
      this.parsedUrl = new URL(this.req.url)
    }
    return this.parsedUrl
  }

  /**
   * Get one query parameter, or all of them
   */
  query(): Record<string, string>
  query(name: string): string | undefined
  query(name?: string): string | undefined | Record<string, string> {
    if (name === undefined) {
      return Object.fromEntries(this.url.searchParams)
    }
    return this.url.searchParams.get(name) ?? undefined
  }

  json(data: unknown, status = 200, headers: ResponseHeaders = {}): Response {
    return this.respond(JSON.stringify(data), 'application/json; charset=UTF-8', status, headers)
  }

  text(data: string, status = 200, headers: ResponseHeaders = {}): Response {
    return this.respond(data, 'text/plain; charset=UTF-8', status, headers)
  }

  html(data: string, status = 200, headers: ResponseHeaders = {}): Response {
    return this.respond(data, 'text/html; charset=UTF-8', status, headers)
  }

  private respond(body: string, contentType: string, status: number, headers: ResponseHeaders): Response {
    const responseHeaders = new Headers(headers)
    responseHeaders.set('Content-Type', contentType)
    return new Response(body, { status, headers: responseHeaders })
  }
}
