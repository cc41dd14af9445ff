/**
 * HTTP Module
 *
 * - HttpApp: route table with fetch dispatch
 * - mountOpenAPI: docs endpoint serving the document and a viewer page
 * - serve: Node.js server helper
 */

export { HttpApp, type RouteHandler, type RouteOptions } from './app.js'
export { RequestContext, type ResponseHeaders } from './context.js'
export { mountOpenAPI } from './docs.js'
export { serve, type ServeOptions, type FetchHandler } from './serve.js'
