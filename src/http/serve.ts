/**
 * Node.js Serve Helper
 *
 * Runs a fetch handler (such as `app.fetch`) on a Node.js http server.
 */

import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('serve')

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** Fetch handler function */
export type FetchHandler = (request: Request) => Response | Promise<Response>

/** Serve options */
export interface ServeOptions {
  /** Fetch handler (e.g., app.fetch) */
  fetch: FetchHandler

  /** Port to listen on (default: 3000) */
  port?: number

  /** Hostname to bind to (default: 0.0.0.0) */
  hostname?: string

  /** Callback when server starts listening */
  onListen?: (info: { port: number; hostname: string }) => void
}

// ─────────────────────────────────────────────────────────────────────────────
// Request Conversion
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Convert Node.js IncomingMessage to Web Request
 */
async function nodeRequestToWebRequest(req: IncomingMessage): Promise<Request> {
  const host = req.headers.host || 'localhost'
  const url = `http://${host}${req.url || '/'}`

  // Read body for methods that typically have one
  let body: Buffer | undefined
  if (req.method !== 'GET' && req.method !== 'HEAD' && req.method !== 'OPTIONS') {
    const chunks: Buffer[] = []
    for await (const chunk of req) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
    }
    if (chunks.length > 0) {
      body = Buffer.concat(chunks)
    }
  }

  const headers: Record<string, string> = {}
  for (const [key, value] of Object.entries(req.headers)) {
    if (value) {
      headers[key] = Array.isArray(value) ? value.join(', ') : value
    }
  }

  return new Request(url, { method: req.method, headers, body })
}

/**
 * Send Web Response to Node.js ServerResponse
 */
async function sendWebResponse(webResponse: Response, nodeRes: ServerResponse): Promise<void> {
  nodeRes.statusCode = webResponse.status
  webResponse.headers.forEach((value, key) => {
    nodeRes.setHeader(key, value)
  })

  if (webResponse.body) {
    const reader = webResponse.body.getReader()
    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break
        nodeRes.write(value)
      }
    } finally {
      reader.releaseLock()
    }
  }

  nodeRes.end()
}

// ─────────────────────────────────────────────────────────────────────────────
// Serve Function
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create and start an HTTP server for the given fetch handler
 *
 * @example
 * const app = new HttpApp()
 * mountOpenAPI(app, { info: { title: 'Inventory', version: '1.0.0' } })
 *
 * const server = serve({ fetch: app.fetch, port: 3000 })
 */
export function serve(options: ServeOptions): Server {
  const { fetch, port = 3000, hostname = '0.0.0.0', onListen } = options

  async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    try {
      const webRequest = await nodeRequestToWebRequest(req)
      const webResponse = await fetch(webRequest)
      await sendWebResponse(webResponse, res)
    } catch (err) {
      logger.error({ err, url: req.url }, 'Request failed')
      if (!res.headersSent) {
        res.statusCode = 500
        res.end('Internal Server Error')
      } else {
        res.destroy()
      }
    }
  }

  const server = createServer((req, res) => {
    handleRequest(req, res).catch((err: unknown) => {
      logger.error({ err }, 'Response handling failed')
    })
  })

  server.on('error', (err) => {
    logger.error({ err }, 'Server error')
  })

  server.listen(port, hostname, () => {
    // Port 0 binds an ephemeral port; report the one actually taken
    const address = server.address()
    const info = {
      port: address !== null && typeof address === 'object' ? address.port : port,
      hostname,
    }
    logger.info(info, 'Listening')
    onListen?.(info)
  })

  return server
}
