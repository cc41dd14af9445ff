/**
 * OpenAPI docs mount
 *
 * Serves the generated document and a viewer page from an HttpApp. Both
 * routes live under the docs endpoint, so the generator never lists them.
 */

import { generateDocsHTML } from '../docs/ui/index.js'
import { getOpenAPI, type OpenAPI } from '../openapi/generator.js'
import type { OpenAPIOptions } from '../openapi/config.js'
import { createLogger } from '../utils/logger.js'
import type { HttpApp } from './app.js'

const logger = createLogger('openapi-docs')

/**
 * Mount the docs endpoint on an app
 *
 * - `GET {prefix}{endpoint}` - Swagger UI or ReDoc page
 * - `GET {prefix}{endpoint}{filename}` - the JSON document
 *
 * @example
 * ```typescript
 * const app = new HttpApp()
 * // ... register routes
 * mountOpenAPI(app, { info: { title: 'Inventory', version: '1.0.0' } })
 * // GET /docs/new/ and GET /docs/new/openapi.json
 * ```
 */
export function mountOpenAPI(app: HttpApp, options?: OpenAPIOptions): OpenAPI {
  const openapi = getOpenAPI(app, options)
  const basePath = openapi.basePath
  const specUrl = `${basePath}${openapi.config.filename}`

  app.get(
    basePath,
    (c) =>
      c.html(
        generateDocsHTML({
          ui: openapi.config.ui,
          title: openapi.config.info.title,
          specUrl,
        })
      ),
    { endpoint: 'openapi_ui' }
  )

  app.get(specUrl, (c) => c.json(openapi.spec), { endpoint: 'openapi_spec' })

  logger.debug({ basePath, specUrl, ui: openapi.config.ui }, 'OpenAPI docs mounted')

  return openapi
}
