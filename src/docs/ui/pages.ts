/**
 * Documentation viewer pages
 *
 * Swagger UI and ReDoc pages that load the generated document by URL. Both
 * viewers come from their public CDN builds.
 */

import type { DocsPageOptions } from './types.js'
import { escapeHtml, escapeJsonForScript } from './utils.js'

const SWAGGER_UI_CDN = 'https://cdn.jsdelivr.net/npm/swagger-ui-dist@5'
const REDOC_CDN = 'https://cdn.redoc.ly/redoc/latest/bundles/redoc.standalone.js'

export function generateSwaggerHTML(title: string, specUrl: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(title)}</title>
  <link rel="stylesheet" href="${SWAGGER_UI_CDN}/swagger-ui.css">
</head>
<body>
  <div id="swagger-ui"></div>
  <script src="${SWAGGER_UI_CDN}/swagger-ui-bundle.js"></script>
  <script>
    window.ui = SwaggerUIBundle({
      url: ${escapeJsonForScript(specUrl)},
      dom_id: '#swagger-ui',
      deepLinking: true,
    })
  </script>
</body>
</html>
`
}

export function generateRedocHTML(title: string, specUrl: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(title)}</title>
  <style>body { margin: 0; padding: 0; }</style>
</head>
<body>
  <redoc spec-url="${escapeHtml(specUrl)}"></redoc>
  <script src="${REDOC_CDN}"></script>
</body>
</html>
`
}

/**
 * Render the configured viewer page
 */
export function generateDocsHTML(options: DocsPageOptions): string {
  switch (options.ui) {
    case 'swagger':
      return generateSwaggerHTML(options.title, options.specUrl)
    case 'redoc':
      return generateRedocHTML(options.title, options.specUrl)
  }
}
