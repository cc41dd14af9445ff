/**
 * UI Types
 */

import type { OpenAPIUi } from '../../openapi/config.js'

/**
 * Options for generating a viewer page
 */
export interface DocsPageOptions {
  /** Which viewer to render */
  ui: OpenAPIUi
  /** Page title, usually `info.title` */
  title: string
  /** URL the viewer loads the OpenAPI document from */
  specUrl: string
}
