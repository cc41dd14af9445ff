/**
 * OpenAPI configuration
 *
 * Options accepted by the generator and the docs mount, validated with zod.
 */

import { z } from 'zod'
import { Errors } from '../errors/index.js'

export const OPENAPI_VERSION = '3.0.2'
export const OPENAPI_ENDPOINT = '/docs/new/'
export const OPENAPI_FILENAME = 'openapi.json'
export const OPENAPI_STATIC_PREFIX = '/static'
export const OPENAPI_INFO = {
  title: 'Service Documents',
  version: 'latest',
} as const

/**
 * Inclusion policy
 *
 * - `normal`: skip routes documented by another scheme
 * - `strict`: keep only routes documented through `openapiDocs`
 * - `greedy`: keep every route
 */
export const openApiModeSchema = z.enum(['normal', 'greedy', 'strict'])

export type OpenAPIMode = z.infer<typeof openApiModeSchema>

export const openApiUiSchema = z.enum(['swagger', 'redoc'])

export type OpenAPIUi = z.infer<typeof openApiUiSchema>

const infoSchema = z
  .object({
    title: z.string(),
    version: z.string(),
    description: z.string().optional(),
  })
  .passthrough()

export const openApiOptionsSchema = z.object({
  /** Path the docs are served under; routes below it are never documented */
  endpoint: z.string().startsWith('/').default(OPENAPI_ENDPOINT),
  /** Prefix put in front of `endpoint` */
  urlPrefix: z.string().optional(),
  mode: openApiModeSchema.default('normal'),
  openapiVersion: z.string().min(1).default(OPENAPI_VERSION),
  info: infoSchema.default(() => ({ ...OPENAPI_INFO })),
  /** Overrides merged into the generated document */
  extraProps: z.record(z.unknown()).default({}),
  /** File name of the JSON document below the docs endpoint */
  filename: z.string().min(1).default(OPENAPI_FILENAME),
  /** Viewer page served at the docs endpoint */
  ui: openApiUiSchema.default('swagger'),
  /** Routes under this prefix serve static assets and are never documented */
  staticPrefix: z.string().default(OPENAPI_STATIC_PREFIX),
})

export type OpenAPIOptions = z.input<typeof openApiOptionsSchema>
export type OpenAPIConfig = z.output<typeof openApiOptionsSchema>

/**
 * Validate options and fill in defaults
 *
 * @throws RouteDocError `INVALID_CONFIG` listing every invalid field
 */
export function resolveOpenAPIConfig(options: OpenAPIOptions = {}): OpenAPIConfig {
  const result = openApiOptionsSchema.safeParse(options)

  if (!result.success) {
    throw Errors.invalidConfig(
      result.error.issues.map((issue) => ({
        path: issue.path.join('.') || '(root)',
        message: issue.message,
      }))
    )
  }

  return result.data
}

/**
 * Full path of the docs endpoint, prefix included
 */
export function docsBasePath(config: Pick<OpenAPIConfig, 'endpoint' | 'urlPrefix'>): string {
  return `${config.urlPrefix ?? ''}${config.endpoint}`
}
