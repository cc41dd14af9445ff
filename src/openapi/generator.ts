/**
 * OpenAPI Document Assembler
 *
 * Walks the rules of a route source, documents every eligible (path, method)
 * pair and folds the result into one OpenAPI document. The document is built
 * lazily and cached on the `OpenAPI` instance for the lifetime of the process.
 */

import { createLogger } from '../utils/logger.js'
import { toLowerMethod, type RouteRule, type RouteSource } from '../routing/types.js'
import { resolveOpenAPIConfig, docsBasePath, type OpenAPIConfig, type OpenAPIMode, type OpenAPIOptions } from './config.js'
import { OPENAPI_SCHEME } from './docs.js'
import { mergeDeep } from './merge.js'
import { buildOperation, isDocumentedMethod } from './operation.js'
import { parseUrl } from './path.js'
import { createSchemaRegistry, type SchemaRegistry } from './schema-registry.js'
import type { OpenAPIDocument, OpenAPIPathItem, OpenAPITag } from './types.js'

const logger = createLogger('openapi')

export interface AssembleResult {
  document: OpenAPIDocument
  /** Registry filled during the pass, already flattened */
  registry: SchemaRegistry
}

/**
 * Decide whether the inclusion policy drops a route documented by `scheme`.
 *
 * Under `normal`, a route without any documentation scheme is kept; only a
 * record produced by a different scheme excludes it.
 */
export function isExcludedByMode(mode: OpenAPIMode, scheme: string | undefined): boolean {
  switch (mode) {
    case 'greedy':
      return false
    case 'strict':
      return scheme !== OPENAPI_SCHEME
    case 'normal':
      return scheme !== undefined && scheme !== OPENAPI_SCHEME
  }
}

function isServedByDocs(rule: RouteRule, config: OpenAPIConfig): boolean {
  return rule.rule.startsWith(docsBasePath(config)) || rule.rule.startsWith(config.staticPrefix)
}

function assemble(source: RouteSource, config: OpenAPIConfig): AssembleResult {
  const registry = createSchemaRegistry()
  const paths: Record<string, OpenAPIPathItem> = {}
  const tags = new Map<string, OpenAPITag>()

  for (const rule of source.iterRules()) {
    if (isServedByDocs(rule, config)) {
      logger.debug({ rule: rule.rule }, 'Skipping docs or static route')
      continue
    }

    const { path, parameters } = parseUrl(rule.rule)

    if (isExcludedByMode(config.mode, rule.docs?.scheme)) {
      logger.debug({ rule: rule.rule, mode: config.mode, scheme: rule.docs?.scheme }, 'Skipping route')
      continue
    }

    // Several rules (one per method, say) may share a path
    let item = paths[path]
    if (!item) {
      item = {}
      paths[path] = item
    }

    for (const method of rule.methods) {
      if (!isDocumentedMethod(method)) continue

      for (const tag of rule.docs?.tags ?? []) {
        if (!tags.has(tag)) {
          tags.set(tag, { name: tag })
        }
      }

      item[toLowerMethod(method)] = buildOperation({
        endpoint: rule.endpoint,
        method,
        docs: rule.docs,
        parameters,
        registry,
      })
    }
  }

  const definitions = registry.flatten()

  const document: OpenAPIDocument = {
    openapi: config.openapiVersion,
    info: structuredClone(config.info),
    tags: Array.from(tags.values()),
    paths,
    components: {
      schemas: registry.schemas(),
    },
    definitions,
  }

  mergeDeep(document, structuredClone(config.extraProps))

  logger.info(
    { paths: Object.keys(paths).length, schemas: registry.size, mode: config.mode },
    'OpenAPI document generated'
  )

  return { document, registry }
}

/**
 * Assemble a fresh document and return it with the schema registry it filled
 *
 * @throws RouteDocError `DUPLICATE_PARAMETER_NAME` or `MALFORMED_TEMPLATE` from
 * any rule; one bad template aborts the whole pass
 */
export function assembleOpenAPI(source: RouteSource, options?: OpenAPIOptions): AssembleResult {
  return assemble(source, resolveOpenAPIConfig(options))
}

/**
 * Generate an OpenAPI document from a route source
 *
 * @example
 * ```typescript
 * const doc = generateOpenAPI(app, {
 *   info: { title: 'Inventory', version: '1.0.0' },
 *   mode: 'strict',
 * })
 * ```
 */
export function generateOpenAPI(source: RouteSource, options?: OpenAPIOptions): OpenAPIDocument {
  return assembleOpenAPI(source, options).document
}

/**
 * Generate the OpenAPI document as a JSON string
 */
export function generateOpenAPIJson(source: RouteSource, options?: OpenAPIOptions): string {
  return JSON.stringify(generateOpenAPI(source, options), null, 2)
}

/**
 * Lazily generated, cached OpenAPI document of one route source
 */
export class OpenAPI {
  readonly config: OpenAPIConfig
  private cached: OpenAPIDocument | undefined

  constructor(
    readonly source: RouteSource,
    options?: OpenAPIOptions
  ) {
    this.config = resolveOpenAPIConfig(options)
  }

  /**
   * The document, computed on first access and then returned as the same
   * object. Routes added after the first access are not picked up.
   */
  get spec(): OpenAPIDocument {
    if (this.cached === undefined) {
      this.cached = this.generateSpec()
    }
    return this.cached
  }

  /** Whether the document has been computed */
  get isGenerated(): boolean {
    return this.cached !== undefined
  }

  /** Full path of the docs endpoint */
  get basePath(): string {
    return docsBasePath(this.config)
  }

  /**
   * Replace the overrides merged into the document. Takes effect only if the
   * document has not been computed yet.
   */
  setExtraProps(extraProps: Record<string, unknown>): void {
    this.config.extraProps = extraProps
  }

  /** Build a new document, bypassing the cache */
  generateSpec(): OpenAPIDocument {
    return assemble(this.source, this.config).document
  }
}

const instances = new WeakMap<RouteSource, OpenAPI>()

/**
 * Get the `OpenAPI` instance of a route source, creating it on first use
 */
export function getOpenAPI(source: RouteSource, options?: OpenAPIOptions): OpenAPI {
  let openapi = instances.get(source)
  if (!openapi) {
    openapi = new OpenAPI(source, options)
    instances.set(source, openapi)
  }
  return openapi
}

/**
 * Return the cached OpenAPI document of a route source.
 *
 * The first call fixes every option but `extraProps`; later calls only replace
 * `extraProps`, which matters only while the document is still uncomputed.
 */
export function addOpenAPISpec(source: RouteSource, options: OpenAPIOptions = {}): OpenAPIDocument {
  const openapi = getOpenAPI(source, options)
  openapi.setExtraProps(options.extraProps ?? {})
  return openapi.spec
}
