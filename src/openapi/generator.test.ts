/**
 * OpenAPI Document Assembler Tests
 */

import { describe, it, expect } from 'vitest'
import {
  OpenAPI,
  addOpenAPISpec,
  assembleOpenAPI,
  generateOpenAPI,
  generateOpenAPIJson,
  getOpenAPI,
  isExcludedByMode,
} from './generator.js'
import { OPENAPI_SCHEME, openapiDocs, type RouteDocs } from './docs.js'
import type { DataShape } from './shapes.js'
import type { HttpMethod, RouteRule, RouteSource } from '../routing/types.js'
import { isRouteDocError } from '../errors/index.js'

function rule(template: string, methods: HttpMethod[], endpoint: string, docs?: RouteDocs): RouteRule {
  return { rule: template, methods: new Set(methods), endpoint, docs }
}

function source(...rules: RouteRule[]): RouteSource {
  return { iterRules: () => rules }
}

function shape(name: string, schema: Record<string, unknown> = { type: 'object' }): DataShape {
  return { name, schema: () => structuredClone(schema) }
}

function thrown(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error('expected an error')
}

describe('isExcludedByMode', () => {
  it('should apply the inclusion policy', () => {
    expect(isExcludedByMode('normal', undefined)).toBe(false)
    expect(isExcludedByMode('normal', OPENAPI_SCHEME)).toBe(false)
    expect(isExcludedByMode('normal', 'other')).toBe(true)

    expect(isExcludedByMode('strict', undefined)).toBe(true)
    expect(isExcludedByMode('strict', OPENAPI_SCHEME)).toBe(false)
    expect(isExcludedByMode('strict', 'other')).toBe(true)

    expect(isExcludedByMode('greedy', undefined)).toBe(false)
    expect(isExcludedByMode('greedy', 'other')).toBe(false)
  })
})

describe('generateOpenAPI', () => {
  it('should document every rule of the source', () => {
    const Item = shape('Item')
    const doc = generateOpenAPI(
      source(
        rule('/items', ['GET', 'HEAD', 'OPTIONS'], 'list_items', openapiDocs({ doc: 'List items', tags: ['items'] })),
        rule(
          '/items/<int(min=1):id>',
          ['GET', 'HEAD', 'OPTIONS'],
          'get_item',
          openapiDocs({ response: Item, tags: ['items', 'read'] })
        ),
        rule('/items/<int(min=1):id>', ['DELETE', 'OPTIONS'], 'delete_item')
      ),
      { info: { title: 'Items', version: '1.0.0' } }
    )

    expect(doc.openapi).toBe('3.0.2')
    expect(doc.info).toEqual({ title: 'Items', version: '1.0.0' })
    expect(doc.tags).toEqual([{ name: 'items' }, { name: 'read' }])
    expect(Object.keys(doc.paths)).toEqual(['/items', '/items/{id}'])
    expect(Object.keys(doc.paths['/items/{id}'] ?? {})).toEqual(['get', 'delete'])
    expect(doc.paths['/items']?.get).toEqual({
      summary: 'List items',
      description: '',
      operationID: 'list_items__get',
      tags: ['items'],
      parameters: [],
      responses: { '200': { description: 'Successful Response' } },
    })
    expect(doc.paths['/items/{id}']?.get?.parameters).toEqual([
      {
        name: 'id',
        in: 'path',
        required: true,
        schema: { type: 'integer', format: 'int32', minimum: 1 },
      },
    ])
    expect(doc.paths['/items/{id}']?.get?.responses).toEqual({
      '200': {
        description: 'Successful Response',
        content: { 'application/json': { schema: { $ref: '#/components/schemas/Item' } } },
      },
      '400': { description: 'Validation Error' },
    })
    expect(doc.paths['/items/{id}']?.delete?.summary).toBe('Delete_item')
    expect(doc.components).toEqual({ schemas: { Item: { type: 'object' } } })
    expect(doc.definitions).toEqual({})
  })

  it('should skip the docs endpoint and static routes without parsing them', () => {
    const doc = generateOpenAPI(
      source(
        rule('/docs/new/', ['GET'], 'openapi_ui'),
        rule('/docs/new/openapi.json', ['GET'], 'openapi_spec'),
        rule('/static/<bad', ['GET'], 'static'),
        rule('/health', ['GET'], 'health')
      )
    )

    expect(Object.keys(doc.paths)).toEqual(['/health'])
  })

  it('should put the url prefix in front of the docs endpoint', () => {
    const doc = generateOpenAPI(
      source(
        rule('/api/docs/', ['GET'], 'openapi_ui'),
        rule('/docs/', ['GET'], 'legacy_docs'),
        rule('/assets/app.js', ['GET'], 'asset')
      ),
      { urlPrefix: '/api', endpoint: '/docs/', staticPrefix: '/assets' }
    )

    expect(Object.keys(doc.paths)).toEqual(['/docs/'])
  })

  describe('inclusion modes', () => {
    const routes = source(
      rule('/documented', ['GET'], 'documented', openapiDocs()),
      rule('/plain', ['GET'], 'plain'),
      rule('/foreign', ['GET'], 'foreign', { scheme: 'other/scheme', doc: 'Elsewhere' })
    )

    it('should skip foreign records in normal mode', () => {
      expect(Object.keys(generateOpenAPI(routes).paths)).toEqual(['/documented', '/plain'])
    })

    it('should keep only own records in strict mode', () => {
      expect(Object.keys(generateOpenAPI(routes, { mode: 'strict' }).paths)).toEqual(['/documented'])
    })

    it('should keep everything in greedy mode', () => {
      const doc = generateOpenAPI(routes, { mode: 'greedy' })

      expect(Object.keys(doc.paths)).toEqual(['/documented', '/plain', '/foreign'])
      expect(doc.paths['/foreign']?.get?.summary).toBe('Elsewhere')
    })
  })

  it('should abort on a bad template even when the route is excluded', () => {
    const err = thrown(() =>
      generateOpenAPI(source(rule('/items/<id>/<id>', ['GET'], 'broken')), { mode: 'strict' })
    )

    expect(isRouteDocError(err, 'DUPLICATE_PARAMETER_NAME')).toBe(true)
  })

  it('should abort on a malformed template', () => {
    const err = thrown(() =>
      generateOpenAPI(source(rule('/ok', ['GET'], 'ok'), rule('/items/<id', ['GET'], 'broken')))
    )

    expect(isRouteDocError(err, 'MALFORMED_TEMPLATE')).toBe(true)
  })

  it('should document routes whose converter arguments are only partly readable', () => {
    const doc = generateOpenAPI(
      source(
        rule('/lang/<any(café, thé):drink>', ['GET'], 'drink'),
        rule('/t/<int(min=-5):n>', ['GET'], 'temperature')
      )
    )

    expect(Object.keys(doc.paths)).toEqual(['/lang/{drink}', '/t/{n}'])
  })

  it('should hoist nested definitions to the document', () => {
    const Item = shape('Item', {
      type: 'object',
      properties: { tag: { $ref: '#/definitions/Tag' } },
      definitions: { Tag: { type: 'string' } },
    })

    const doc = generateOpenAPI(source(rule('/items', ['GET'], 'list', openapiDocs({ response: Item }))))

    expect(doc.definitions).toEqual({ Tag: { type: 'string' } })
    expect(doc.components.schemas).toEqual({
      Item: { type: 'object', properties: { tag: { $ref: '#/definitions/Tag' } } },
    })
  })

  it('should merge extra properties without changing the options', () => {
    const options = {
      info: { title: 'Items', version: '1.0.0', contact: { name: 'Ops' } },
      extraProps: {
        info: { description: 'Inventory', contact: { email: 'ops@example.com' } },
        servers: [{ url: 'http://localhost:3000' }],
        components: { securitySchemes: { token: { type: 'http', scheme: 'bearer' } } },
      },
    }
    const routes = source(rule('/items', ['GET'], 'list'))

    const first = generateOpenAPI(routes, options)
    const second = generateOpenAPI(routes, options)

    expect(first.info).toEqual({
      title: 'Items',
      version: '1.0.0',
      description: 'Inventory',
      contact: { name: 'Ops', email: 'ops@example.com' },
    })
    expect(first['servers']).toEqual([{ url: 'http://localhost:3000' }])
    expect(first.components).toEqual({
      schemas: {},
      securitySchemes: { token: { type: 'http', scheme: 'bearer' } },
    })
    expect(second).toEqual(first)
    expect(first['servers']).not.toBe(options.extraProps.servers)
    expect(first.info['contact']).not.toBe(options.info.contact)
    expect(options.info).toEqual({ title: 'Items', version: '1.0.0', contact: { name: 'Ops' } })
  })

  it('should let extra properties override generated values', () => {
    const doc = generateOpenAPI(source(), { extraProps: { openapi: '3.0.3', tags: [{ name: 'x' }] } })

    expect(doc.openapi).toBe('3.0.3')
    expect(doc.tags).toEqual([{ name: 'x' }])
  })

  it('should render the document as JSON', () => {
    const routes = source(rule('/items', ['GET'], 'list'))

    expect(JSON.parse(generateOpenAPIJson(routes))).toEqual(generateOpenAPI(routes))
  })
})

describe('assembleOpenAPI', () => {
  it('should return the registry filled during the pass', () => {
    const { document, registry } = assembleOpenAPI(
      source(
        rule('/items', ['POST'], 'create', openapiDocs({ body: shape('NewItem'), response: shape('Item') }))
      )
    )

    expect(registry.names()).toEqual(['NewItem', 'Item'])
    expect(Object.keys(document.components.schemas)).toEqual(['NewItem', 'Item'])
  })
})

describe('OpenAPI', () => {
  it('should compute the document once', () => {
    const rules = [rule('/items', ['GET'], 'list')]
    const openapi = new OpenAPI({ iterRules: () => rules })

    expect(openapi.isGenerated).toBe(false)
    const spec = openapi.spec
    expect(openapi.isGenerated).toBe(true)

    rules.push(rule('/later', ['GET'], 'later'))

    expect(openapi.spec).toBe(spec)
    expect(Object.keys(spec.paths)).toEqual(['/items'])
    expect(Object.keys(openapi.generateSpec().paths)).toEqual(['/items', '/later'])
  })

  it('should expose the docs base path', () => {
    expect(new OpenAPI(source(), { urlPrefix: '/api' }).basePath).toBe('/api/docs/new/')
  })
})

describe('addOpenAPISpec', () => {
  it('should return the same document for the same source', () => {
    const routes = source(rule('/items', ['GET'], 'list'))

    const first = addOpenAPISpec(routes, { info: { title: 'Items', version: '1.0.0' } })
    const second = addOpenAPISpec(routes, { extraProps: { late: true } })

    expect(second).toBe(first)
    expect(first['late']).toBeUndefined()
    expect(first.info.title).toBe('Items')
  })

  it('should apply extra properties given before the first computation', () => {
    const routes = source(rule('/items', ['GET'], 'list'))

    const openapi = getOpenAPI(routes, { mode: 'strict' })
    const spec = addOpenAPISpec(routes, { extraProps: { early: true } })

    expect(getOpenAPI(routes)).toBe(openapi)
    expect(spec['early']).toBe(true)
    expect(spec.paths).toEqual({})
  })

  it('should keep one instance per source', () => {
    const a = source()
    const b = source()

    expect(getOpenAPI(a)).toBe(getOpenAPI(a))
    expect(getOpenAPI(a)).not.toBe(getOpenAPI(b))
  })
})
