/**
 * OpenAPI Docs Mount Tests
 */

import { describe, it, expect } from 'vitest'
import { HttpApp } from './app.js'
import { mountOpenAPI } from './docs.js'
import { openapiDocs } from '../openapi/docs.js'

function request(path: string): Request {
  return new Request(`http://localhost${path}`)
}

function createApp(): HttpApp {
  const app = new HttpApp()
  app.get('/items', function list_items(c) {
    return c.json([])
  }, { docs: openapiDocs({ doc: 'List items', tags: ['items'] }) })
  return app
}

describe('mountOpenAPI', () => {
  it('should serve the document without the docs routes', async () => {
    const app = createApp()
    const openapi = mountOpenAPI(app, { info: { title: 'Items', version: '1.0.0' } })

    const res = await app.fetch(request('/docs/new/openapi.json'))
    const body: unknown = await res.json()

    expect(res.status).toBe(200)
    expect(res.headers.get('Content-Type')).toBe('application/json; charset=UTF-8')
    expect(body).toMatchObject({
      openapi: '3.0.2',
      info: { title: 'Items', version: '1.0.0' },
      tags: [{ name: 'items' }],
      paths: {
        '/items': { get: { summary: 'List items', operationID: 'list_items__get' } },
      },
    })
    expect(Object.keys(openapi.spec.paths)).toEqual(['/items'])
  })

  it('should serve the cached document', async () => {
    const app = createApp()
    const openapi = mountOpenAPI(app)

    await app.fetch(request('/docs/new/openapi.json'))
    app.get('/later', function later(c) {
      return c.text('')
    })
    const body: unknown = await (await app.fetch(request('/docs/new/openapi.json'))).json()

    expect(openapi.isGenerated).toBe(true)
    expect(body).toEqual(JSON.parse(JSON.stringify(openapi.spec)))
    expect(Object.keys(openapi.spec.paths)).toEqual(['/items'])
  })

  it('should serve a Swagger UI page by default', async () => {
    const app = createApp()
    mountOpenAPI(app, { info: { title: 'Items <beta>', version: '1.0.0' } })

    const res = await app.fetch(request('/docs/new/'))
    const html = await res.text()

    expect(res.status).toBe(200)
    expect(res.headers.get('Content-Type')).toBe('text/html; charset=UTF-8')
    expect(html).toContain('<title>Items &lt;beta&gt;</title>')
    expect(html).toContain('swagger-ui-bundle.js')
    expect(html).toContain('url: "/docs/new/openapi.json",')
  })

  it('should serve a ReDoc page when asked', async () => {
    const app = createApp()
    mountOpenAPI(app, { ui: 'redoc' })

    const html = await (await app.fetch(request('/docs/new/'))).text()

    expect(html).toContain('<redoc spec-url="/docs/new/openapi.json"></redoc>')
    expect(html).toContain('<title>Service Documents</title>')
  })

  it('should mount below the url prefix and endpoint', async () => {
    const app = createApp()
    const openapi = mountOpenAPI(app, { urlPrefix: '/api', endpoint: '/reference/', filename: 'spec.json' })

    expect(openapi.basePath).toBe('/api/reference/')
    expect((await app.fetch(request('/api/reference/spec.json'))).status).toBe(200)
    expect((await app.fetch(request('/api/reference/'))).status).toBe(200)
    expect((await app.fetch(request('/docs/new/openapi.json'))).status).toBe(404)
    expect(Object.keys(openapi.spec.paths)).toEqual(['/items'])
  })
})
