/**
 * Documentation Viewer Page Tests
 */

import { describe, it, expect } from 'vitest'
import { generateDocsHTML } from './pages.js'
import { escapeHtml, escapeJsonForScript } from './utils.js'

describe('escapeHtml', () => {
  it('should escape markup characters', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;&#x27;&amp;&#x27;&lt;/a&gt;'
    )
  })
})

describe('escapeJsonForScript', () => {
  it('should keep a closing script tag out of inline scripts', () => {
    expect(escapeJsonForScript('</script>')).toBe('"\\u003c/script\\u003e"')
  })
})

describe('generateDocsHTML', () => {
  it('should render Swagger UI pointed at the document', () => {
    const html = generateDocsHTML({ ui: 'swagger', title: 'Items', specUrl: '/docs/openapi.json' })

    expect(html).toContain('<div id="swagger-ui"></div>')
    expect(html).toContain('url: "/docs/openapi.json",')
  })

  it('should render ReDoc pointed at the document', () => {
    const html = generateDocsHTML({ ui: 'redoc', title: 'Items', specUrl: '/docs/openapi.json?v=1&x=2' })

    expect(html).toContain('<redoc spec-url="/docs/openapi.json?v=1&amp;x=2"></redoc>')
    expect(html).toContain('redoc.standalone.js')
  })
})
