import { describe, it, expect } from 'vitest'
import { readFileSync } from 'node:fs'
import { HttpApp, generateOpenAPI } from '../src/index.js'

describe('package', () => {
  it('has metadata', () => {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'))

    expect(pkg).toMatchObject({ name: 'routedoc', private: true })
  })

  it('documents an empty app through the root entry point', () => {
    expect(generateOpenAPI(new HttpApp())).toEqual({
      openapi: '3.0.2',
      info: { title: 'Service Documents', version: 'latest' },
      tags: [],
      paths: {},
      components: { schemas: {} },
      definitions: {},
    })
  })
})
