/**
 * Example: documented items API
 *
 * Features demonstrated:
 * - Typed route templates (`<int(min=1):id>`)
 * - Data shapes from zod schemas
 * - Declared error responses and tags
 * - Swagger UI at /docs/new/ and the JSON document at /docs/new/openapi.json
 */

import { z } from 'zod'
import {
  APIError,
  HttpApp,
  createLogger,
  defineShape,
  mountOpenAPI,
  openapiDocs,
  serve,
} from '../src/index.js'

const logger = createLogger('items-api')

// =============================================================================
// Shapes
// =============================================================================

const Tag = z.object({ label: z.string() })

const Item = defineShape(
  'Item',
  z.object({
    id: z.number().int(),
    name: z.string(),
    tags: z.array(Tag),
  }),
  { definitions: { Tag } }
)

const NewItem = defineShape(
  'NewItem',
  z.object({
    name: z.string().min(1),
    tags: z.array(Tag).default([]),
  }),
  { definitions: { Tag } }
)

const ItemQuery = defineShape('ItemQuery', z.object({ search: z.string().optional() }))

// =============================================================================
// In-Memory Store
// =============================================================================

interface StoredItem {
  id: number
  name: string
  tags: Array<{ label: string }>
}

const items = new Map<number, StoredItem>()
let nextId = 1

// =============================================================================
// Routes
// =============================================================================

const app = new HttpApp()

app.get(
  '/items',
  function list_items(c) {
    const search = c.query('search')
    const all = Array.from(items.values())
    return c.json(search ? all.filter((item) => item.name.includes(search)) : all)
  },
  {
    docs: openapiDocs({
      doc: `List items

      Optionally filtered by a substring of the name.`,
      query: ItemQuery,
      tags: ['items'],
    }),
  }
)

app.post(
  '/items',
  async function create_item(c) {
    const input = z
      .object({ name: z.string().min(1), tags: z.array(Tag).default([]) })
      .safeParse(await c.req.json())
    if (!input.success) {
      return c.json({ issues: input.error.issues }, 400)
    }
    const item: StoredItem = { id: nextId++, ...input.data }
    items.set(item.id, item)
    return c.json(item, 201)
  },
  {
    docs: openapiDocs({
      doc: 'Create an item',
      body: NewItem,
      response: Item,
      tags: ['items'],
    }),
  }
)

app.get(
  '/items/<int(min=1):id>',
  function get_item(c) {
    const item = items.get(Number(c.params.id))
    if (!item) {
      return c.json({ error: 'Item not found' }, 404)
    }
    return c.json(item)
  },
  {
    docs: openapiDocs({
      doc: 'Get an item',
      response: Item,
      exceptions: [new APIError(404, 'Item not found')],
      tags: ['items'],
    }),
  }
)

app.delete(
  '/items/<int(min=1):id>',
  function delete_item(c) {
    if (!items.delete(Number(c.params.id))) {
      return c.json({ error: 'Item not found' }, 404)
    }
    return new Response(null, { status: 204 })
  },
  {
    docs: openapiDocs({
      exceptions: [new APIError(204, 'Item deleted'), new APIError(404, 'Item not found')],
      tags: ['items'],
    }),
  }
)

// Undocumented routes are listed too in the default `normal` mode
app.get('/health', function health(c) {
  return c.json({ status: 'ok' })
})

// =============================================================================
// Start
// =============================================================================

mountOpenAPI(app, {
  info: { title: 'Items', version: '1.0.0', description: 'A small documented API' },
  extraProps: { servers: [{ url: 'http://localhost:3000' }] },
})

serve({
  fetch: app.fetch,
  port: 3000,
  onListen: ({ port }) => {
    logger.info(`Docs at http://localhost:${port}/docs/new/`)
  },
})
