/**
 * Raw table views.
 *
 * Each endpoint returns the first `limit` rows by primary key. Products can
 * additionally be filtered by a price band.
 */

import { Hono } from 'hono'
import type { DashboardQueries } from '@duka/db'
import { limitQuerySchema, productListQuerySchema } from '@duka/schema'
import { invalidQuery, ok, queryFailed } from './_api.js'

export const DEFAULT_TABLE_LIMIT = 200

type LimitedQuery = 'listCustomers' | 'listOrders' | 'listOrderItems'

export function createTableRoutes(queries: DashboardQueries) {
  const routes = new Hono()

  const limited = (path: string, query: LimitedQuery) => {
    routes.get(path, async (c) => {
      const parsed = limitQuerySchema.safeParse(c.req.query())
      if (!parsed.success) return invalidQuery(c, parsed.error)

      const limit = parsed.data.limit ?? DEFAULT_TABLE_LIMIT
      try {
        const rows = await queries[query](limit)
        return ok(c, rows, 200, { count: rows.length })
      } catch (error) {
        return queryFailed(c, error)
      }
    })
  }

  limited('/customers', 'listCustomers')
  limited('/orders', 'listOrders')
  limited('/order-items', 'listOrderItems')

  routes.get('/products', async (c) => {
    const parsed = productListQuerySchema.safeParse(c.req.query())
    if (!parsed.success) return invalidQuery(c, parsed.error)

    const { minPrice, maxPrice, limit = DEFAULT_TABLE_LIMIT } = parsed.data
    try {
      const rows = await queries.listProducts({ minPrice, maxPrice, limit })
      return ok(c, rows, 200, { count: rows.length })
    } catch (error) {
      return queryFailed(c, error)
    }
  })

  return routes
}
