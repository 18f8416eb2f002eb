/**
 * Integrated views across customers, orders, items and products.
 */

import { Hono } from 'hono'
import type { DashboardQueries } from '@duka/db'
import { limitQuerySchema } from '@duka/schema'
import { invalidQuery, ok, queryFailed } from './_api.js'

export const DEFAULT_INSIGHT_LIMIT = 50

type InsightQuery = 'orderDetails' | 'customerSpend' | 'unitsSold'

export function createInsightRoutes(queries: DashboardQueries) {
  const routes = new Hono()

  const insight = (path: string, query: InsightQuery) => {
    routes.get(path, async (c) => {
      const parsed = limitQuerySchema.safeParse(c.req.query())
      if (!parsed.success) return invalidQuery(c, parsed.error)

      try {
        const rows = await queries[query](parsed.data.limit ?? DEFAULT_INSIGHT_LIMIT)
        return ok(c, rows, 200, { count: rows.length })
      } catch (error) {
        return queryFailed(c, error)
      }
    })
  }

  // Line items with the buying customer and product name
  insight('/order-details', 'orderDetails')
  // Top customers by summed order totals
  insight('/customer-spend', 'customerSpend')
  // Best sellers by quantity
  insight('/units-sold', 'unitsSold')

  return routes
}
