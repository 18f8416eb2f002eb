/**
 * Dashboard API router, mounted under `/api/v1`.
 */

import { Hono } from 'hono'
import { tables, type DashboardQueries } from '@duka/db'
import { createInsightRoutes } from './insights.js'
import { createSchemaRoutes } from './schema.js'
import { createTableRoutes } from './tables.js'

export function createCoreApiRoutes(queries: DashboardQueries) {
  const coreApiRoutes = new Hono()

  coreApiRoutes.route('/', createTableRoutes(queries))
  coreApiRoutes.route('/insights', createInsightRoutes(queries))
  coreApiRoutes.route('/schema', createSchemaRoutes(tables))

  return coreApiRoutes
}
