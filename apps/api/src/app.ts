import { Hono } from 'hono'
import { cors } from 'hono/cors'
import type { DashboardQueries } from '@duka/db'
import { createLogger } from '@duka/synth'
import { requestId } from './middleware/request-id.js'
import { fail, ok } from './routes/_api.js'
import { createCoreApiRoutes } from './routes/core-api.js'

export type AppDeps = {
  queries: DashboardQueries
}

const log = createLogger('api')

export function createApp({ queries }: AppDeps) {
  const app = new Hono()

  app.use('/*', cors())
  app.use('/*', requestId)

  app.get('/health', (c) =>
    ok(c, {
      service: 'duka-api',
      status: 'healthy',
      version: '0.1.0',
    }),
  )

  app.route('/api/v1', createCoreApiRoutes(queries))

  app.onError((err, c) => {
    log(`ERROR: ${err.message}`)
    return fail(c, 'INTERNAL_ERROR', err.message, 500)
  })

  app.notFound((c) => fail(c, 'NOT_FOUND', `No route for ${c.req.method} ${c.req.path}`, 404))

  return app
}
