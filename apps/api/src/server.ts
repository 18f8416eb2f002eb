import 'dotenv/config'
import { serve } from '@hono/node-server'
import { checkDatabaseConnection, createDashboardQueries, createDatabase } from '@duka/db'
import { createApp } from './app.js'

const { db, pool } = createDatabase(process.env.DATABASE_URL)
const app = createApp({ queries: createDashboardQueries(db) })

const PORT = Number(process.env.PORT) || 6129

checkDatabaseConnection(pool).catch((error) => {
  console.error('Database is not reachable:', error)
})

const server = serve({
  fetch: app.fetch,
  port: PORT
}, (info) => {
  console.log('')
  console.log(' duka API http://localhost:' + info.port)
  console.log('')
})

process.on('SIGTERM', () => {
  server.close(() => {
    pool.end().catch((error) => console.error('Failed to close database pool:', error))
  })
})
