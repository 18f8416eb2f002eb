import 'dotenv/config'
import {
  createLogger,
  generateDataset,
  loadGeneratorSettings,
  MemorySink,
  persistDataset,
  writeProductsCsv,
} from '@duka/synth'
import { createDatabase, ensureSchema, PostgresSink, resetTables } from '../src/index'

/**
 * Generates the synthetic retail dataset, writes the products CSV and loads
 * every table in foreign-key order.
 *
 *   --reset     truncate the four tables before loading
 *   --dry-run   generate and persist into memory only, no database needed
 */
const log = createLogger('seed')

async function seed(argv: readonly string[]) {
  const reset = argv.includes('--reset')
  const dryRun = argv.includes('--dry-run')

  const { config, productsCsvFile } = loadGeneratorSettings()
  log(`Seed ${config.seed}, batch size ${config.batchSize}`)

  const dataset = generateDataset(config, { log })

  writeProductsCsv(dataset.products, productsCsvFile)
  log(`Wrote ${dataset.products.length} products to ${productsCsvFile}`)

  if (dryRun) {
    await persistDataset(dataset, new MemorySink(), { batchSize: config.batchSize, log })
    log('Dry run finished, nothing written to the database.')
    return
  }

  const { db, pool } = createDatabase(process.env.DATABASE_URL)
  try {
    await ensureSchema(db)
    if (reset) {
      log('Truncating tables...')
      await resetTables(db)
    }
    const summary = await persistDataset(dataset, new PostgresSink(db), { batchSize: config.batchSize, log })
    const skipped = Object.values(summary).reduce((total, result) => total + result.skipped, 0)
    log(skipped > 0 ? `Done, ${skipped} rows already present were skipped.` : 'All data generated and inserted successfully.')
  } finally {
    await pool.end()
  }
}

seed(process.argv.slice(2))
  .then(() => process.exit(0))
  .catch((error) => {
    console.error('Failed to seed retail data:', error)
    process.exit(1)
  })
