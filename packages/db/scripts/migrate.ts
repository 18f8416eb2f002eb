import "dotenv/config";
import { createDatabase, ensureSchema } from "../src";

/**
 * Applies `sql/schema.sql`. Every statement is `IF NOT EXISTS`, so reruns
 * are no-ops.
 */
async function run() {
  const { db, pool } = createDatabase(process.env.DATABASE_URL);
  try {
    await ensureSchema(db);
    console.log("Database schema applied successfully.");
  } finally {
    await pool.end();
  }
}

run().catch((error) => {
  console.error("Migration failed:", error);
  process.exit(1);
});
