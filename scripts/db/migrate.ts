/**
 * Run migrations in order. Requires DATABASE_URL.
 * Usage: DATABASE_URL=postgresql://... tsx scripts/db/migrate.ts
 */

import pg from "pg";
import { applyMigrations } from "../../src/lib/db/migrations.js";

const url = process.env.DATABASE_URL;
if (!url) {
  console.error("DATABASE_URL is required");
  process.exit(1);
}

async function main() {
  const client = new pg.Client({ connectionString: url });
  await client.connect();
  try {
    const applied = await applyMigrations({
      exec: (sql) => client.query(sql),
      query: (sql, params) => client.query(sql, params),
    });
    console.log(`[migrate] Done, ${applied.length} new migration(s).`);
  } finally {
    await client.end();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
