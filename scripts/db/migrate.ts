/**
 * Apply SQL migrations from drizzle/ in name order. Requires DATABASE_URL.
 * Usage: DATABASE_URL=postgresql://... tsx scripts/db/migrate.ts
 */

import { readFile, readdir } from "fs/promises";
import { join } from "path";
import pg from "pg";

const url = process.env.DATABASE_URL;
if (!url) {
  console.error("DATABASE_URL is required");
  process.exit(1);
}

const MIGRATIONS_DIR = process.env.MIGRATIONS_DIR ?? join(process.cwd(), "drizzle");

async function main() {
  const sqlFiles = (await readdir(MIGRATIONS_DIR)).filter((f) => f.endsWith(".sql")).sort();
  const client = new pg.Client({ connectionString: url });
  await client.connect();
  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS "_migrations" (
        "name" text PRIMARY KEY,
        "applied_at" timestamp with time zone NOT NULL DEFAULT now()
      )
    `);
    for (const f of sqlFiles) {
      const { rows } = await client.query("SELECT 1 FROM _migrations WHERE name = $1", [f]);
      if (rows.length > 0) {
        console.log(`[Migrate] ${f} already applied`);
        continue;
      }
      const sql = await readFile(join(MIGRATIONS_DIR, f), "utf-8");
      await client.query("BEGIN");
      try {
        await client.query(sql);
        await client.query("INSERT INTO _migrations (name) VALUES ($1)", [f]);
        await client.query("COMMIT");
      } catch (err) {
        await client.query("ROLLBACK");
        throw err;
      }
      console.log(`[Migrate] ${f} applied`);
    }
  } finally {
    await client.end();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
