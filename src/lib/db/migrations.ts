/**
 * Applies drizzle/*.sql in name order, each once, each in its own transaction.
 * Applied names are recorded in _migrations.
 */

import { readFile, readdir } from "fs/promises";
import { join } from "path";

/** The two calls migrations need; satisfied by a pg client wrapper and by PGlite. */
export interface MigrationRunner {
  /** Runs one or more statements without parameters. */
  exec(sql: string): Promise<unknown>;
  query(sql: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
}

export const MIGRATIONS_DIR = join(process.cwd(), "drizzle");

export async function listMigrations(dir: string = MIGRATIONS_DIR): Promise<string[]> {
  const files = await readdir(dir);
  return files.filter((f) => f.endsWith(".sql")).sort();
}

/** Returns the names applied by this call. */
export async function applyMigrations(runner: MigrationRunner, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  await runner.exec(`
    CREATE TABLE IF NOT EXISTS "_migrations" (
      "name" text PRIMARY KEY,
      "applied_at" timestamp with time zone NOT NULL DEFAULT now()
    )
  `);
  const applied: string[] = [];
  for (const name of await listMigrations(dir)) {
    const { rows } = await runner.query("SELECT 1 FROM _migrations WHERE name = $1", [name]);
    if (rows.length > 0) {
      console.log(`[migrate] ${name} already applied, skipping.`);
      continue;
    }
    const sql = await readFile(join(dir, name), "utf-8");
    await runner.exec("BEGIN");
    try {
      await runner.exec(sql);
      await runner.query("INSERT INTO _migrations (name) VALUES ($1)", [name]);
      await runner.exec("COMMIT");
    } catch (e) {
      await runner.exec("ROLLBACK");
      throw e;
    }
    applied.push(name);
    console.log(`[migrate] ${name} applied.`);
  }
  return applied;
}
