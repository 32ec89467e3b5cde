/**
 * Store providers: one lease per unit of work, released on every exit path.
 */

import { drizzle } from "drizzle-orm/node-postgres";
import type pg from "pg";
import * as schema from "../db/schema.js";
import { closePool, getPool } from "../db/index.js";
import { getDataDir } from "../../config.js";
import { DbResourceStore } from "./dbStore.js";
import { FileResourceStore } from "./fileStore.js";
import { getPersistenceDriver, type PersistenceDriver } from "./driver.js";
import type { ResourceStore, StoreProvider } from "./types.js";

export function createFileStoreProvider(dataDir: string = getDataDir()): StoreProvider {
  return {
    driver: "file",
    async acquire() {
      return { store: new FileResourceStore(dataDir), release: () => {} };
    },
    async close() {},
  };
}

/** Checks a client out of the pool per lease; the client goes back on release. */
export function createDbStoreProvider(pool: pg.Pool, onClose: () => Promise<void> = () => pool.end()): StoreProvider {
  return {
    driver: "db",
    async acquire() {
      const client = await pool.connect();
      const db = drizzle(client, { schema });
      return { store: new DbResourceStore(db), release: () => client.release() };
    },
    close: onClose,
  };
}

export function createStoreProvider(driver: PersistenceDriver = getPersistenceDriver()): StoreProvider {
  if (driver === "db") return createDbStoreProvider(getPool(), closePool);
  return createFileStoreProvider();
}

export async function withStore<T>(provider: StoreProvider, fn: (store: ResourceStore) => Promise<T>): Promise<T> {
  const lease = await provider.acquire();
  try {
    return await fn(lease.store);
  } finally {
    lease.release();
  }
}
