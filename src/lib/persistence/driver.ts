/**
 * Persistence driver: db | file.
 * PERSISTENCE_DRIVER=db uses PostgreSQL; default is the JSON document store.
 */

export type PersistenceDriver = "db" | "file";

export function getPersistenceDriver(): PersistenceDriver {
  const v = process.env.PERSISTENCE_DRIVER?.toLowerCase();
  if (v === "db") return "db";
  return "file";
}
