/**
 * Persistence driver: file | db.
 * PERSISTENCE_DRIVER=db keeps results and correction tables in PostgreSQL; default is files under the data dir.
 */

export type PersistenceDriver = "db" | "file";

export function getPersistenceDriver(): PersistenceDriver {
  const v = process.env.PERSISTENCE_DRIVER?.trim().toLowerCase();
  if (v === "db") return "db";
  return "file";
}
