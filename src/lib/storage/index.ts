/**
 * Storage selection by PERSISTENCE_DRIVER.
 */

import { getPersistenceDriver } from "../persistence/driver.js";
import { DbStorageAdapter } from "./dbStorage.js";
import { FileStorageAdapter } from "./fileStorage.js";
import type { StorageAdapter } from "./types.js";

export { DbStorageAdapter } from "./dbStorage.js";
export { FileStorageAdapter, getDataDir } from "./fileStorage.js";
export type { StorageAdapter } from "./types.js";

export function createStorage(): StorageAdapter {
  return getPersistenceDriver() === "db" ? new DbStorageAdapter() : new FileStorageAdapter();
}
