/**
 * In-memory StorageAdapter for tests. No filesystem or network.
 */

import type { CorrectionTable, ResultRecord } from "../../types.js";
import type { StorageAdapter } from "../storage/types.js";

export class InMemoryStorageAdapter implements StorageAdapter {
  private records: ResultRecord[] = [];
  private table: CorrectionTable | null = null;
  /** Highest version saved; tests raise it to model stored tables that fail validation. */
  storedVersion = 0;
  saveTableCalls = 0;
  failTableWrites = false;

  constructor(initialRecords?: readonly ResultRecord[], initialTable?: CorrectionTable) {
    if (initialRecords?.length) this.records = [...initialRecords];
    if (initialTable) {
      this.table = initialTable;
      this.storedVersion = initialTable.version;
    }
  }

  async loadResults(): Promise<ResultRecord[]> {
    return [...this.records];
  }

  async saveResults(records: readonly ResultRecord[]): Promise<void> {
    this.records = [...records];
  }

  async loadCorrectionTable(): Promise<CorrectionTable | null> {
    return this.table;
  }

  async latestVersion(): Promise<number> {
    return this.storedVersion;
  }

  async saveCorrectionTable(table: CorrectionTable): Promise<void> {
    this.saveTableCalls++;
    if (this.failTableWrites) throw new Error("disk full");
    this.table = table;
    this.storedVersion = Math.max(this.storedVersion, table.version);
  }
}
