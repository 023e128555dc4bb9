/**
 * Storage adapter interface for the cleaned dataset and the derived correction table.
 */

import type { CorrectionTable, ResultRecord } from "../../types.js";

export interface StorageAdapter {
  loadResults(): Promise<ResultRecord[]>;
  /** Replaces the whole dataset. */
  saveResults(records: readonly ResultRecord[]): Promise<void>;
  /** Latest committed table, or null when none has been saved. */
  loadCorrectionTable(): Promise<CorrectionTable | null>;
  /** Highest table version ever saved, readable or not; 0 when none. */
  latestVersion(): Promise<number>;
  /** Replaces the table atomically; throws when the write fails so the caller can keep the old one. */
  saveCorrectionTable(table: CorrectionTable): Promise<void>;
}
