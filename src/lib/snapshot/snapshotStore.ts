/**
 * Published engine state. A snapshot is frozen on the way in and replaced by a
 * single reference assignment, so a reader holding current() never sees a mix
 * of two tables.
 */

import type { CorrectionTable, EngineSnapshot, ResultRecord } from "../../types.js";

export function freezeTable(table: CorrectionTable): CorrectionTable {
  return Object.freeze({
    ...table,
    baselineMedians: Object.freeze({ ...table.baselineMedians }),
    entries: Object.freeze(table.entries.map((e) => Object.freeze({ ...e }))),
    stats: Object.freeze(
      table.stats.map((s) => Object.freeze({ ...s, percentileLadder: Object.freeze({ ...s.percentileLadder }) }))
    ),
    skipped: Object.freeze(table.skipped.map((s) => Object.freeze({ ...s }))),
  });
}

export function freezeRecords(records: readonly ResultRecord[]): readonly ResultRecord[] {
  if (Object.isFrozen(records)) return records;
  return Object.freeze(records.map((r) => (Object.isFrozen(r) ? r : Object.freeze({ ...r }))));
}

const EMPTY_SNAPSHOT: EngineSnapshot = Object.freeze({ records: Object.freeze([]), table: null });

export class SnapshotStore {
  private snapshot: EngineSnapshot = EMPTY_SNAPSHOT;

  current(): EngineSnapshot {
    return this.snapshot;
  }

  publish(records: readonly ResultRecord[], table: CorrectionTable | null): EngineSnapshot {
    const next: EngineSnapshot = Object.freeze({
      records: freezeRecords(records),
      table: table && !Object.isFrozen(table) ? freezeTable(table) : table,
    });
    this.snapshot = next;
    return next;
  }
}
