/**
 * DB-backed storage adapter. Used when PERSISTENCE_DRIVER=db.
 * Saving a correction table is one transaction: readers see the previous
 * version until it commits.
 */

import { desc, max } from "drizzle-orm";
import type { CorrectionTable, ResultRecord } from "../../types.js";
import type { StorageAdapter } from "./types.js";
import { CorrectionTableSchema, ResultRecordSchema, firstIssue } from "../schemas.js";
import { getDb, type Db } from "../db/index.js";
import { correctionTables, raceResults, venueCorrections } from "../db/schema.js";

const INSERT_CHUNK = 1000;

export class DbStorageAdapter implements StorageAdapter {
  private readonly db: () => Db;

  constructor(db: () => Db = getDb) {
    this.db = db;
  }

  async loadResults(): Promise<ResultRecord[]> {
    const rows = await this.db().select().from(raceResults);
    const records: ResultRecord[] = [];
    let invalid = 0;
    for (const row of rows) {
      const result = ResultRecordSchema.safeParse({
        venue: row.venue,
        gender: row.gender,
        finishSeconds: row.finishSeconds,
      });
      if (result.success) {
        records.push(result.data);
      } else {
        invalid++;
      }
    }
    if (invalid > 0) {
      console.warn(`[Storage] race_results: skipped ${invalid} invalid row(s)`);
    }
    return records;
  }

  async saveResults(records: readonly ResultRecord[]): Promise<void> {
    await this.db().transaction(async (tx) => {
      await tx.delete(raceResults);
      for (let i = 0; i < records.length; i += INSERT_CHUNK) {
        const chunk = records.slice(i, i + INSERT_CHUNK).map((r) => ({
          venue: r.venue,
          gender: r.gender,
          finishSeconds: r.finishSeconds,
        }));
        await tx.insert(raceResults).values(chunk);
      }
    });
  }

  async loadCorrectionTable(): Promise<CorrectionTable | null> {
    const rows = await this.db()
      .select()
      .from(correctionTables)
      .orderBy(desc(correctionTables.version))
      .limit(1);
    if (rows.length === 0) return null;
    const result = CorrectionTableSchema.safeParse(rows[0].payload);
    if (!result.success) {
      console.warn(`[Storage] correction_tables v${rows[0].version} rejected: ${firstIssue(result.error)}`);
      return null;
    }
    return result.data;
  }

  async latestVersion(): Promise<number> {
    const rows = await this.db().select({ version: max(correctionTables.version) }).from(correctionTables);
    return rows[0]?.version ?? 0;
  }

  async saveCorrectionTable(table: CorrectionTable): Promise<void> {
    await this.db().transaction(async (tx) => {
      await tx.insert(correctionTables).values({
        version: table.version,
        baselineVenue: table.baselineVenue,
        generatedAt: new Date(table.generatedAtISO),
        payload: table,
      });
      if (table.entries.length > 0) {
        await tx.insert(venueCorrections).values(
          table.entries.map((e) => ({
            version: table.version,
            venue: e.venue,
            gender: e.gender,
            offsetSeconds: e.offsetSeconds,
            offsetPct: e.offsetPct,
            sampleCount: e.sampleCount,
            confidence: e.confidence,
          }))
        );
      }
    });
  }
}
