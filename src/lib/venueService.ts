/**
 * Venue service: owns the published snapshot and is its only writer.
 * Routes and scripts go through here; the engine modules stay pure.
 */

import type {
  CorrectionTable,
  EngineConfig,
  EngineErrorCode,
  EngineSnapshot,
  Gender,
  ResultRecord,
  VenueStat,
} from "../types.js";
import { getEngineConfig } from "./config.js";
import { recomputeCorrections } from "./engine/recompute.js";
import { convertTime, type ConversionView } from "./engine/conversionService.js";
import { buildDistribution, type Distribution, type DistributionFilter } from "./engine/distribution.js";
import { listVenues, type VenueListing } from "./engine/venueListing.js";
import { SnapshotStore } from "./snapshot/snapshotStore.js";
import type { StorageAdapter } from "./storage/types.js";
import { logRecompute, getRunLogPath } from "../logger.js";

export type ServiceErrorCode = EngineErrorCode | "NO_CORRECTIONS" | "PERSIST_FAILED";

export interface ServiceError {
  code: ServiceErrorCode;
  message: string;
}

export type ServiceResult<T> = { success: true; value: T } | { success: false; error: ServiceError };

export interface VenueServiceOptions {
  config?: () => EngineConfig;
  store?: SnapshotStore;
  runLogPath?: string;
  now?: () => Date;
}

export interface LoadOptions {
  /** Recompute when records exist but no table has been saved. Default true. */
  recomputeIfMissing?: boolean;
}

export interface VenueList {
  baselineVenue: string;
  version: number;
  venues: VenueListing[];
}

const NO_CORRECTIONS: ServiceError = {
  code: "NO_CORRECTIONS",
  message: "No correction table has been published yet",
};

export class VenueService {
  private readonly storage: StorageAdapter;
  private readonly config: () => EngineConfig;
  private readonly store: SnapshotStore;
  private readonly runLogPath: string;
  private readonly now: () => Date;
  private inFlight: Promise<ServiceResult<CorrectionTable>> | null = null;

  constructor(storage: StorageAdapter, options: VenueServiceOptions = {}) {
    this.storage = storage;
    this.config = options.config ?? getEngineConfig;
    this.store = options.store ?? new SnapshotStore();
    this.runLogPath = options.runLogPath ?? getRunLogPath();
    this.now = options.now ?? (() => new Date());
  }

  snapshot(): EngineSnapshot {
    return this.store.current();
  }

  /**
   * Publishes the stored dataset and table. Recomputes when records exist but no
   * table has been saved yet.
   */
  async load(options: LoadOptions = {}): Promise<EngineSnapshot> {
    const [records, table] = await Promise.all([this.storage.loadResults(), this.storage.loadCorrectionTable()]);
    this.store.publish(records, table);
    console.log(
      `[Corrections] loaded ${records.length} records; table ${table ? `v${table.version} (baseline ${table.baselineVenue})` : "missing"}`
    );
    if (table === null && records.length > 0 && options.recomputeIfMissing !== false) {
      const result = await this.recompute();
      if (!result.success) {
        console.warn(`[Corrections] initial recompute failed: ${result.error.code} ${result.error.message}`);
      }
    }
    return this.store.current();
  }

  /** Replaces the stored dataset. The published table is unchanged until the next recompute. */
  async importResults(records: readonly ResultRecord[]): Promise<void> {
    await this.storage.saveResults(records);
  }

  /** Concurrent callers share one run. */
  recompute(): Promise<ServiceResult<CorrectionTable>> {
    if (!this.inFlight) {
      this.inFlight = this.runRecompute().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async runRecompute(): Promise<ServiceResult<CorrectionTable>> {
    const started = this.now();
    const [records, storedVersion] = await Promise.all([this.storage.loadResults(), this.storage.latestVersion()]);
    const previous = this.store.current().table;
    const version = Math.max(previous?.version ?? 0, storedVersion) + 1;
    const result = recomputeCorrections(records, this.config(), { version, now: started });
    const durationMs = () => this.now().getTime() - started.getTime();

    if (!result.success) {
      console.warn(`[Corrections] recompute failed, keeping previous table: ${result.error.message}`);
      await logRecompute(
        {
          ts: started.toISOString(),
          status: "failed",
          recordCount: records.length,
          errorCode: result.error.code,
          message: result.error.message,
          durationMs: durationMs(),
        },
        this.runLogPath
      );
      return { success: false, error: { code: result.error.code, message: result.error.message } };
    }

    const table = result.value;
    try {
      await this.storage.saveCorrectionTable(table);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[Corrections] could not persist table v${version}, keeping previous table: ${message}`);
      await logRecompute(
        {
          ts: started.toISOString(),
          status: "failed",
          version,
          recordCount: records.length,
          errorCode: "PERSIST_FAILED",
          message,
          durationMs: durationMs(),
        },
        this.runLogPath
      );
      return { success: false, error: { code: "PERSIST_FAILED", message } };
    }

    this.store.publish(records, table);
    console.log(
      `[Corrections] published v${version}: baseline ${table.baselineVenue}, ${table.entries.length} entries, ${table.skipped.length} skipped`
    );
    await logRecompute(
      {
        ts: started.toISOString(),
        status: "published",
        version,
        baselineVenue: table.baselineVenue,
        recordCount: records.length,
        entryCount: table.entries.length,
        skippedCount: table.skipped.length,
        durationMs: durationMs(),
      },
      this.runLogPath
    );
    return { success: true, value: table };
  }

  correctionTable(): ServiceResult<CorrectionTable> {
    const table = this.store.current().table;
    return table ? { success: true, value: table } : { success: false, error: NO_CORRECTIONS };
  }

  convert(finishTime: string, gender: Gender, fromVenue: string, toVenue: string): ServiceResult<ConversionView> {
    const table = this.store.current().table;
    if (!table) return { success: false, error: NO_CORRECTIONS };
    return convertTime(table, finishTime, gender, fromVenue, toVenue);
  }

  listVenues(): ServiceResult<VenueList> {
    const table = this.store.current().table;
    if (!table) return { success: false, error: NO_CORRECTIONS };
    return {
      success: true,
      value: { baselineVenue: table.baselineVenue, version: table.version, venues: listVenues(table) },
    };
  }

  venueStats(gender?: Gender): ServiceResult<VenueStat[]> {
    const table = this.store.current().table;
    if (!table) return { success: false, error: NO_CORRECTIONS };
    return { success: true, value: table.stats.filter((s) => gender === undefined || s.gender === gender) };
  }

  distribution(filter: DistributionFilter = {}): Distribution {
    return buildDistribution(this.store.current().records, filter, this.config());
  }
}
