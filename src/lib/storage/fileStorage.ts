/**
 * File-backed storage: results.csv and corrections.json under the data dir.
 * Writes land in a temp file that is renamed over the target, so readers see
 * either the old file or the new one.
 */

import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { join } from "path";
import type { CorrectionTable, ResultRecord } from "../../types.js";
import type { StorageAdapter } from "./types.js";
import { CorrectionTableSchema, StoredVersionSchema, firstIssue } from "../schemas.js";
import { loadResultsCsv, resultsToCsv } from "../results/resultsLoader.js";

export function getDataDir(): string {
  const envDir = process.env.COURSE_CORRECT_DATA_DIR;
  if (envDir) return envDir;
  return join(process.cwd(), ".data", "course-correct");
}

async function readIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
    throw err;
  }
}

async function writeAtomic(path: string, content: string): Promise<void> {
  const tmp = `${path}.${process.pid}.${Date.now()}.tmp`;
  await writeFile(tmp, content, "utf-8");
  await rename(tmp, path);
}

export class FileStorageAdapter implements StorageAdapter {
  private readonly dataDir: string;
  private readonly resultsPath: string;
  private readonly correctionsPath: string;

  constructor(dataDir?: string) {
    this.dataDir = dataDir ?? getDataDir();
    this.resultsPath = join(this.dataDir, "results.csv");
    this.correctionsPath = join(this.dataDir, "corrections.json");
  }

  async loadResults(): Promise<ResultRecord[]> {
    const raw = await readIfExists(this.resultsPath);
    if (raw === null) return [];
    const { records, rejected } = loadResultsCsv(raw);
    if (rejected.length > 0) {
      const first = rejected[0];
      console.warn(
        `[Storage] ${this.resultsPath}: skipped ${rejected.length} invalid row(s); first at line ${first.line}: ${first.reason}`
      );
    }
    return records;
  }

  async saveResults(records: readonly ResultRecord[]): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
    await writeAtomic(this.resultsPath, resultsToCsv(records));
  }

  async loadCorrectionTable(): Promise<CorrectionTable | null> {
    const raw = await readIfExists(this.correctionsPath);
    if (raw === null) return null;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      console.warn(`[Storage] ${this.correctionsPath} is not valid JSON:`, err instanceof Error ? err.message : err);
      return null;
    }
    const result = CorrectionTableSchema.safeParse(parsed);
    if (!result.success) {
      console.warn(`[Storage] ${this.correctionsPath} rejected: ${firstIssue(result.error)}`);
      return null;
    }
    return result.data;
  }

  /** Reads only the version field, so a table rejected on load still counts. */
  async latestVersion(): Promise<number> {
    const raw = await readIfExists(this.correctionsPath);
    if (raw === null) return 0;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return 0;
    }
    const result = StoredVersionSchema.safeParse(parsed);
    return result.success ? result.data.version : 0;
  }

  async saveCorrectionTable(table: CorrectionTable): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
    await writeAtomic(this.correctionsPath, JSON.stringify(table, null, 2));
  }
}
