/**
 * JSONL logging. Appends one JSON line per recomputation run.
 */

import { mkdir, appendFile } from "fs/promises";
import { dirname } from "path";
import type { EngineErrorCode } from "./types.js";

const DEFAULT_LOG_PATH = "./runs/recompute.jsonl";

export interface RecomputeLogEvent {
  ts: string;
  status: "published" | "failed";
  version?: number;
  baselineVenue?: string;
  recordCount: number;
  entryCount?: number;
  skippedCount?: number;
  errorCode?: EngineErrorCode | "PERSIST_FAILED";
  message?: string;
  durationMs: number;
}

export function getRunLogPath(): string {
  return process.env.RUN_LOG_PATH || DEFAULT_LOG_PATH;
}

/**
 * Ensures directory exists (mkdir -p), then appends one JSON line.
 */
export async function appendJsonl(path: string, event: unknown): Promise<void> {
  const dir = dirname(path);
  await mkdir(dir, { recursive: true });
  const line = JSON.stringify(event) + "\n";
  await appendFile(path, line);
}

/** Run log writes never fail the run they describe. */
export async function logRecompute(event: RecomputeLogEvent, path: string = getRunLogPath()): Promise<void> {
  try {
    await appendJsonl(path, event);
  } catch (err) {
    console.warn("[RunLog] could not append:", err instanceof Error ? err.message : err);
  }
}
