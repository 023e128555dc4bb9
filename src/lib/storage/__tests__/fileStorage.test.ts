/**
 * FileStorageAdapter: missing files load empty, invalid content is skipped with
 * a warning, and writes leave no temp files behind.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdir, readdir, readFile, rm, writeFile } from "fs/promises";
import { join } from "path";
import { tmpdir } from "os";
import { FileStorageAdapter, getDataDir } from "../fileStorage.js";
import { recomputeCorrections } from "../../engine/recompute.js";
import { FIVE_VENUES, NO_TRIM, rec } from "../../__tests__/fixtures.js";

describe("FileStorageAdapter", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `course-correct-filestorage-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    try {
      await rm(testDir, { recursive: true, force: true });
    } catch {
      /* ignore */
    }
  });

  it("loads nothing when the files are missing", async () => {
    const storage = new FileStorageAdapter(join(testDir, "fresh"));
    expect(await storage.loadResults()).toEqual([]);
    expect(await storage.loadCorrectionTable()).toBeNull();
  });

  it("saves and reloads results", async () => {
    const storage = new FileStorageAdapter(join(testDir, "nested", "dir"));
    const records = [...rec("London", "M", 4500), ...rec("Dublin", "W", 5100.25)];
    await storage.saveResults(records);
    expect(await storage.loadResults()).toEqual(records);
  });

  it("saves and reloads a correction table", async () => {
    const result = recomputeCorrections(FIVE_VENUES, NO_TRIM, { version: 3, now: new Date("2026-01-02T03:04:05Z") });
    if (!result.success) throw new Error(result.error.message);
    const storage = new FileStorageAdapter(testDir);
    await storage.saveCorrectionTable(result.value);
    const loaded = await storage.loadCorrectionTable();
    expect(loaded).toEqual(result.value);
  });

  it("leaves no temp files after writing", async () => {
    const storage = new FileStorageAdapter(testDir);
    await storage.saveResults(rec("London", "M", 4500));
    await storage.saveResults(rec("London", "M", 4600));
    const files = await readdir(testDir);
    expect(files).toEqual(["results.csv"]);
    expect(await readFile(join(testDir, "results.csv"), "utf-8")).toBe("venue,gender,finish_seconds\nLondon,M,4600\n");
  });

  it("skips invalid result rows with a warning", async () => {
    await writeFile(join(testDir, "results.csv"), "venue,gender,finish_seconds\nLondon,M,4500\nLondon,M,fast\n", "utf-8");
    const storage = new FileStorageAdapter(testDir);
    expect(await storage.loadResults()).toEqual([{ venue: "London", gender: "M", finishSeconds: 4500 }]);
    expect(console.warn).toHaveBeenCalledWith(
      `[Storage] ${join(testDir, "results.csv")}: skipped 1 invalid row(s); first at line 3: finish_seconds is not numeric: "fast"`
    );
  });

  it("returns null for malformed JSON", async () => {
    await writeFile(join(testDir, "corrections.json"), "{ not json", "utf-8");
    const storage = new FileStorageAdapter(testDir);
    expect(await storage.loadCorrectionTable()).toBeNull();
    expect(console.warn).toHaveBeenCalled();
  });

  it("reports the stored version, including one from a rejected table", async () => {
    const storage = new FileStorageAdapter(testDir);
    expect(await storage.latestVersion()).toBe(0);
    await writeFile(
      join(testDir, "corrections.json"),
      JSON.stringify({ version: 6, baselineVenue: "London", entries: [] }),
      "utf-8"
    );
    expect(await storage.loadCorrectionTable()).toBeNull();
    expect(await storage.latestVersion()).toBe(6);
  });

  it("reports version 0 for unreadable JSON", async () => {
    await writeFile(join(testDir, "corrections.json"), "{ not json", "utf-8");
    expect(await new FileStorageAdapter(testDir).latestVersion()).toBe(0);
  });

  it("returns null for a table whose baseline lacks a gender", async () => {
    const table = {
      version: 1,
      generatedAtISO: "2026-01-01T00:00:00.000Z",
      baselineVenue: "London",
      baselineMedians: { M: 4500, W: 5000 },
      entries: [{ venue: "London", gender: "M", offsetSeconds: 0, offsetPct: 0, sampleCount: 3, confidence: "low" }],
    };
    await writeFile(join(testDir, "corrections.json"), JSON.stringify(table), "utf-8");
    const storage = new FileStorageAdapter(testDir);
    expect(await storage.loadCorrectionTable()).toBeNull();
    expect(console.warn).toHaveBeenCalledWith(
      `[Storage] ${join(testDir, "corrections.json")} rejected: baseline venue must have an entry for both genders`
    );
  });
});

describe("getDataDir", () => {
  const original = process.env.COURSE_CORRECT_DATA_DIR;

  afterEach(() => {
    if (original === undefined) delete process.env.COURSE_CORRECT_DATA_DIR;
    else process.env.COURSE_CORRECT_DATA_DIR = original;
  });

  it("prefers COURSE_CORRECT_DATA_DIR", () => {
    process.env.COURSE_CORRECT_DATA_DIR = "/tmp/cc-data";
    expect(getDataDir()).toBe("/tmp/cc-data");
  });

  it("defaults under the working directory", () => {
    delete process.env.COURSE_CORRECT_DATA_DIR;
    expect(getDataDir()).toBe(join(process.cwd(), ".data", "course-correct"));
  });
});
