#!/usr/bin/env node
/**
 * Recompute venue corrections from the stored dataset and persist the new table.
 *
 * Usage:
 *   tsx scripts/recompute.ts [--input results.csv] [--reference "Venue Name"]
 *
 * --input replaces the stored dataset with a cleaned CSV first.
 * --reference pins the baseline venue (same as BASELINE_VENUE).
 */

import { readFile } from "fs/promises";
import { getEngineConfig } from "../src/lib/config.js";
import { loadResultsCsv } from "../src/lib/results/resultsLoader.js";
import { createStorage } from "../src/lib/storage/index.js";
import { VenueService } from "../src/lib/venueService.js";
import { formatCorrectionSummary } from "../src/lib/report.js";
import { closeDb } from "../src/lib/db/index.js";

interface RecomputeArgs {
  input?: string;
  reference?: string;
}

function parseArgs(args: readonly string[]): RecomputeArgs {
  const out: RecomputeArgs = {};
  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--input" && args[i + 1]) out.input = args[++i];
    else if (args[i] === "--reference" && args[i + 1]) out.reference = args[++i].trim() || undefined;
  }
  return out;
}

async function main(): Promise<number> {
  const values = parseArgs(process.argv.slice(2));
  const reference = values.reference;
  const service = new VenueService(createStorage(), {
    config: () => (reference ? { ...getEngineConfig(), baselineOverride: reference } : getEngineConfig()),
  });

  if (values.input) {
    const content = await readFile(values.input, "utf-8");
    const { records, rejected } = loadResultsCsv(content);
    console.log(`Loaded ${records.length} results from ${values.input} (${rejected.length} rejected)`);
    for (const r of rejected.slice(0, 10)) {
      console.log(`  line ${r.line}: ${r.reason}`);
    }
    await service.importResults(records);
  }

  await service.load({ recomputeIfMissing: false });
  const result = await service.recompute();
  if (!result.success) {
    console.error(`Recompute failed: ${result.error.code} ${result.error.message}`);
    return 1;
  }
  for (const line of formatCorrectionSummary(result.value)) {
    console.log(line);
  }
  return 0;
}

main()
  .then(async (code) => {
    await closeDb();
    process.exit(code);
  })
  .catch(async (err) => {
    console.error(err);
    await closeDb();
    process.exit(1);
  });
