#!/usr/bin/env node
/**
 * Apply the stored correction table to a results file and write corrected times.
 *
 * Usage:
 *   tsx scripts/applyCorrections.ts --input results.csv --output corrected.csv
 */

import { mkdir, readFile, writeFile } from "fs/promises";
import path from "path";
import { applyCorrections } from "../src/lib/engine/applyCorrections.js";
import { correctedResultsToCsv, loadResultsCsv } from "../src/lib/results/resultsLoader.js";
import { createStorage } from "../src/lib/storage/index.js";
import { formatApplySummary } from "../src/lib/report.js";
import { closeDb } from "../src/lib/db/index.js";

interface ApplyArgs {
  input?: string;
  output?: string;
}

function parseArgs(args: readonly string[]): ApplyArgs {
  const out: ApplyArgs = {};
  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--input" && args[i + 1]) out.input = args[++i];
    else if (args[i] === "--output" && args[i + 1]) out.output = args[++i];
  }
  return out;
}

async function main(): Promise<number> {
  const { input, output } = parseArgs(process.argv.slice(2));
  if (!input || !output) {
    console.error("Usage: tsx scripts/applyCorrections.ts --input results.csv --output corrected.csv");
    return 1;
  }

  const table = await createStorage().loadCorrectionTable();
  if (!table) {
    console.error("No correction table stored; run the recompute script first");
    return 1;
  }

  const { records, rejected } = loadResultsCsv(await readFile(input, "utf-8"));
  console.log(`Loaded ${records.length} results from ${input} (${rejected.length} rejected)`);
  for (const r of rejected.slice(0, 10)) {
    console.log(`  line ${r.line}: ${r.reason}`);
  }

  const { rows, summary } = applyCorrections(table, records);
  await mkdir(path.dirname(path.resolve(output)), { recursive: true });
  await writeFile(output, correctedResultsToCsv(rows), "utf-8");

  console.log(`Table v${table.version}, baseline ${table.baselineVenue}`);
  for (const line of formatApplySummary(summary)) {
    console.log(line);
  }
  console.log(`Wrote ${output}`);
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
