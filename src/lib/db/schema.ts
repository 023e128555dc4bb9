/**
 * Drizzle schema for results and correction tables.
 */

import { pgTable, text, timestamp, jsonb, serial, doublePrecision, integer, index, primaryKey } from "drizzle-orm/pg-core";

/** Cleaned finishes delivered by the acquisition layer. */
export const raceResults = pgTable(
  "race_results",
  {
    id: serial("id").primaryKey(),
    venue: text("venue").notNull(),
    gender: text("gender").notNull(),
    finishSeconds: doublePrecision("finish_seconds").notNull(),
  },
  (table) => [index("idx_race_results_venue_gender").on(table.venue, table.gender)]
);

/** One row per recomputation run. Full table payload in jsonb; the latest row is live. */
export const correctionTables = pgTable("correction_tables", {
  version: integer("version").primaryKey(),
  baselineVenue: text("baseline_venue").notNull(),
  generatedAt: timestamp("generated_at", { withTimezone: true }).notNull(),
  payload: jsonb("payload").notNull(),
});

/** Entries of each run, for querying by venue. */
export const venueCorrections = pgTable(
  "venue_corrections",
  {
    version: integer("version")
      .notNull()
      .references(() => correctionTables.version, { onDelete: "cascade" }),
    venue: text("venue").notNull(),
    gender: text("gender").notNull(),
    offsetSeconds: doublePrecision("offset_seconds").notNull(),
    offsetPct: doublePrecision("offset_pct").notNull(),
    sampleCount: integer("sample_count").notNull(),
    confidence: text("confidence").notNull(),
  },
  (table) => [primaryKey({ columns: [table.version, table.venue, table.gender] })]
);
