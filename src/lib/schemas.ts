/**
 * Zod schemas for persisted tables, loaded records and API input.
 * Persisted tables are validated on load; invalid rows are skipped with warnings.
 */

import { z } from "zod";
import type { Gender } from "../types.js";

const GENDER_ALIASES: Record<string, Gender> = {
  m: "M",
  men: "M",
  male: "M",
  w: "W",
  f: "W",
  women: "W",
  female: "W",
};

export function normalizeGender(value: string): Gender | null {
  return GENDER_ALIASES[value.trim().toLowerCase()] ?? null;
}

export const GenderSchema = z.preprocess(
  (v) => (typeof v === "string" ? normalizeGender(v) ?? v : v),
  z.enum(["M", "W"])
);

export const ResultRecordSchema = z.object({
  venue: z.string().trim().min(1),
  gender: GenderSchema,
  finishSeconds: z.number().finite().positive(),
});

export const ConfidenceSchema = z.enum(["normal", "low"]);

export const CorrectionEntrySchema = z.object({
  venue: z.string().min(1),
  gender: GenderSchema,
  offsetSeconds: z.number().finite(),
  offsetPct: z.number().finite(),
  sampleCount: z.number().int().positive(),
  confidence: ConfidenceSchema,
});

export const VenueStatSchema = z.object({
  venue: z.string().min(1),
  gender: GenderSchema,
  sampleCount: z.number().int().positive(),
  medianSeconds: z.number().finite(),
  meanSeconds: z.number().finite(),
  percentileLadder: z.object({
    p10: z.number(),
    p25: z.number(),
    p50: z.number(),
    p75: z.number(),
    p90: z.number(),
  }),
});

export const SkippedPairSchema = z.object({
  venue: z.string(),
  gender: GenderSchema,
  reason: z.string(),
});

export const CorrectionTableSchema = z
  .object({
    version: z.number().int().nonnegative(),
    generatedAtISO: z.string(),
    baselineVenue: z.string().min(1),
    baselineMedians: z.object({ M: z.number().positive(), W: z.number().positive() }),
    entries: z.array(CorrectionEntrySchema),
    stats: z.array(VenueStatSchema).default([]),
    skipped: z.array(SkippedPairSchema).default([]),
  })
  .refine(
    (t) => t.entries.some((e) => e.venue === t.baselineVenue && e.gender === "M") &&
      t.entries.some((e) => e.venue === t.baselineVenue && e.gender === "W"),
    { message: "baseline venue must have an entry for both genders" }
  );

export const StoredVersionSchema = z.object({ version: z.number().int().nonnegative() });

export const ConvertRequestSchema = z.object({
  finishTime: z.string().min(1, "finishTime is required"),
  gender: GenderSchema,
  fromVenue: z.string().trim().min(1, "fromVenue is required"),
  toVenue: z.string().trim().min(1).default("normalized"),
});

const stringList = z.preprocess(
  (v) => (v === undefined ? undefined : Array.isArray(v) ? v : [v]),
  z.array(z.string().trim().min(1)).optional()
);

export const DistributionQuerySchema = z.object({
  gender: z.preprocess(
    (v) => (v === undefined ? undefined : Array.isArray(v) ? v : [v]),
    z.array(GenderSchema).optional()
  ),
  venue: stringList,
});

export const StatsQuerySchema = z.object({
  gender: GenderSchema.optional(),
});

export function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return error.message;
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}
