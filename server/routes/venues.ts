import type { Request, Response } from "express";
import type { VenueService } from "../../src/lib/venueService.js";
import { StatsQuerySchema, firstIssue } from "../../src/lib/schemas.js";
import { formatCorrection } from "../../src/lib/engine/correctionCalculator.js";
import { sendError, sendInternalError, sendServiceError } from "./respond.js";

function formatPct(pct: number | null): string | null {
  return pct === null ? null : formatCorrection(pct);
}

export function venuesGet(service: VenueService) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const result = service.listVenues();
      if (!result.success) {
        sendServiceError(res, result.error);
        return;
      }
      const { baselineVenue, version, venues } = result.value;
      res.json({
        success: true,
        baselineVenue,
        version,
        venues: venues.map((v) => ({
          ...v,
          menCorrection: formatPct(v.menCorrectionPct),
          womenCorrection: formatPct(v.womenCorrectionPct),
        })),
      });
    } catch (e) {
      sendInternalError(res, e);
    }
  };
}

export function venueStatsGet(service: VenueService) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const parsed = StatsQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        sendError(res, { code: "VALIDATION_ERROR", message: firstIssue(parsed.error) });
        return;
      }
      const result = service.venueStats(parsed.data.gender);
      if (!result.success) {
        sendServiceError(res, result.error);
        return;
      }
      res.json({ success: true, stats: result.value });
    } catch (e) {
      sendInternalError(res, e);
    }
  };
}
