import type { Request, Response } from "express";
import type { VenueService } from "../../src/lib/venueService.js";
import { sendInternalError, sendServiceError } from "./respond.js";

export function correctionsGet(service: VenueService) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const result = service.correctionTable();
      if (!result.success) {
        sendServiceError(res, result.error);
        return;
      }
      res.json({ success: true, table: result.value });
    } catch (e) {
      sendInternalError(res, e);
    }
  };
}

/** Explicit trigger after new data lands; never run per conversion request. */
export function recomputePost(service: VenueService) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const result = await service.recompute();
      if (!result.success) {
        sendServiceError(res, result.error);
        return;
      }
      const table = result.value;
      res.json({
        success: true,
        version: table.version,
        baselineVenue: table.baselineVenue,
        entryCount: table.entries.length,
        skipped: table.skipped,
      });
    } catch (e) {
      sendInternalError(res, e);
    }
  };
}
