import type { Request, Response } from "express";
import type { VenueService } from "../../src/lib/venueService.js";
import { DistributionQuerySchema, firstIssue } from "../../src/lib/schemas.js";
import { sendError, sendInternalError } from "./respond.js";

/** GET /api/distribution?gender=M&venue=A&venue=B */
export function distributionGet(service: VenueService) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const parsed = DistributionQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        sendError(res, { code: "VALIDATION_ERROR", message: firstIssue(parsed.error) });
        return;
      }
      const distribution = service.distribution({ genders: parsed.data.gender, venues: parsed.data.venue });
      res.json({ success: true, ...distribution });
    } catch (e) {
      sendInternalError(res, e);
    }
  };
}
