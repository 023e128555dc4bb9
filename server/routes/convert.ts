import type { Request, Response } from "express";
import type { VenueService } from "../../src/lib/venueService.js";
import { ConvertRequestSchema, firstIssue } from "../../src/lib/schemas.js";
import { sendError, sendInternalError, sendServiceError } from "./respond.js";

export function convertPost(service: VenueService) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const parsed = ConvertRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        sendError(res, { code: "VALIDATION_ERROR", message: firstIssue(parsed.error) });
        return;
      }
      const { finishTime, gender, fromVenue, toVenue } = parsed.data;
      const result = service.convert(finishTime, gender, fromVenue, toVenue);
      if (!result.success) {
        sendServiceError(res, result.error);
        return;
      }
      res.json({ success: true, gender, ...result.value });
    } catch (e) {
      sendInternalError(res, e);
    }
  };
}
