/**
 * API route registration for Express.
 * Mounts all routes under /api via a dedicated router.
 */

import express, { type Express } from "express";
import type { VenueService } from "../../src/lib/venueService.js";
import * as convert from "./convert.js";
import * as venues from "./venues.js";
import * as distribution from "./distribution.js";
import * as corrections from "./corrections.js";
import * as health from "./health.js";
import { clientErrorStatus, sendError } from "./respond.js";

export function registerApiRoutes(app: Express, service: VenueService): void {
  const api = express.Router();

  api.get("/health", health.healthGet(service));

  // Conversion
  api.post("/convert", convert.convertPost(service));

  // Venues and analysis views
  api.get("/venues", venues.venuesGet(service));
  api.get("/venues/stats", venues.venueStatsGet(service));
  api.get("/distribution", distribution.distributionGet(service));

  // Correction table
  api.get("/corrections", corrections.correctionsGet(service));
  api.post("/corrections/recompute", corrections.recomputePost(service));

  api.use((_req, res) => {
    res.status(404).json({ success: false, error: { code: "NOT_FOUND", message: "Not found" } });
  });

  app.use("/api", api);

  // Body errors from express.json() carry their own 4xx status
  app.use((err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) return next(err);
    if (err instanceof SyntaxError) {
      sendError(res, { code: "VALIDATION_ERROR", message: "Request body must be valid JSON" });
      return;
    }
    const status = clientErrorStatus(err);
    if (status === 413) {
      sendError(res, { code: "PAYLOAD_TOO_LARGE", message: "Request body is too large" });
      return;
    }
    if (status !== null) {
      sendError(res, { code: "VALIDATION_ERROR", message: err instanceof Error ? err.message : "Bad request" }, status);
      return;
    }
    sendError(res, { code: "INTERNAL_ERROR", message: err instanceof Error ? err.message : "Internal server error" });
  });
}
