/**
 * Express app factory: API only. The page templates live with the web front end.
 */

import express, { type Express } from "express";
import cors from "cors";
import { registerApiRoutes } from "./routes/index.js";
import type { VenueService } from "../src/lib/venueService.js";

export function createApp(service: VenueService): Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  registerApiRoutes(app, service);
  return app;
}
