import type { Request, Response } from "express";
import type { VenueService } from "../../src/lib/venueService.js";
import { getPersistenceDriver } from "../../src/lib/persistence/driver.js";

export function healthGet(service: VenueService) {
  return (_req: Request, res: Response): void => {
    const { records, table } = service.snapshot();
    res.json({
      success: true,
      status: table ? "ok" : "no_corrections",
      driver: getPersistenceDriver(),
      recordCount: records.length,
      tableVersion: table?.version ?? null,
      baselineVenue: table?.baselineVenue ?? null,
    });
  };
}
