/**
 * Express server entry: load the stored dataset and correction table, then listen.
 */

import { createApp } from "./app.js";
import { VenueService } from "../src/lib/venueService.js";
import { createStorage } from "../src/lib/storage/index.js";
import { getPersistenceDriver } from "../src/lib/persistence/driver.js";

const PORT = parseInt(process.env.PORT ?? "3000", 10);

async function start() {
  const service = new VenueService(createStorage());
  try {
    await service.load();
  } catch (e) {
    console.warn(
      `[Server] Failed to load data (driver=${getPersistenceDriver()}):`,
      e instanceof Error ? e.message : e
    );
  }
  const app = createApp(service);
  app.listen(PORT, "0.0.0.0", () => {
    console.log(`Server running at http://0.0.0.0:${PORT}`);
  });
}

start().catch((e) => {
  console.error("Server failed to start:", e);
  process.exit(1);
});
