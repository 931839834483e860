import "dotenv/config";

import { createService } from "./main";

void (async () => {
  try {
    const service = await createService();
    await service.runDailyScrape();
  } catch (error) {
    console.error("[worker] Scrape run failed", error);
  }
  process.exit(0);
})();
