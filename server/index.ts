import { loadAppConfig } from "./config/app-config.js";
import { bootstrapServices } from "./app-services.js";
import { createApp } from "./app.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("express");

(async () => {
  const config = loadAppConfig();
  const services = await bootstrapServices(config);
  const app = createApp(services);

  app.listen(config.PORT, "0.0.0.0", () => {
    log.info(`🚀 Serving on port ${config.PORT}`);
  });
})().catch((error) => {
  log.error("❌ Failed to start server:", error);
  process.exit(1);
});
