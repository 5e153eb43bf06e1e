import "dotenv/config";

import { loadConfig } from "../core/config";
import { createModerationService } from "../core/service";
import { createApp } from "./app";

const service = createModerationService(loadConfig());
service.startMaintenance();

// ---- Start server ----
const PORT = Number(process.env.PORT || 3000);
const server = createApp(service).listen(PORT, () => {
  service.logger.info("api_listening", { port: PORT });
});

function stop() {
  server.close(() => {
    service.close();
    process.exit(0);
  });
}

process.on("SIGINT", stop);
process.on("SIGTERM", stop);
