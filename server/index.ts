import "dotenv/config";
import { loadConfig } from "./config";
import { createServices } from "./services";
import { createApp } from "./app";
import { log, logError } from "./lib/logger";

async function main() {
  const config = loadConfig();
  const services = createServices(config);
  const { httpServer } = await createApp(services);

  if (!config.llm.apiKey) {
    log("OPENAI_API_KEY is not set; generation calls will fail until it is", "config");
  }

  httpServer.listen(config.port, "0.0.0.0", () => {
    log(`serving on port ${config.port}`);
  });

  const shutdown = (signal: string) => {
    log(`received ${signal}, shutting down`, "process");
    httpServer.close();
    services
      .close()
      .then(() => process.exit(0))
      .catch((err) => {
        logError("error during shutdown", "process", err);
        process.exit(1);
      });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err) => {
  logError("failed to start", "process", err);
  process.exit(1);
});
