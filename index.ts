import path from "node:path";
import fs from "node:fs";
import { createApp } from "./src/app";
import { loadConfig } from "./src/config/env";
import { ConfigError } from "./src/errors";
import { createOpenAIModelClient } from "./src/llm/client";
import { createSearchGrounding } from "./src/agent/tools";
import { logger, setLogLevel } from "./src/utils/logger";
import type { AppConfig } from "./src/config/env";

const log = logger.server;

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.config.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

const config = readConfig();
setLogLevel(config.logLevel);

const swaggerPath = path.resolve(__dirname, "..", "swagger.json");
let swaggerDocument: Record<string, unknown> | null = null;

if (fs.existsSync(swaggerPath)) {
  try {
    swaggerDocument = JSON.parse(fs.readFileSync(swaggerPath, "utf-8"));
  } catch (error) {
    log.error("Failed to parse swagger.json", error);
  }
} else {
  log.warn(`Swagger definition not found at ${swaggerPath}. /docs route disabled.`);
}

const app = createApp(
  {
    model: createOpenAIModelClient(config.openai),
    search: createSearchGrounding(config.serpApiKey),
    settings: config.pipeline
  },
  {
    swaggerDocument,
    publicDir: path.resolve(__dirname, "..", "public")
  }
);

const server = app.listen(config.port, () => {
  log.info(`Dietary vetting service listening on port ${config.port}`);
});

process.on("unhandledRejection", (reason: unknown) => {
  log.error("Unhandled promise rejection", reason);
});

process.on("SIGTERM", () => {
  log.info("Received SIGTERM, shutting down.");
  server.close(() => process.exit(0));
});
