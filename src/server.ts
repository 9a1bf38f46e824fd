/**
 * Process entry point: loads .env, validates configuration, wires the
 * container and starts the HTTP server. Exits non-zero when configuration
 * is invalid.
 */
import { type AppConfig, loadConfig } from "@config/index";
import { configureLogger, logger } from "@infrastructure/logging/Logger";
import { ConfigurationError } from "@middleware/errorHandler";
import dotenv from "dotenv";

import { createApp } from "./app";
import { buildContainer } from "./container";

function readConfig(): Readonly<AppConfig> {
  try {
    return loadConfig();
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      logger.log("error", "Startup aborted", {
        message: error.message,
        variables: error.variables,
      });
      process.exit(1);
    }
    throw error;
  }
}

function main(): void {
  dotenv.config();

  const config = readConfig();

  configureLogger({
    level: config.observability.logLevel,
    file: config.observability.logFile,
  });

  const container = buildContainer(config);
  const app = createApp({
    chat: container.chat,
    ingest: container.ingest,
    search: container.search,
    version: config.version,
    corsOrigin: config.corsOrigin,
  });

  const server = app.listen(config.port, () => {
    logger.log("info", "Server listening", {
      port: config.port,
      model: config.openai.model,
      embeddingModel: config.openai.embeddingModel,
      vectorProvider: config.vectorStore.provider,
    });
  });

  const shutdown = (signal: string) => {
    logger.log("info", "Shutting down", { signal });
    server.close(() => {
      void container
        .close()
        .catch((err: unknown) => {
          logger.log("error", "Error while closing resources", {
            message: err instanceof Error ? err.message : String(err),
          });
        })
        .finally(() => process.exit(0));
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main();
