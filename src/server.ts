/**
 * Application entry point for the grounded retrieval service.
 *
 * Wires the adapters, provisions the configured collection (idempotent),
 * registers the HTTP routes and error handling, then starts listening.
 */
import { createContainer } from "@app/container";
import { config } from "@config/index";
import { errorMessage } from "@domain/errors";
import { logger } from "@infra/logging/Logger";
import { errorHandler } from "@middleware/errorHandler";
import { registerRoutes } from "@routes/index";
import express from "express";

async function main(): Promise<void> {
  const container = createContainer();
  await container.store.ensureCollection(container.collection);

  const app = express();
  app.use(express.json({ limit: config.ingest.maxFileBytes }));

  registerRoutes(app, container);

  app.use(errorHandler);

  app.listen(config.port, () => {
    console.log(`🚀 Server running on http://localhost:${config.port}`);

    console.log("OpenAI model:", config.openai.model);
    console.log(
      "Vector store:",
      config.vectorStore.driver,
      `(collection "${container.collection.name}")`
    );
  });
}

main().catch((err: unknown) => {
  logger.log("error", "SERVER_START_FAILED", { message: errorMessage(err) });
  process.exit(1);
});
