/**
 * HTTP API entry point.
 *
 * Loads configuration, wires the container, checks OpenAI connectivity and
 * serves the query and ingestion routes. With QUEUE_BACKEND=memory the same
 * process also consumes the embedding queue.
 */
import { createContainer } from "./container";
import { loadConfig } from "@config/index";
import { createHttpApp } from "@interfaces/http/createHttpApp";
import { validateOpenAIKey } from "@infra/llm/OpenAIAdapter";
import { logger } from "@infra/logging/Logger";

async function main(): Promise<void> {
  const config = loadConfig();
  const container = await createContainer(config);

  await validateOpenAIKey(container.openai, config.openai);

  if (config.queue.backend === "memory") {
    await container.queue.consume((delivery) =>
      container.coordinator.processWorkItems(delivery)
    );
  }

  const app = createHttpApp({
    coordinator: container.coordinator,
    orchestrator: container.orchestrator,
    vectorStore: container.vectorStore,
  });

  const server = app.listen(config.port, () => {
    logger.log("info", `Server running on http://localhost:${config.port}`, {
      model: config.openai.model,
      embeddingModel: config.openai.embeddingModel,
      vectorStore: config.vectorStore.backend,
    });
  });

  const shutdown = (signal: string) => {
    logger.log("info", "Shutting down", { signal });
    server.close(() => {
      container.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.log("error", "Shutdown failed", {
            message: error instanceof Error ? error.message : String(error),
          });
          process.exit(1);
        }
      );
    });
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  logger.log("error", "Server failed to start", {
    message: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
