/**
 * Queue consumer entry point: embeds and indexes chunk work messages.
 */
import { createContainer } from "./container";
import { loadConfig } from "@config/index";
import { logger } from "@infra/logging/Logger";

async function main(): Promise<void> {
  const config = loadConfig();
  const container = await createContainer(config);

  await container.queue.consume((delivery) =>
    container.coordinator.processWorkItems(delivery)
  );

  logger.log("info", "Embedding worker started", {
    queue: config.queue.name,
    backend: config.queue.backend,
    concurrency: config.queue.concurrency,
  });

  const shutdown = (signal: string) => {
    logger.log("info", "Worker shutting down", { signal });
    container.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.log("error", "Worker shutdown failed", {
          message: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      }
    );
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  logger.log("error", "Worker failed to start", {
    message: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
