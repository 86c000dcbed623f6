/**
 * Service entry point.
 *
 * Builds the application context (vectorizer + resolved model + metrics)
 * before accepting traffic. If the context cannot be built the process exits
 * with status 1 and never listens.
 */
import { createAppContext } from "@app/context";
import { config } from "@config/index";
import { logger } from "@infrastructure/logging/Logger";

import { createApp } from "./createApp";

async function main(): Promise<void> {
  logger.log("info", "Starting text classification service", {
    env: config.env,
    modelName: config.model.name,
    registry: config.registry.backend,
  });

  const context = await createAppContext(config);
  const app = createApp(context);

  app.listen(config.port, () => {
    logger.log("info", "Server listening", {
      url: `http://localhost:${config.port}`,
      model: context.resolved.uri,
    });
  });
}

main().catch((err: unknown) => {
  logger.log("error", "Startup failed", {
    name: err instanceof Error ? err.name : "Error",
    message: err instanceof Error ? err.message : String(err),
    metadata:
      err && typeof err === "object" && "metadata" in err
        ? JSON.stringify(err.metadata)
        : undefined,
  });
  process.exit(1);
});
