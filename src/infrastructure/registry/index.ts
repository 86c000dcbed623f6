import type { AppConfig } from "@config/index";
import type { ModelRegistryPort } from "@domain/model/ports";

import { FileModelRegistry } from "./FileModelRegistry";
import { MlflowModelRegistry } from "./MlflowModelRegistry";

export function createModelRegistry(
  registry: AppConfig["registry"]
): ModelRegistryPort {
  if (registry.backend === "mlflow") {
    return new MlflowModelRegistry({
      trackingUri: registry.mlflow.trackingUri,
      username: registry.mlflow.username,
      password: registry.mlflow.password,
      timeoutMs: registry.mlflow.timeoutMs,
    });
  }

  return new FileModelRegistry(registry.manifestPath);
}
