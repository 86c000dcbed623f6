/**
 * Startup model resolution.
 *
 * Policy, first match wins:
 *   1. "Production" versions of the model
 *   2. "None" (unstaged) versions
 *   3. nothing -> ModelResolutionError, startup aborts
 *
 * Within a stage the highest version number wins; equal numbers fall back to
 * the most recent registration.
 */
import { logEvent } from "@infrastructure/logging/Logger";
import { DomainError } from "@middleware/errorHandler";

import type {
  ModelRegistryPort,
  ModelStage,
  ModelVersionDescriptor,
  ResolvedModel,
} from "./ports";
import { modelUri } from "./ports";

export const RESOLUTION_STAGES: readonly ModelStage[] = ["Production", "None"];

export class ModelResolutionError extends DomainError {
  constructor(modelName: string) {
    super(`No resolvable version for model "${modelName}"`, 500, {
      modelName,
      stages: [...RESOLUTION_STAGES],
    });
  }
}

export function pickLatestVersion(
  descriptors: readonly ModelVersionDescriptor[]
): ModelVersionDescriptor | undefined {
  let best: ModelVersionDescriptor | undefined;

  for (const candidate of descriptors) {
    if (
      !best ||
      candidate.version > best.version ||
      (candidate.version === best.version &&
        candidate.createdAt > best.createdAt)
    ) {
      best = candidate;
    }
  }

  return best;
}

export async function findActiveVersion(
  registry: ModelRegistryPort,
  modelName: string
): Promise<ModelVersionDescriptor> {
  for (const stage of RESOLUTION_STAGES) {
    const versions = await registry.getVersions(modelName, stage);
    const picked = pickLatestVersion(versions);

    if (picked) {
      return picked;
    }
  }

  throw new ModelResolutionError(modelName);
}

export async function resolveModel(
  registry: ModelRegistryPort,
  modelName: string
): Promise<ResolvedModel> {
  const descriptor = await findActiveVersion(registry, modelName);
  const uri = modelUri(descriptor.name, descriptor.version);

  logEvent("MODEL_RESOLVED", {
    modelName,
    version: descriptor.version,
    stage: descriptor.stage,
    uri,
  });

  const model = await registry.loadModel(uri);

  return Object.freeze({ descriptor: Object.freeze({ ...descriptor }), uri, model });
}
