/**
 * Application context built once at startup and handed to every route.
 *
 * Loads the vectorizer, resolves and loads the active model, and checks that
 * the two agree on vector width. Any failure here is fatal: the caller must
 * not start listening.
 */
import type { AppConfig } from "@config/index";
import { resolveModel } from "@domain/model/modelResolver";
import type {
  ModelRegistryPort,
  ResolvedModel,
  Vectorizer,
} from "@domain/model/ports";
import { createPredictor } from "@domain/prediction/Predictor";
import {
  createDefaultNormalizer,
  type TextNormalizer,
} from "@domain/text/TextNormalizer";
import { loadVectorizer } from "@infrastructure/artifacts/BagOfWordsVectorizer";
import { logEvent } from "@infrastructure/logging/Logger";
import { MetricsRegistry } from "@infrastructure/metrics/MetricsRegistry";
import { createModelRegistry } from "@infrastructure/registry";

import { PredictUseCase } from "./predict/PredictUseCase";

export interface AppContext {
  readonly modelName: string;
  readonly resolved: ResolvedModel;
  readonly vectorizer: Vectorizer;
  readonly normalizer: TextNormalizer;
  readonly metrics: MetricsRegistry;
  readonly predictUseCase: PredictUseCase;
}

export interface ContextDependencies {
  modelName: string;
  registry: ModelRegistryPort;
  vectorizer: Vectorizer;
  normalizer?: TextNormalizer;
  metrics?: MetricsRegistry;
}

export async function buildAppContext(
  deps: ContextDependencies
): Promise<AppContext> {
  const normalizer = deps.normalizer ?? createDefaultNormalizer();
  const metrics = deps.metrics ?? new MetricsRegistry();
  const resolved = await resolveModel(deps.registry, deps.modelName);
  const predictor = createPredictor(normalizer, deps.vectorizer, resolved.model);

  logEvent("APP_CONTEXT_READY", {
    modelName: deps.modelName,
    uri: resolved.uri,
    dimension: deps.vectorizer.dimension,
    labels: [...resolved.model.labels],
  });

  return Object.freeze({
    modelName: deps.modelName,
    resolved,
    vectorizer: deps.vectorizer,
    normalizer,
    metrics,
    predictUseCase: new PredictUseCase(predictor, [metrics]),
  });
}

export async function createAppContext(config: AppConfig): Promise<AppContext> {
  const vectorizer = await loadVectorizer(config.model.vectorizerPath);

  return buildAppContext({
    modelName: config.model.name,
    registry: createModelRegistry(config.registry),
    vectorizer,
  });
}
