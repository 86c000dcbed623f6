/**
 * Domain ports for the model registry and the loaded classifier.
 *
 * The resolver and predictor only see these interfaces; concrete backends
 * (local manifest, MLflow tracking server) live in infrastructure/registry
 * and can be swapped or faked in tests.
 */
export const MODEL_STAGES = ["Production", "Staging", "Archived", "None"] as const;

export type ModelStage = (typeof MODEL_STAGES)[number];

export interface ModelVersionDescriptor {
  name: string;
  version: number;
  stage: ModelStage;
  /** Where the registry keeps the artifact (file path or remote source). */
  source: string;
  /** Registration time, epoch milliseconds. */
  createdAt: number;
}

/** Read-only feature vector of fixed dimension. */
export type FeatureVector = Readonly<Float64Array>;

export interface Classifier {
  readonly labels: readonly string[];
  readonly inputDimension: number;
  predict(vector: FeatureVector): string;
}

export interface Vectorizer {
  readonly dimension: number;
  vectorize(text: string): FeatureVector;
  transform(texts: readonly string[]): FeatureVector[];
}

export interface ModelRegistryPort {
  getVersions(
    modelName: string,
    stage: ModelStage
  ): Promise<ModelVersionDescriptor[]>;

  /** Loads the artifact behind a `models:/<name>/<version>` uri. */
  loadModel(uri: string): Promise<Classifier>;
}

export interface ResolvedModel {
  descriptor: ModelVersionDescriptor;
  uri: string;
  model: Classifier;
}

export function modelUri(name: string, version: number): string {
  return `models:/${name}/${version}`;
}

export function parseModelUri(
  uri: string
): { name: string; version: number } | undefined {
  const match = /^models:\/(.+)\/(\d+)$/.exec(uri);

  if (!match || match[1] === undefined || match[2] === undefined) {
    return undefined;
  }

  return { name: match[1], version: Number(match[2]) };
}
