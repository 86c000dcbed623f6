/**
 * Model registry client for an MLflow tracking server (REST API 2.0).
 *
 * - Versions: POST /api/2.0/mlflow/registered-models/get-latest-versions
 * - Artifact: GET /model-versions/get-artifact?name&version&path
 *
 * Only reads; nothing here registers or transitions versions. The model
 * version's artifact directory must contain the exported classifier JSON
 * (default file name "model.json").
 */
import type {
  Classifier,
  ModelRegistryPort,
  ModelStage,
  ModelVersionDescriptor,
} from "@domain/model/ports";
import { MODEL_STAGES, parseModelUri } from "@domain/model/ports";
import { ArtifactError } from "@infrastructure/artifacts/ArtifactError";
import { createClassifier } from "@infrastructure/artifacts/LinearClassifier";
import { logEvent } from "@infrastructure/logging/Logger";
import { InfrastructureError } from "@middleware/errorHandler";
import { z } from "zod";

export type FetchLike = (
  input: string,
  init?: RequestInit
) => Promise<Response>;

export interface MlflowRegistryOptions {
  trackingUri: string;
  username?: string | undefined;
  password?: string | undefined;
  timeoutMs?: number;
  artifactPath?: string;
  fetch?: FetchLike;
}

const LatestVersionsSchema = z.object({
  model_versions: z
    .array(
      z.object({
        name: z.string(),
        version: z.coerce.number().int().positive(),
        current_stage: z.string().optional(),
        creation_timestamp: z.coerce.number().optional(),
        source: z.string().default(""),
      })
    )
    .default([]),
});

function toStage(raw: string | undefined): ModelStage {
  const match = MODEL_STAGES.find((stage) => stage === raw);
  return match ?? "None";
}

export class MlflowModelRegistry implements ModelRegistryPort {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly artifactPath: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: MlflowRegistryOptions) {
    this.baseUrl = options.trackingUri.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.artifactPath = options.artifactPath ?? "model.json";
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.headers = { "Content-Type": "application/json" };

    if (options.username && options.password) {
      const token = Buffer.from(
        `${options.username}:${options.password}`
      ).toString("base64");
      this.headers.Authorization = `Basic ${token}`;
    }
  }

  private async request(url: string, init: RequestInit): Promise<unknown> {
    let res: Response;

    try {
      res = await this.fetchImpl(url, {
        ...init,
        headers: this.headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new InfrastructureError("Model registry unreachable", 502, {
        url,
        cause: String(err),
      });
    }

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new InfrastructureError(
        `Model registry request failed: ${res.status}`,
        502,
        { url, status: res.status, body: text.slice(0, 500) }
      );
    }

    try {
      return await res.json();
    } catch (err) {
      throw new InfrastructureError(
        "Model registry returned a non-JSON body",
        502,
        { url, status: res.status, cause: String(err) }
      );
    }
  }

  async getVersions(
    modelName: string,
    stage: ModelStage
  ): Promise<ModelVersionDescriptor[]> {
    const body = await this.request(
      `${this.baseUrl}/api/2.0/mlflow/registered-models/get-latest-versions`,
      {
        method: "POST",
        body: JSON.stringify({ name: modelName, stages: [stage] }),
      }
    );

    const parsed = LatestVersionsSchema.safeParse(body);

    if (!parsed.success) {
      throw new InfrastructureError("Unexpected model registry response", 502, {
        modelName,
        stage,
      });
    }

    return parsed.data.model_versions
      .map((entry) => ({
        name: entry.name,
        version: entry.version,
        stage: toStage(entry.current_stage),
        source: entry.source,
        createdAt: entry.creation_timestamp ?? 0,
      }))
      .filter((entry) => entry.stage === stage);
  }

  async loadModel(uri: string): Promise<Classifier> {
    const parsed = parseModelUri(uri);

    if (!parsed) {
      throw new ArtifactError(`Unsupported model uri: ${uri}`, { uri });
    }

    const query = new URLSearchParams({
      name: parsed.name,
      version: String(parsed.version),
      path: this.artifactPath,
    });

    logEvent("MODEL_LOAD", { uri, artifactPath: this.artifactPath });

    const raw = await this.request(
      `${this.baseUrl}/model-versions/get-artifact?${query.toString()}`,
      { method: "GET" }
    );

    return createClassifier(raw, uri);
  }
}
