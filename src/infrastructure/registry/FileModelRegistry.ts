/**
 * Model registry backed by a JSON manifest on local disk.
 *
 * Manifest shape:
 *   { "versions": [
 *       { "name": "my_model", "version": 3, "stage": "Production",
 *         "source": "my_model/3/model.json", "created_at": "2024-05-01T10:00:00Z" } ] }
 *
 * Relative sources resolve against the manifest's directory.
 */
import path from "path";

import type {
  Classifier,
  ModelRegistryPort,
  ModelStage,
  ModelVersionDescriptor,
} from "@domain/model/ports";
import { MODEL_STAGES, parseModelUri } from "@domain/model/ports";
import { ArtifactError } from "@infrastructure/artifacts/ArtifactError";
import { loadClassifier } from "@infrastructure/artifacts/LinearClassifier";
import { readJsonArtifact } from "@infrastructure/artifacts/readArtifact";
import { logEvent } from "@infrastructure/logging/Logger";
import { z } from "zod";

const ManifestSchema = z.object({
  versions: z.array(
    z.object({
      name: z.string().min(1),
      version: z.coerce.number().int().positive(),
      stage: z.enum(MODEL_STAGES).default("None"),
      source: z.string().min(1),
      created_at: z
        .union([z.number(), z.string()])
        .optional()
        .transform((value) =>
          value === undefined
            ? 0
            : typeof value === "number"
              ? value
              : Date.parse(value) || 0
        ),
    })
  ),
});

export class FileModelRegistry implements ModelRegistryPort {
  private readonly baseDir: string;

  constructor(private readonly manifestPath: string) {
    this.baseDir = path.dirname(path.resolve(manifestPath));
  }

  private async readVersions(): Promise<ModelVersionDescriptor[]> {
    const manifest = await readJsonArtifact(ManifestSchema, this.manifestPath);

    return manifest.versions.map((entry) => ({
      name: entry.name,
      version: entry.version,
      stage: entry.stage,
      source: path.resolve(this.baseDir, entry.source),
      createdAt: entry.created_at,
    }));
  }

  async getVersions(
    modelName: string,
    stage: ModelStage
  ): Promise<ModelVersionDescriptor[]> {
    const versions = await this.readVersions();

    return versions
      .filter((entry) => entry.name === modelName && entry.stage === stage)
      .sort((a, b) => a.version - b.version);
  }

  async loadModel(uri: string): Promise<Classifier> {
    const parsed = parseModelUri(uri);

    if (!parsed) {
      throw new ArtifactError(`Unsupported model uri: ${uri}`, { uri });
    }

    const versions = await this.readVersions();
    const entry = versions.find(
      (candidate) =>
        candidate.name === parsed.name && candidate.version === parsed.version
    );

    if (!entry) {
      throw new ArtifactError(`Model version not registered: ${uri}`, { uri });
    }

    logEvent("MODEL_LOAD", { uri, source: entry.source });

    return loadClassifier(entry.source);
  }
}
