/**
 * Linear classifier exported from an offline-trained model.
 *
 * Artifact shape (JSON):
 *   { "labels": [...], "coefficients": number[][], "intercepts": number[] }
 *
 * One coefficient row with two labels is the binary form: a positive decision
 * value picks labels[1]. Otherwise there is one row per label and the highest
 * decision value wins (first label on ties).
 */
import type { Classifier, FeatureVector } from "@domain/model/ports";
import { z } from "zod";

import { ArtifactError } from "./ArtifactError";
import { parseArtifact, readJsonArtifact } from "./readArtifact";

export const ClassifierArtifactSchema = z.object({
  labels: z
    .array(z.union([z.string(), z.number()]).transform((label) => String(label)))
    .min(2),
  coefficients: z.array(z.array(z.number())).min(1),
  intercepts: z.array(z.number()).min(1),
});

export type ClassifierArtifact = z.output<typeof ClassifierArtifactSchema>;

function decision(
  weights: readonly number[],
  intercept: number,
  vector: FeatureVector
): number {
  let score = intercept;

  vector.forEach((value, index) => {
    if (value !== 0) {
      score += value * (weights[index] ?? 0);
    }
  });

  return score;
}

export class LinearClassifier implements Classifier {
  readonly labels: readonly string[];
  readonly inputDimension: number;
  private readonly coefficients: readonly (readonly number[])[];
  private readonly intercepts: readonly number[];

  constructor(artifact: ClassifierArtifact) {
    const { labels, coefficients, intercepts } = artifact;
    const binary = coefficients.length === 1 && labels.length === 2;

    if (!binary && coefficients.length !== labels.length) {
      throw new ArtifactError("Coefficient rows do not match label count", {
        rows: coefficients.length,
        labels: labels.length,
      });
    }

    if (intercepts.length !== coefficients.length) {
      throw new ArtifactError("Intercepts do not match coefficient rows", {
        rows: coefficients.length,
        intercepts: intercepts.length,
      });
    }

    const inputDimension = coefficients[0]?.length ?? 0;

    if (coefficients.some((row) => row.length !== inputDimension)) {
      throw new ArtifactError("Coefficient rows differ in width", {
        inputDimension,
      });
    }

    this.labels = Object.freeze([...labels]);
    this.inputDimension = inputDimension;
    this.coefficients = Object.freeze(coefficients.map((row) => Object.freeze([...row])));
    this.intercepts = Object.freeze([...intercepts]);
  }

  private label(index: number): string {
    const label = this.labels[index];

    if (label === undefined) {
      throw new ArtifactError("Classifier has no label at index", { index });
    }

    return label;
  }

  predict(vector: FeatureVector): string {
    if (vector.length !== this.inputDimension) {
      throw new ArtifactError("Feature vector width does not match classifier", {
        vectorDimension: vector.length,
        modelDimension: this.inputDimension,
      });
    }

    const scores = this.coefficients.map((weights, row) =>
      decision(weights, this.intercepts[row] ?? 0, vector)
    );

    if (scores.length === 1) {
      return this.label((scores[0] ?? 0) > 0 ? 1 : 0);
    }

    let best = 0;
    scores.forEach((score, index) => {
      if (score > (scores[best] ?? -Infinity)) {
        best = index;
      }
    });

    return this.label(best);
  }
}

export function createClassifier(raw: unknown, source = "<inline>"): LinearClassifier {
  return new LinearClassifier(
    parseArtifact(ClassifierArtifactSchema, raw, source)
  );
}

export async function loadClassifier(filePath: string): Promise<LinearClassifier> {
  const artifact = await readJsonArtifact(ClassifierArtifactSchema, filePath);
  return new LinearClassifier(artifact);
}
