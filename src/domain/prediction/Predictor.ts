/**
 * Stateless prediction pipeline: normalize -> vectorize -> classify.
 *
 * Holds only read-only collaborators, so one instance serves every request.
 * Has no observability dependency; callers emit metrics after the call.
 */
import type { Classifier, Vectorizer } from "@domain/model/ports";
import type { TextNormalizer } from "@domain/text/TextNormalizer";
import { AppError } from "@middleware/errorHandler";

export interface PredictionResult {
  label: string;
  normalizedText: string;
}

export class PredictionError extends AppError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, "DomainError", 500, metadata);
  }
}

export class Predictor {
  constructor(
    private readonly normalizer: TextNormalizer,
    private readonly vectorizer: Vectorizer,
    private readonly model: Classifier
  ) {}

  predict(rawText: string): PredictionResult {
    const normalizedText = this.normalizer.normalize(rawText);
    const vector = this.vectorizer.vectorize(normalizedText);

    if (vector.length !== this.model.inputDimension) {
      throw new PredictionError("Feature vector does not match model input", {
        vectorDimension: vector.length,
        modelDimension: this.model.inputDimension,
      });
    }

    return { label: this.model.predict(vector), normalizedText };
  }
}

export function createPredictor(
  normalizer: TextNormalizer,
  vectorizer: Vectorizer,
  model: Classifier
): Predictor {
  if (vectorizer.dimension !== model.inputDimension) {
    throw new PredictionError("Vectorizer and model dimensions differ", {
      vectorDimension: vectorizer.dimension,
      modelDimension: model.inputDimension,
    });
  }

  return new Predictor(normalizer, vectorizer, model);
}
