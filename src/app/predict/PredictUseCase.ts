/**
 * Prediction use case.
 *
 * Runs the pure Predictor, then notifies observers (metrics) once the label
 * is known. Observers never affect the returned result: a failing observer is
 * logged and skipped. Nothing is written to the log on the success path.
 */
import type { Predictor, PredictionResult } from "@domain/prediction/Predictor";
import { logger } from "@infrastructure/logging/Logger";

export interface PredictionObserver {
  onPrediction(result: PredictionResult): void;
}

export class PredictUseCase {
  constructor(
    private readonly predictor: Predictor,
    private readonly observers: readonly PredictionObserver[] = []
  ) {}

  execute(text: string): PredictionResult {
    const result = this.predictor.predict(text);

    for (const observer of this.observers) {
      try {
        observer.onPrediction(result);
      } catch (err) {
        logger.log("error", "Prediction observer failed", {
          error: String(err),
        });
      }
    }

    return result;
  }
}
