import fs from "fs";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("@config/index", () => ({
  config: {
    env: "production",
    observability: { logLevel: "debug", logFile: "logs/predict-use-case.log" },
  },
}));

import { PredictUseCase } from "@app/predict/PredictUseCase";
import { createPredictor } from "@domain/prediction/Predictor";
import { createDefaultNormalizer } from "@domain/text/TextNormalizer";
import { createVectorizer } from "@infrastructure/artifacts/BagOfWordsVectorizer";
import { createClassifier } from "@infrastructure/artifacts/LinearClassifier";
import { logger } from "@infrastructure/logging/Logger";

describe("PredictUseCase with a log file configured", () => {
  const predictor = createPredictor(
    createDefaultNormalizer(),
    createVectorizer({ vocabulary: { car: 0, dog: 1 } }),
    createClassifier({
      labels: ["negative", "positive"],
      coefficients: [[-1, 1]],
      intercepts: [0],
    })
  );

  beforeEach(() => {
    vi.spyOn(fs, "existsSync").mockReturnValue(true);
    vi.spyOn(fs, "mkdirSync").mockReturnValue(undefined);
    vi.spyOn(fs, "appendFileSync").mockReturnValue(undefined);
    vi.spyOn(console, "log").mockReturnValue(undefined);
    vi.spyOn(console, "error").mockReturnValue(undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes ordinary log entries to the file", () => {
    logger.log("info", "ready");

    expect(fs.appendFileSync).toHaveBeenCalledTimes(1);
  });

  it("does not touch the log file on a successful prediction", () => {
    const useCase = new PredictUseCase(predictor);

    for (let i = 0; i < 5; i += 1) {
      expect(useCase.execute("I love my dogs").label).toBe("positive");
    }

    expect(fs.appendFileSync).not.toHaveBeenCalled();
    expect(console.log).not.toHaveBeenCalled();
  });

  it("still logs an observer failure", () => {
    const useCase = new PredictUseCase(predictor, [
      {
        onPrediction: () => {
          throw new Error("observer down");
        },
      },
    ]);

    expect(useCase.execute("dog").label).toBe("positive");
    expect(fs.appendFileSync).toHaveBeenCalledTimes(1);
  });
});
