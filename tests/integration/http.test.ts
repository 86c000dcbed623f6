import { buildAppContext, type AppContext } from "@app/context";
import { PredictUseCase } from "@app/predict/PredictUseCase";
import { ModelResolutionError } from "@domain/model/modelResolver";
import { Predictor } from "@domain/prediction/Predictor";
import { createDefaultNormalizer } from "@domain/text/TextNormalizer";
import { createVectorizer } from "@infrastructure/artifacts/BagOfWordsVectorizer";
import { createClassifier } from "@infrastructure/artifacts/LinearClassifier";
import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";

import { createApp } from "../../src/createApp";
import { InMemoryModelRegistry, descriptor } from "../support/InMemoryModelRegistry";
import { metricValue } from "../support/metricValues";

const vectorizer = createVectorizer({ vocabulary: { car: 0, dog: 1 } });
const model = createClassifier({
  labels: ["negative", "positive"],
  coefficients: [[-1, 1]],
  intercepts: [0],
});

async function buildContext(): Promise<AppContext> {
  return buildAppContext({
    modelName: "my_model",
    registry: new InMemoryModelRegistry(
      [descriptor(3, "Production"), descriptor(5, "None")],
      model
    ),
    vectorizer,
  });
}

describe("HTTP surface", () => {
  let context: AppContext;

  beforeEach(async () => {
    context = await buildContext();
  });

  it("serves the form page and counts the request", async () => {
    const res = await request(createApp(context)).get("/");

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toMatch(/^text\/html/);
    expect(res.text).toContain('<form method="post" action="/predict">');
    expect(res.text).not.toContain("Prediction:");
    expect(
      await metricValue(context.metrics, "app_request_count", {
        method: "GET",
        endpoint: "/",
      })
    ).toBe(1);
    expect(
      await metricValue(context.metrics, "app_request_latency_seconds_count", {
        endpoint: "/",
      })
    ).toBe(1);
  });

  it("predicts from a form submission", async () => {
    const res = await request(createApp(context))
      .post("/predict")
      .type("form")
      .send({ text: "I love my dogs" });

    expect(res.status).toBe(200);
    expect(res.text).toContain("Prediction: <strong>positive</strong>");
  });

  it("accepts a JSON body", async () => {
    const res = await request(createApp(context))
      .post("/predict")
      .send({ text: "Cars!" });

    expect(res.status).toBe(200);
    expect(res.text).toContain("Prediction: <strong>negative</strong>");
  });

  it("predicts for empty text", async () => {
    const res = await request(createApp(context))
      .post("/predict")
      .type("form")
      .send({ text: "" });

    expect(res.status).toBe(200);
    expect(res.text).toContain("Prediction: <strong>negative</strong>");
  });

  it("counts every prediction exactly once under concurrent load", async () => {
    const app = createApp(context);

    await Promise.all(
      Array.from({ length: 20 }, () =>
        request(app).post("/predict").type("form").send({ text: "dogs" })
      )
    );

    expect(
      await metricValue(context.metrics, "model_prediction_count", {
        prediction: "positive",
      })
    ).toBe(20);
    expect(
      await metricValue(context.metrics, "app_request_count", {
        method: "POST",
        endpoint: "/predict",
      })
    ).toBe(20);
    expect(
      await metricValue(context.metrics, "app_request_latency_seconds_count", {
        endpoint: "/predict",
      })
    ).toBe(20);
  });

  it("rejects a missing text field but still counts and times the request", async () => {
    const res = await request(createApp(context))
      .post("/predict")
      .type("form")
      .send({ other: "value" });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: {
        message: "Invalid request",
        code: "ValidationError",
        details: { issues: ["text is required"] },
      },
    });
    expect(
      await metricValue(context.metrics, "app_request_count", {
        method: "POST",
        endpoint: "/predict",
      })
    ).toBe(1);
    expect(
      await metricValue(context.metrics, "app_request_latency_seconds_count", {
        endpoint: "/predict",
      })
    ).toBe(1);
    expect(
      await metricValue(context.metrics, "model_prediction_count", {
        prediction: "negative",
      })
    ).toBe(0);
  });

  it("rejects a non-string text field", async () => {
    const res = await request(createApp(context))
      .post("/predict")
      .send({ text: 42 });

    expect(res.status).toBe(400);
    expect(res.body.error.details).toEqual({ issues: ["text must be a string"] });
  });

  it("reports a pipeline fault as an internal error", async () => {
    const wide = createVectorizer({ vocabulary: { car: 0, dog: 1, cat: 2 } });
    const broken: AppContext = {
      ...context,
      predictUseCase: new PredictUseCase(
        new Predictor(createDefaultNormalizer(), wide, model),
        [context.metrics]
      ),
    };
    const app = createApp(broken);

    const res = await request(app).post("/predict").type("form").send({ text: "dog" });

    expect(res.status).toBe(500);
    expect(res.body.error).toEqual({
      message: "Internal Server Error",
      code: "DomainError",
      details: {},
    });
    expect(
      await metricValue(context.metrics, "app_request_latency_seconds_count", {
        endpoint: "/predict",
      })
    ).toBe(1);
    expect(
      await metricValue(context.metrics, "model_prediction_count", {
        prediction: "positive",
      })
    ).toBe(0);
  });

  it("exposes metrics in the text format and times its own route", async () => {
    const app = createApp(context);
    await request(app).post("/predict").type("form").send({ text: "dogs" });

    const res = await request(app).get("/metrics");

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toMatch(/^text\/plain/);
    expect(res.text).toContain('model_prediction_count{prediction="positive"} 1');
    expect(res.text).toContain("app_request_latency_seconds_bucket");
    expect(
      await metricValue(context.metrics, "app_request_count", {
        method: "GET",
        endpoint: "/metrics",
      })
    ).toBe(1);
    expect(
      await metricValue(context.metrics, "app_request_latency_seconds_count", {
        endpoint: "/metrics",
      })
    ).toBe(1);
  });

  it("reports the resolved model on /health without instrumenting it", async () => {
    const res = await request(createApp(context)).get("/health");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: "ok",
      model: {
        name: "my_model",
        version: 3,
        stage: "Production",
        uri: "models:/my_model/3",
      },
      vectorizer: { dimension: 2 },
    });
    expect(
      await metricValue(context.metrics, "app_request_count", {
        method: "GET",
        endpoint: "/health",
      })
    ).toBe(0);
  });
});

describe("startup", () => {
  it("fails when the registry has no resolvable version", async () => {
    await expect(
      buildAppContext({
        modelName: "my_model",
        registry: new InMemoryModelRegistry([descriptor(2, "Staging")], model),
        vectorizer,
      })
    ).rejects.toBeInstanceOf(ModelResolutionError);
  });
});
