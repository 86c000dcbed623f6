/**
 * Route registration.
 *
 * - GET /          form page (instrumented)
 * - POST /predict  prediction (instrumented)
 * - GET /metrics   Prometheus exposition (instrumented for its own route)
 * - GET /health    resolved model summary (not instrumented)
 */
import type { AppContext } from "@app/context";
import {
  createHealthController,
  createMetricsController,
} from "@interfaces/http/MetricsController";
import {
  createPredictController,
  homeController,
} from "@interfaces/http/PredictController";
import { instrumentRoute } from "@middleware/requestMetrics";
import express, { type Express } from "express";

export function registerRoutes(app: Express, context: AppContext): void {
  const { metrics } = context;

  app.get("/", instrumentRoute(metrics, "/"), homeController);

  app.post(
    "/predict",
    instrumentRoute(metrics, "/predict"),
    express.urlencoded({ extended: false }),
    express.json(),
    createPredictController(context.predictUseCase)
  );

  app.get(
    "/metrics",
    instrumentRoute(metrics, "/metrics"),
    createMetricsController(metrics)
  );

  app.get("/health", createHealthController(context));
}
