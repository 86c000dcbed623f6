/**
 * Process-wide metrics on a dedicated prom-client Registry.
 *
 * - app_request_count{method,endpoint}: once per request, before handling
 * - app_request_latency_seconds{endpoint}: once per counted request
 * - model_prediction_count{prediction}: once per successful prediction
 *
 * Recording never throws into request handling; failures are logged and
 * dropped. Updates are synchronous, so concurrent requests cannot lose one.
 */
import type { PredictionObserver } from "@app/predict/PredictUseCase";
import type { PredictionResult } from "@domain/prediction/Predictor";
import { logger } from "@infrastructure/logging/Logger";
import { Counter, Histogram, Registry } from "prom-client";

export interface RequestTimer {
  /** Records the latency observation; later calls are no-ops. */
  stop(): void;
}

export class MetricsRegistry implements PredictionObserver {
  readonly registry: Registry;
  private readonly requestCount: Counter<"method" | "endpoint">;
  private readonly requestLatency: Histogram<"endpoint">;
  private readonly predictionCount: Counter<"prediction">;

  constructor() {
    this.registry = new Registry();

    this.requestCount = new Counter({
      name: "app_request_count",
      help: "Total number of requests to the app",
      labelNames: ["method", "endpoint"],
      registers: [this.registry],
    });

    this.requestLatency = new Histogram({
      name: "app_request_latency_seconds",
      help: "Latency of requests in seconds",
      labelNames: ["endpoint"],
      registers: [this.registry],
    });

    this.predictionCount = new Counter({
      name: "model_prediction_count",
      help: "Count of predictions for each class",
      labelNames: ["prediction"],
      registers: [this.registry],
    });
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  private safely(instrument: string, record: () => void): void {
    try {
      record();
    } catch (err) {
      logger.log("error", "Metric recording failed", {
        instrument,
        error: String(err),
      });
    }
  }

  recordRequest(method: string, endpoint: string): void {
    this.safely("app_request_count", () =>
      this.requestCount.inc({ method, endpoint })
    );
  }

  observeLatency(endpoint: string, seconds: number): void {
    this.safely("app_request_latency_seconds", () =>
      this.requestLatency.observe({ endpoint }, seconds)
    );
  }

  recordPrediction(label: string): void {
    this.safely("model_prediction_count", () =>
      this.predictionCount.inc({ prediction: String(label) })
    );
  }

  /** Counts the request now and returns the timer for its latency. */
  startRequest(method: string, endpoint: string): RequestTimer {
    this.recordRequest(method, endpoint);
    const startedAt = process.hrtime.bigint();
    let stopped = false;

    return {
      stop: () => {
        if (stopped) {
          return;
        }
        stopped = true;
        const elapsed = Number(process.hrtime.bigint() - startedAt) / 1e9;
        this.observeLatency(endpoint, elapsed);
      },
    };
  }

  onPrediction(result: PredictionResult): void {
    this.recordPrediction(result.label);
  }

  render(): Promise<string> {
    return this.registry.metrics();
  }
}
