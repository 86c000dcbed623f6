import type { AppContext } from "@app/context";
import type { MetricsRegistry } from "@infrastructure/metrics/MetricsRegistry";
import type { NextFunction, Request, RequestHandler, Response } from "express";

export function createMetricsController(
  metrics: MetricsRegistry
): RequestHandler {
  return (_req: Request, res: Response, next: NextFunction) => {
    metrics
      .render()
      .then((body) => {
        res.status(200).set("Content-Type", metrics.contentType).send(body);
      })
      .catch(next);
  };
}

export function createHealthController(context: AppContext): RequestHandler {
  return (_req: Request, res: Response) => {
    const { descriptor, uri } = context.resolved;

    res.json({
      status: "ok",
      model: {
        name: descriptor.name,
        version: descriptor.version,
        stage: descriptor.stage,
        uri,
      },
      vectorizer: { dimension: context.vectorizer.dimension },
    });
  };
}
