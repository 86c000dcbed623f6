import type { MetricsRegistry } from "@infrastructure/metrics/MetricsRegistry";
import type { NextFunction, Request, RequestHandler, Response } from "express";

/**
 * Counts the request for `endpoint` before it is handled and records one
 * latency observation when the response finishes or the connection closes,
 * whichever comes first.
 */
export function instrumentRoute(
  metrics: MetricsRegistry,
  endpoint: string
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const timer = metrics.startRequest(req.method, endpoint);

    res.once("finish", () => timer.stop());
    res.once("close", () => timer.stop());

    next();
  };
}
