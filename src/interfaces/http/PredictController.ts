/**
 * HTTP handlers for the form page and POST /predict.
 *
 * Validates the `text` field with Zod, runs the prediction use case and
 * renders the result page. Validation failures become 400 via the global
 * error handler; pipeline faults become 500.
 */
import type { PredictUseCase } from "@app/predict/PredictUseCase";
import { PredictRequestSchema } from "@interfaces/http/predict/schema";
import { renderIndexPage } from "@interfaces/http/views";
import { ValidationError } from "@middleware/errorHandler";
import type { NextFunction, Request, RequestHandler, Response } from "express";

export function homeController(_req: Request, res: Response): void {
  res.type("html").send(renderIndexPage());
}

export function createPredictController(
  useCase: PredictUseCase
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const parsed = PredictRequestSchema.safeParse(req.body ?? {});

    if (!parsed.success) {
      next(
        new ValidationError("Invalid request", {
          issues: parsed.error.issues.map((issue) => issue.message),
        })
      );
      return;
    }

    try {
      const result = useCase.execute(parsed.data.text);
      res.type("html").send(renderIndexPage(result.label));
    } catch (err) {
      next(err);
    }
  };
}
