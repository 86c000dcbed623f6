import type { AppContext } from "@app/context";
import { errorHandler } from "@middleware/errorHandler";
import { registerRoutes } from "@routes/index";
import express, { type Express } from "express";

export function createApp(context: AppContext): Express {
  const app = express();
  app.disable("x-powered-by");

  registerRoutes(app, context);

  app.use(errorHandler);

  return app;
}
