/**
 * Express application factory. Takes fully built use cases so tests can
 * drive the HTTP layer with fake providers.
 */
import { cors } from "@middleware/cors";
import { errorHandler, notFoundHandler } from "@middleware/errorHandler";
import { registerRoutes, type RouteDeps } from "@routes/index";
import express, { type Express } from "express";

export interface AppOptions extends RouteDeps {
  corsOrigin: string;
}

export const JSON_BODY_LIMIT = "6mb";

export function createApp(options: AppOptions): Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(cors(options.corsOrigin));
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  registerRoutes(app, options);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
