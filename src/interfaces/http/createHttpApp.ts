import { errorHandler } from "@middleware/errorHandler";
import { registerRoutes, type RouteDeps } from "@routes/index";
import { NotFoundError } from "@typesLocal/AppError";
import express, { type Express } from "express";

export function createHttpApp(deps: RouteDeps): Express {
  const app = express();
  app.use(express.json({ limit: "5mb" }));

  registerRoutes(app, deps);

  app.use((req, _res, next) => {
    next(new NotFoundError(`No route for ${req.method} ${req.path}`));
  });
  app.use(errorHandler);

  return app;
}
