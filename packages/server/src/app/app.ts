import { Hono } from "hono";
import type { AppConfig } from "../config/app-config.js";
import type { Env } from "../index.js";
import { errorHandler } from "../middleware/error-handler.js";
import type { AnalysisOrchestrator } from "../modules/analysis/application/usecases/submit-analysis.usecase.js";
import { buildAnalysisOrchestrator } from "../modules/analysis/controller/factory/analysis.factory.js";
import { composeMiddleware } from "./middleware.js";
import { registerRoutes } from "./register-routes.js";

export interface AppDeps {
  config: AppConfig;
  orchestrator?: AnalysisOrchestrator;
}

export function createApp({ config, orchestrator }: AppDeps): Hono<Env> {
  const app = new Hono<Env>();

  composeMiddleware(app, config);

  registerRoutes(app, config, orchestrator ?? buildAnalysisOrchestrator(config));

  app.onError(errorHandler);

  app.notFound(c => {
    return c.json(
      { error: { code: "NOT_FOUND", message: "Route not found", requestId: c.get("requestId") } },
      404
    );
  });

  return app;
}
