import type { Hono } from "hono";
import type { AppConfig } from "../config/app-config.js";
import type { Env } from "../index.js";
import type { AnalysisOrchestrator } from "../modules/analysis/application/usecases/submit-analysis.usecase.js";
import { createAnalyzeRoutes } from "../modules/analysis/controller/routes/analyze.route.js";
import { createPageRoutes } from "../modules/analysis/controller/routes/page.route.js";
import { healthRoutes } from "../modules/health/controller/routes/health.route.js";

export function registerRoutes(
  app: Hono<Env>,
  config: AppConfig,
  orchestrator: AnalysisOrchestrator
): void {
  app.route("/", healthRoutes);
  app.route("/", createAnalyzeRoutes(orchestrator));
  app.route("/", createPageRoutes(orchestrator, config.maxUploadBytes));
}
