import { Hono } from "hono";
import type { Env } from "../../../../index.js";
import { zValidator } from "../../../../shared/controller/http/validators.js";
import type { AnalysisOrchestrator } from "../../application/usecases/submit-analysis.usecase.js";
import { analysisFormSchema, toSubmissionInput } from "../schemas/analysis.schema.js";

export function createAnalyzeRoutes(orchestrator: AnalysisOrchestrator) {
  const app = new Hono<Env>();

  app.post("/api/analyze", zValidator("form", analysisFormSchema), async c => {
    const input = await toSubmissionInput(c.req.valid("form"));
    const outcome = await orchestrator.submit(input, { requestId: c.get("requestId") });
    return c.json(outcome);
  });

  return app;
}
