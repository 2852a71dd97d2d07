import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import type { Env } from "../../../../index.js";
import { PayloadTooLargeError } from "../../../../types.js";
import type { AnalysisOrchestrator } from "../../application/usecases/submit-analysis.usecase.js";
import {
  analysisFormSchema,
  echoFormValues,
  toSubmissionInput,
} from "../schemas/analysis.schema.js";
import { renderAnalysisPage } from "../views/analysis-page.js";

export function createPageRoutes(orchestrator: AnalysisOrchestrator, maxUploadBytes: number) {
  const app = new Hono<Env>();

  app.get("/", c => {
    return c.html(renderAnalysisPage({ category: "General", query: "" }));
  });

  app.post(
    "/",
    bodyLimit({
      maxSize: maxUploadBytes,
      onError: c => {
        const { message } = new PayloadTooLargeError(maxUploadBytes);
        return c.html(renderAnalysisPage({ category: "General", query: "", error: message }), 413);
      },
    }),
    async c => {
      const body = await c.req.parseBody();
      const parsed = analysisFormSchema.safeParse(body);
      if (!parsed.success) {
        const message = parsed.error.issues[0]?.message ?? "Invalid request";
        return c.html(renderAnalysisPage({ ...echoFormValues(body), error: message }), 400);
      }

      const input = await toSubmissionInput(parsed.data);
      const outcome = await orchestrator.submit(input, { requestId: c.get("requestId") });

      return c.html(
        renderAnalysisPage({
          category: input.category,
          query: input.query ?? "",
          image: input.image,
          outcome,
        })
      );
    }
  );

  return app;
}
