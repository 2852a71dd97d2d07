import { Hono } from "hono";
import type { Env } from "../../../../index.js";
import { getHealthUsecase } from "../../application/usecases/get-health.usecase.js";

const app = new Hono<Env>();

app.get("/api/health", c => {
  return c.json(getHealthUsecase());
});

export const healthRoutes = app;
