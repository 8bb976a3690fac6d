import { Router } from "express";
import type { ApiConfig } from "../config/env";
import { createRateLimiter } from "../middleware/rate-limit";
import { createTimingRouter } from "./timing";

export const createApiRouter = (config: ApiConfig) => {
  const router = Router();

  router.use(
    "/timing",
    createRateLimiter({
      windowMs: config.rateLimitWindowMs,
      max: config.rateLimitMax,
      message: "Too many timing requests.",
    }),
    createTimingRouter({ maxBatchSize: config.maxBatchSize })
  );

  router.get("/", (_req, res) => {
    res.json({ status: "ok", service: "timing-api", version: "v1" });
  });

  return router;
};
