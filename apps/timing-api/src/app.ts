import express from "express";
import type { ApiConfig } from "./config/env";
import { errorHandler } from "./middleware/error-handler";
import { notFoundHandler } from "./middleware/not-found";
import { requestId } from "./middleware/request-id";
import { requestLogger } from "./middleware/request-logger";
import { createApiRouter } from "./routes";
import { healthHandler } from "./routes/health";

export const createApp = (config: ApiConfig) => {
  const app = express();

  app.set("trust proxy", 1);

  app.use(express.json({ limit: "64kb" }));
  app.use(requestId);
  app.use(requestLogger);

  app.get("/healthz", healthHandler);

  app.use("/api/v1", createApiRouter(config));

  app.use(notFoundHandler);

  app.use(errorHandler);

  return app;
};
