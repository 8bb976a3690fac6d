import { Router } from "express";
import {
  batchTimings,
  bestTiming,
  explainTimings,
  searchTimings,
  timingHeader,
} from "../services/timing";

export const createTimingRouter = (options: { maxBatchSize: number }) => {
  const router = Router();

  router.post("/search", (req, res) => {
    res.json(searchTimings(req.body));
  });

  router.post("/best", (req, res) => {
    res.json(bestTiming(req.body));
  });

  router.post("/explain", (req, res) => {
    res.json(explainTimings(req.body));
  });

  router.post("/batch", (req, res) => {
    res.json(batchTimings(req.body, options.maxBatchSize));
  });

  router.post("/header", (req, res) => {
    const { header, missing } = timingHeader(req.body, options.maxBatchSize);
    if (missing.length > 0) {
      res.setHeader("x-missing-baud-rates", missing.join(","));
    }
    res.type("text/plain").send(header);
  });

  return router;
};
