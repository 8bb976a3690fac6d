import type { Request, Response, NextFunction } from "express";

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();

  res.on("finish", () => {
    const durationMs = Date.now() - start;
    const requestId = req.requestId ?? "unknown";
    const line = `[request] ${req.method} ${req.originalUrl} ${res.statusCode} ${durationMs}ms request_id=${requestId}`;
    if (res.statusCode >= 500) {
      console.error(line);
    } else {
      console.log(line);
    }
  });

  next();
};
