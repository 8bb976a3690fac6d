import type { Request, Response } from "express";

const ok = { status: "ok", service: "timing-api" };

export const healthHandler = (_req: Request, res: Response) => {
  res.json(ok);
};
