import type { Request, Response } from "express";
import { ErrorCodes } from "@can-timing/shared";

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({
    code: ErrorCodes.NOT_FOUND,
    message: "Route not found.",
    details: { request_id: req.requestId },
  });
};
