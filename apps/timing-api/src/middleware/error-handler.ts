import type { Request, Response, NextFunction } from "express";
import { ErrorCodes, type ErrorResponse } from "@can-timing/shared";
import { AppError } from "../errors/app-error";

type ClientError = Error & { status: number; type: string };

// body-parser rejects requests with a 4xx status and a string type
const isClientError = (err: Error): err is ClientError =>
  "status" in err &&
  typeof err.status === "number" &&
  err.status >= 400 &&
  err.status < 500 &&
  "type" in err &&
  typeof err.type === "string";

const CLIENT_ERROR_MESSAGES: Record<string, string> = {
  "entity.parse.failed": "Request body is not valid JSON.",
  "entity.too.large": "Request body too large.",
  "encoding.unsupported": "Unsupported content encoding.",
  "charset.unsupported": "Unsupported charset.",
};

export const errorHandler = (
  err: Error | AppError,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const requestId = req.requestId ?? "unknown";

  if (err instanceof AppError) {
    const body: ErrorResponse = {
      code: err.code,
      message: err.message,
      details: { ...err.details, request_id: requestId },
    };
    res.status(err.status).json(body);
    return;
  }

  if (isClientError(err)) {
    res.status(err.status).json({
      code: ErrorCodes.VALIDATION_ERROR,
      message: CLIENT_ERROR_MESSAGES[err.type] ?? "Invalid request body.",
      details: { request_id: requestId },
    });
    return;
  }

  console.error(`[error] request_id=${requestId}`, err);
  res.status(500).json({
    code: ErrorCodes.INTERNAL_ERROR,
    message: "Unexpected error.",
    details: { request_id: requestId },
  });
};
