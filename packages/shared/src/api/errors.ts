export const ErrorCodes = {
  VALIDATION_ERROR: "VALIDATION_ERROR",
  NO_VALID_CONFIGURATION: "NO_VALID_CONFIGURATION",
  NOT_FOUND: "NOT_FOUND",
  RATE_LIMITED: "RATE_LIMITED",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type ErrorResponse = {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
};
