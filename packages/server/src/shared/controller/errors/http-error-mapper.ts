import type { ErrorResponse } from "../../../types.js";
import { ValidationError } from "../../../types.js";

export type ErrorStatus = 400 | 413 | 500;

export function isErrorWithStatus(
  error: unknown
): error is Error & { status: number; code: string } {
  return (
    error instanceof Error &&
    "status" in error &&
    typeof error.status === "number" &&
    "code" in error &&
    typeof error.code === "string"
  );
}

export function mapErrorToResponse(error: unknown, requestId: string): ErrorResponse {
  if (error instanceof ValidationError) {
    return {
      error: {
        code: error.code,
        message: error.message,
        requestId,
        details: error.details,
      },
    };
  }

  if (isErrorWithStatus(error)) {
    return {
      error: {
        code: error.code,
        message: error.message,
        requestId,
      },
    };
  }

  return {
    error: {
      code: "INTERNAL_ERROR",
      message: "An unexpected error occurred",
      requestId,
    },
  };
}

export function getStatusCode(error: unknown): ErrorStatus {
  if (isErrorWithStatus(error) && (error.status === 400 || error.status === 413)) {
    return error.status;
  }
  return 500;
}
