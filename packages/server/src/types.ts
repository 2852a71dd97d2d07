/**
 * Shared type definitions for @vision-assistant/server
 */

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    requestId: string;
    details?: unknown;
  };
}

/**
 * Health check response format
 */
export interface HealthResponse {
  status: "ok" | "degraded" | "down";
  uptime: number;
  timestamp: string;
  version: string;
}

/**
 * Validation error (400)
 */
export class ValidationError extends Error {
  readonly code = "VALIDATION_ERROR" as const;
  readonly status = 400;
  details: unknown;

  constructor(message: string, details: unknown) {
    super(message);
    this.name = "ValidationError";
    this.details = details;
  }
}

/**
 * Upload over the configured size limit (413)
 */
export class PayloadTooLargeError extends Error {
  readonly code = "PAYLOAD_TOO_LARGE" as const;
  readonly status = 413;

  constructor(limitBytes: number) {
    super(`Upload exceeds ${limitBytes} bytes`);
    this.name = "PayloadTooLargeError";
  }
}
