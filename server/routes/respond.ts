import type { Response } from "express";
import type { ServiceError, ServiceErrorCode } from "../../src/lib/venueService.js";

type ApiErrorCode = ServiceErrorCode | "VALIDATION_ERROR" | "PAYLOAD_TOO_LARGE" | "INTERNAL_ERROR";

const STATUS_BY_CODE: Record<ApiErrorCode, number> = {
  VALIDATION_ERROR: 400,
  PAYLOAD_TOO_LARGE: 413,
  INVALID_TIME: 400,
  UNKNOWN_VENUE: 404,
  INSUFFICIENT_DATA: 422,
  NO_ELIGIBLE_BASELINE: 422,
  NO_CORRECTIONS: 503,
  PERSIST_FAILED: 500,
  INTERNAL_ERROR: 500,
};

export function sendError(res: Response, error: { code: ApiErrorCode; message: string }, status?: number): void {
  res.status(status ?? STATUS_BY_CODE[error.code]).json({
    success: false,
    error: { code: error.code, message: error.message },
  });
}

/** 4xx status carried by a body-parser (http-errors) error, or null. */
export function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== "object" || err === null || !("status" in err)) return null;
  const { status } = err;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

export function sendServiceError(res: Response, error: ServiceError): void {
  sendError(res, error);
}

export function sendInternalError(res: Response, e: unknown): void {
  console.error("[Server] request failed:", e);
  sendError(res, {
    code: "INTERNAL_ERROR",
    message: e instanceof Error ? e.message : "Internal server error",
  });
}
