import type { ErrorResponse } from "@tierscribe/shared";
import { describeCause, ServiceError } from "./errors.js";

export interface MappedError {
  status: 400 | 413 | 500;
  body: ErrorResponse;
}

/**
 * Translates an error into the HTTP status and `{ error, code }` body the API
 * returns. Unknown errors become a 500 `internal_error`.
 */
export function toErrorResponse(err: unknown): MappedError {
  if (err instanceof ServiceError) {
    return { status: err.status, body: { error: err.message, code: err.code } };
  }
  return {
    status: 500,
    body: { error: `Internal error: ${describeCause(err) || "unknown failure"}`, code: "internal_error" },
  };
}
