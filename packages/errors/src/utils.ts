import { AsyncLoopError } from "./base.js";
import { InternalError } from "./bases/internal-error.js";
import { ERROR_CATALOG, type ErrorCatalogEntry, type ErrorCode } from "./catalog.js";

/**
 * Look up error catalog entry by code
 */
export function getCatalogEntry(code: ErrorCode): ErrorCatalogEntry {
  return ERROR_CATALOG[code];
}

/**
 * Check if a string is a valid error code
 */
export function isValidErrorCode(code: string): code is ErrorCode {
  return code in ERROR_CATALOG;
}

/**
 * Wrap an unknown error into an AsyncLoopError.
 * If the error is already an AsyncLoopError, return it as-is.
 * Otherwise, wrap it in an InternalError.
 */
export function wrapError(error: unknown, traceId?: string): AsyncLoopError {
  if (error instanceof AsyncLoopError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError({
      code: "INTERNAL_ERROR",
      message: error.message,
      metadata: { originalName: error.name },
      traceId,
      cause: error,
    });
  }

  const message = typeof error === "string" ? error : "An unknown error occurred";
  return new InternalError(message, undefined, traceId);
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}

/**
 * How a failed test is reported.
 */
export type FailureKind =
  | "timeout"
  | "ordering"
  | "duplicate"
  | "failed"
  | "usage"
  | "check"
  | "action"
  | "internal";

const KIND_BY_CODE: Record<ErrorCode, FailureKind> = {
  INTERNAL_ERROR: "internal",
  LOOP_USAGE_INVALID: "usage",
  LOOP_INTERNAL: "internal",
  LOOP_ACTION_FAILED: "action",
  DONE_ALREADY_RESOLVED: "duplicate",
  DONE_OUT_OF_ORDER: "ordering",
  DONE_FAILED: "failed",
  DONE_TIMEOUT: "timeout",
  HARNESS_CHECK_FAILED: "check",
};

/**
 * Classify any thrown value into a failure kind.
 * Errors from outside the catalog count as failures of the code under test.
 */
export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof AsyncLoopError) {
    return KIND_BY_CODE[error.code];
  }
  return "action";
}
