/**
 * Type guards for the loop error kinds + code-level discrimination.
 */

import type { AsyncLoopError } from "./base.js";
import { isAsyncLoopError } from "./base.js";
import { InternalError } from "./bases/internal-error.js";
import type { ErrorCode } from "./catalog.js";
import {
  DoneResolutionError,
  DoneTimeoutError,
  LoopInternalError,
  LoopUsageError,
} from "./event-loop.js";

/** Check if an error is a LoopUsageError (programmer misuse) */
export function isUsageError(error: unknown): error is LoopUsageError {
  return error instanceof LoopUsageError;
}

/** Check if an error came from resolving a done item (duplicate, order, timeout, failure) */
export function isResolutionError(error: unknown): error is DoneResolutionError {
  return error instanceof DoneResolutionError;
}

/** Check if an error is a done item timeout */
export function isDoneTimeoutError(error: unknown): error is DoneTimeoutError {
  return error instanceof DoneTimeoutError;
}

/**
 * Check if an error is an internal error (bug): either the generic
 * InternalError or a LoopInternalError recorded against a done item
 */
export function isInternalError(error: unknown): error is InternalError | LoopInternalError {
  return error instanceof InternalError || error instanceof LoopInternalError;
}

/**
 * Check if an error carries a specific catalog code
 */
export function hasCode<C extends ErrorCode>(
  error: unknown,
  code: C,
): error is AsyncLoopError & { readonly code: C } {
  return isAsyncLoopError(error) && error.code === code;
}
