/**
 * @asyncloop/errors
 *
 * Shared error taxonomy for the asyncloop packages.
 *
 * Every error carries a `.code` from the catalog that discriminates
 * the specific condition and a `_tag` naming its behavioral base type.
 * Use `error.code === "XXX"` for fine-grained matching, or the guards
 * for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { AsyncLoopError, type ErrorJSON, isAsyncLoopError, isError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export {
  classifyFailure,
  type FailureKind,
  getCatalogEntry,
  getErrorMessage,
  isValidErrorCode,
  wrapError,
} from "./utils.js";

export { InternalError } from "./bases/index.js";

export type { AsyncLoopErrorOptions, InternalCodes } from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isDoneTimeoutError,
  isInternalError,
  isResolutionError,
  isUsageError,
} from "./guards.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export {
  composeDoneMessage,
  DoneAlreadyResolvedError,
  DoneFailedError,
  DoneOrderError,
  DoneResolutionError,
  DoneTimeoutError,
  LoopActionError,
  LoopInternalError,
  LoopUsageError,
} from "./event-loop.js";

export { CheckFailedError } from "./harness.js";
