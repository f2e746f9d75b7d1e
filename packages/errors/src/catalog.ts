/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the asyncloop packages is declared here.
 * Each code maps to a behavioral base type, a domain and an
 * `isExpected` flag (expected = a failing test, unexpected = a bug).
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: loop, done, harness, internal
 */

/**
 * Behavioral base types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "ConflictError"
  | "TimeoutError"
  | "ExternalError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // LOOP ERRORS - Event loop usage and execution
  // ============================================================================
  LOOP_USAGE_INVALID: {
    domain: "loop",
    baseType: "ValidationError" as const,
    isExpected: false,
    title: "Event loop misuse",
    description:
      "The event loop was used incorrectly (unknown or duplicate tag, bad option, nothing scheduled)",
  },
  LOOP_INTERNAL: {
    domain: "loop",
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Event loop internal error",
    description: "An event loop invariant was violated",
  },
  LOOP_ACTION_FAILED: {
    domain: "loop",
    baseType: "ExternalError" as const,
    isExpected: true,
    title: "Scheduled action failed",
    description: "A scheduled call threw an error that did not come from the event loop",
  },

  // ============================================================================
  // DONE ERRORS - Done item resolution
  // ============================================================================
  DONE_ALREADY_RESOLVED: {
    domain: "done",
    baseType: "ConflictError" as const,
    isExpected: true,
    title: "Done item already resolved",
    description: "A done item may be resolved at most once",
  },
  DONE_OUT_OF_ORDER: {
    domain: "done",
    baseType: "ConflictError" as const,
    isExpected: true,
    title: "Done item resolved out of order",
    description: "A ranked done item was resolved before the items ranked below it",
  },
  DONE_FAILED: {
    domain: "done",
    baseType: "ConflictError" as const,
    isExpected: true,
    title: "Done item failed",
    description: "Test code reported an error for a done item",
  },
  DONE_TIMEOUT: {
    domain: "done",
    baseType: "TimeoutError" as const,
    isExpected: true,
    title: "Done item timed out",
    description: "A done item was not resolved before its deadline",
  },

  // ============================================================================
  // HARNESS ERRORS - Test registration sugar
  // ============================================================================
  HARNESS_CHECK_FAILED: {
    domain: "harness",
    baseType: "ConflictError" as const,
    isExpected: true,
    title: "Check failed",
    description: "A check() condition inside a test evaluated to false",
  },
} as const;

export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * A single catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * Codes whose catalog entry maps to the given base type
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
