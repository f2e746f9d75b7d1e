/**
 * Harness errors (test registration sugar)
 *
 * Concrete:
 *   - CheckFailedError (HARNESS_CHECK_FAILED)
 */

import { AsyncLoopError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain } from "./catalog.js";

/**
 * Thrown by `check()` to bail out of a test body.
 */
export class CheckFailedError extends AsyncLoopError {
  readonly _tag = "ConflictError" as const;
  readonly code = "HARNESS_CHECK_FAILED" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(message: string) {
    super(`Check failed: ${message}`);
    const entry = ERROR_CATALOG.HARNESS_CHECK_FAILED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
