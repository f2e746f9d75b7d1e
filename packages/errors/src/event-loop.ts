/**
 * Event loop errors
 *
 * Usage:
 *   - LoopUsageError (LOOP_USAGE_INVALID)
 *
 * Abstract base: DoneResolutionError
 * Concrete:
 *   - DoneAlreadyResolvedError (DONE_ALREADY_RESOLVED)
 *   - DoneOrderError (DONE_OUT_OF_ORDER)
 *   - DoneFailedError (DONE_FAILED)
 *   - DoneTimeoutError (DONE_TIMEOUT)
 *   - LoopInternalError (LOOP_INTERNAL)
 *
 * Wrapper:
 *   - LoopActionError (LOOP_ACTION_FAILED)
 */

import { AsyncLoopError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain } from "./catalog.js";

/**
 * Composes the message recorded for a failed done item.
 * Untagged failures keep the bare message.
 */
export function composeDoneMessage(tag: string | undefined, message: string): string {
  return tag === undefined ? message : `done('${tag}'): ${message}`;
}

// ---------------------------------------------------------------------------
// Usage
// ---------------------------------------------------------------------------

/**
 * Thrown on programmer misuse of the loop: unknown or duplicate tags,
 * invalid options, running with nothing scheduled.
 *
 * Never retried; fatal to the current test.
 */
export class LoopUsageError extends AsyncLoopError {
  readonly _tag = "ValidationError" as const;
  readonly code = "LOOP_USAGE_INVALID" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  /** Individual problems, when the error aggregates several (e.g. config validation) */
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(`Usage error: ${message}`);
    const entry = ERROR_CATALOG.LOOP_USAGE_INVALID;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Abstract base for errors raised while resolving done items.
 *
 * `tag` is the done item that failed, or undefined for an untagged error.
 * The message is already composed as `done('<tag>'): <detail>`.
 */
export abstract class DoneResolutionError extends AsyncLoopError {
  readonly tag: string | undefined;
  readonly detail: string;

  constructor(tag: string | undefined, detail: string, options?: { cause?: unknown }) {
    super(
      composeDoneMessage(tag, detail),
      tag === undefined ? undefined : { tag },
      undefined,
      options,
    );
    this.tag = tag;
    this.detail = detail;
  }
}

export class DoneAlreadyResolvedError extends DoneResolutionError {
  readonly _tag = "ConflictError" as const;
  readonly code = "DONE_ALREADY_RESOLVED" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(tag: string) {
    super(tag, "done() already resolved, can't resolve again");
    const entry = ERROR_CATALOG.DONE_ALREADY_RESOLVED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}

export class DoneOrderError extends DoneResolutionError {
  readonly _tag = "ConflictError" as const;
  readonly code = "DONE_OUT_OF_ORDER" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly expectedRank: number;
  readonly actualRank: number;

  constructor(tag: string, expectedRank: number, actualRank: number) {
    super(
      tag,
      `Did not resolve in expected order. Expected rank: ${expectedRank}, actual rank: ${actualRank}`,
    );
    const entry = ERROR_CATALOG.DONE_OUT_OF_ORDER;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.expectedRank = expectedRank;
    this.actualRank = actualRank;
  }
}

/**
 * Recorded when test code calls `error()` on the loop.
 */
export class DoneFailedError extends DoneResolutionError {
  readonly _tag = "ConflictError" as const;
  readonly code = "DONE_FAILED" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(tag: string | undefined, message: string) {
    super(tag, message);
    const entry = ERROR_CATALOG.DONE_FAILED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}

/**
 * Raised by a done item's own guard when its deadline passes unresolved.
 */
export class DoneTimeoutError extends DoneResolutionError {
  readonly _tag = "TimeoutError" as const;
  readonly code = "DONE_TIMEOUT" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly timeoutMs: number;

  constructor(tag: string, timeoutMs: number) {
    super(tag, `Timeout after ${timeoutMs}ms`);
    const entry = ERROR_CATALOG.DONE_TIMEOUT;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * An engine invariant was violated (e.g. a guard fired for a tag that is no
 * longer registered). Recorded like any other resolution failure.
 */
export class LoopInternalError extends DoneResolutionError {
  readonly _tag = "InternalError" as const;
  readonly code = "LOOP_INTERNAL" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(tag: string | undefined, message: string) {
    super(tag, `Internal error: ${message}`);
    const entry = ERROR_CATALOG.LOOP_INTERNAL;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}

// ---------------------------------------------------------------------------
// Action failures
// ---------------------------------------------------------------------------

/**
 * Wraps an error thrown by a scheduled action that did not originate in the
 * loop itself (an assertion, a bug in the code under test).
 */
export class LoopActionError extends AsyncLoopError {
  readonly _tag = "ExternalError" as const;
  readonly code = "LOOP_ACTION_FAILED" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(cause: unknown) {
    super(
      `Scheduled call failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      undefined,
      undefined,
      { cause },
    );
    const entry = ERROR_CATALOG.LOOP_ACTION_FAILED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
