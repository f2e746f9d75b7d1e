import { AsyncLoopError } from "../base.js";
import { type CodesForBase, ERROR_CATALOG, type ErrorDomain } from "../catalog.js";
import type { AsyncLoopErrorOptions } from "../types.js";

type InternalCode = CodesForBase<"InternalError">;

/**
 * Errors caused by bugs rather than by the code under test.
 * The `.code` field discriminates the specific error.
 */
export class InternalError<C extends InternalCode = "INTERNAL_ERROR"> extends AsyncLoopError {
  readonly _tag = "InternalError" as const;
  override readonly code: C;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(options: AsyncLoopErrorOptions<C>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | AsyncLoopErrorOptions<C>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    if (typeof messageOrOptions === "string") {
      super(messageOrOptions, metadata, traceId);
      // The single-string form always carries the default code
      const code = "INTERNAL_ERROR" as C;
      const entry = ERROR_CATALOG[code];
      this.code = code;
      this.domain = entry.domain;
      this.isExpected = entry.isExpected;
    } else {
      const opts = messageOrOptions;
      super(
        opts.message,
        opts.metadata,
        opts.traceId,
        opts.cause !== undefined ? { cause: opts.cause } : undefined,
      );
      const entry = ERROR_CATALOG[opts.code];
      this.code = opts.code;
      this.domain = entry.domain;
      this.isExpected = entry.isExpected;
    }
  }
}
