/**
 * Construction options shared by the generic base error types.
 */

import type { BaseErrorType, CodesForBase, ErrorCode } from "./catalog.js";

/**
 * Options for constructing a base error type.
 * The code determines domain and isExpected via catalog lookup.
 */
export interface AsyncLoopErrorOptions<C extends ErrorCode> {
  code: C;
  message: string;
  metadata?: Record<string, string> | undefined;
  traceId?: string | undefined;
  cause?: unknown;
}

export type { BaseErrorType, CodesForBase };

export type InternalCodes = CodesForBase<"InternalError">;
