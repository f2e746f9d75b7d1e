/**
 * Zod schemas for configuration and options validation.
 *
 * Clock, random and logger are validated structurally, not via Zod.
 */

import { LoopUsageError } from "@asyncloop/errors";
import { type ZodError, z } from "zod";

const timeoutMsSchema = z
  .number()
  .int({ message: "timeout must be an integer number of ms" })
  .nonnegative({ message: "timeout must be a non-negative number of ms" });

const orderRankSchema = z
  .number()
  .int({ message: "order must be an integer" })
  .min(0, { message: "order must be >= 0 (0 means unordered)" });

export const jitterPctSchema = z
  .number()
  .int({ message: "jitterPct must be an integer" })
  .min(0, { message: "jitterPct must be between 0 and 100" })
  .max(100, { message: "jitterPct must be between 0 and 100" });

export const delayMsSchema = z.number().int({ message: "delay must be an integer number of ms" });

export const doneSpecSchema = z
  .object({
    tag: z.string().min(1, { message: "tag must not be empty" }),
    timeoutMs: timeoutMsSchema.optional(),
    orderRank: orderRankSchema.optional(),
  })
  .strict();

export const doneOptionsSchema = z
  .object({
    timeout: timeoutMsSchema.optional(),
    tmo: timeoutMsSchema.optional(),
    order: orderRankSchema.optional(),
  })
  .strict();

export const eventLoopConfigSchema = z.object({
  dones: z.array(doneSpecSchema).optional(),
  defaultTimeoutMs: timeoutMsSchema.optional(),
  jitterPct: jitterPctSchema.optional(),
  logLevel: z.enum(["silent", "error", "warn", "info", "debug"]).optional(),
});

/** Flatten Zod issues into `path: message` lines */
export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Run a schema and convert a failure into a LoopUsageError.
 *
 * @throws {LoopUsageError} listing every issue
 */
export function validateOrThrow(schema: z.ZodTypeAny, value: unknown, context: string): void {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new LoopUsageError(`${context}: ${issues.join("; ")}`, issues);
  }
}
