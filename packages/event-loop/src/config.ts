/**
 * Configuration validation and resolution.
 */

import { LoopUsageError } from "@asyncloop/errors";
import { defaultClock } from "./clock.js";
import {
  DEFAULT_DONE_TIMEOUT_MS,
  DEFAULT_JITTER_PCT,
  DEFAULT_LOG_LEVEL,
  LOG_LEVEL_ENV,
} from "./constants.js";
import { createConsoleLogger, parseLogLevel } from "./logger.js";
import type { ResolvedDoneSpec } from "./done-registry.js";
import type {
  DoneOptions,
  DoneSpec,
  EventLoopConfig,
  LogLevel,
  ResolvedEventLoopConfig,
} from "./types.js";
import { doneOptionsSchema, doneSpecSchema, eventLoopConfigSchema, validateOrThrow } from "./validation.js";

/**
 * Log level from the environment, or the package default.
 */
export function resolveLogLevel(configured?: LogLevel): LogLevel {
  return configured ?? parseLogLevel(process.env[LOG_LEVEL_ENV]) ?? DEFAULT_LOG_LEVEL;
}

/**
 * Validates and resolves an {@link EventLoopConfig} into a fully-resolved
 * config with all defaults applied.
 *
 * @throws {LoopUsageError} on invalid input
 */
export function resolveEventLoopConfig(config: EventLoopConfig = {}): ResolvedEventLoopConfig {
  validateOrThrow(
    eventLoopConfigSchema,
    {
      dones: config.dones,
      defaultTimeoutMs: config.defaultTimeoutMs,
      jitterPct: config.jitterPct,
      logLevel: config.logLevel,
    },
    "Invalid event loop configuration",
  );

  if (config.clock !== undefined) {
    if (typeof config.clock.now !== "function" || typeof config.clock.sleep !== "function") {
      throw new LoopUsageError("Invalid event loop configuration: clock needs now() and sleep()");
    }
  }
  if (config.random !== undefined && typeof config.random !== "function") {
    throw new LoopUsageError("Invalid event loop configuration: random must be a function");
  }

  return {
    dones: config.dones,
    defaultTimeoutMs: config.defaultTimeoutMs ?? DEFAULT_DONE_TIMEOUT_MS,
    jitterPct: config.jitterPct ?? DEFAULT_JITTER_PCT,
    clock: config.clock ?? defaultClock,
    random: config.random ?? Math.random,
    logger: config.logger ?? createConsoleLogger(resolveLogLevel(config.logLevel)),
  };
}

/**
 * Validate a typed done spec and apply the loop's default timeout.
 *
 * @throws {LoopUsageError} on an empty tag, bad numbers or unknown keys
 */
export function resolveDoneSpec(spec: DoneSpec, defaultTimeoutMs: number): ResolvedDoneSpec {
  validateOrThrow(doneSpecSchema, spec, `Invalid done() spec for tag '${String(spec.tag)}'`);
  return {
    tag: spec.tag,
    timeoutMs: spec.timeoutMs ?? defaultTimeoutMs,
    orderRank: spec.orderRank ?? 0,
  };
}

/**
 * Convert short `{ timeout | tmo, order }` options into a typed done spec.
 * `timeout` wins over `tmo` when both are set.
 *
 * @throws {LoopUsageError} on unknown option names or bad numbers
 */
export function doneSpecFromOptions(tag: string, options: DoneOptions = {}): DoneSpec {
  validateOrThrow(doneOptionsSchema, options, `Invalid done() options for tag '${tag}'`);
  const timeoutMs = options.timeout ?? options.tmo;
  return {
    tag,
    ...(timeoutMs !== undefined ? { timeoutMs } : {}),
    ...(options.order !== undefined ? { orderRank: options.order } : {}),
  };
}
