/**
 * @asyncloop/harness type definitions
 */

import type { FailureKind } from "@asyncloop/errors";
import type { DoneSpec, EventLoop, EventLoopConfig, LoopLogger } from "@asyncloop/event-loop";

export type TestKind = "async" | "sync";

// ============================================================================
// TEST CONTEXT
// ============================================================================

/** Handed to every test body and to `beforeEach` */
export interface TestContext {
  readonly group: string;
  readonly name: string;
  /**
   * Bail out of the test when `condition` is falsy.
   * @throws {CheckFailedError}
   */
  check(condition: unknown, message?: string): void;
}

/** Context of an `asyncTest`: resolution calls go to the test's loop */
export interface AsyncTestContext extends TestContext {
  readonly loop: EventLoop;
  done(tag?: string): void;
  error(message: string): void;
  error(tag: string, message: string): void;
}

export type BeforeEachHook = (test: TestContext) => void | Promise<void>;

/** Registers done items and schedules calls; the harness runs the loop afterwards */
export type AsyncTestBody = (loop: EventLoop, test: AsyncTestContext) => void | Promise<void>;

export type SyncTestBody = (test: TestContext) => void;

// ============================================================================
// REGISTRATION
// ============================================================================

export interface TestGroup {
  readonly name: string;
  /** Runs before every test of the group */
  beforeEach: BeforeEachHook | undefined;
  asyncTest(name: string, dones: readonly DoneSpec[] | undefined, body: AsyncTestBody): void;
  syncTest(name: string, body: SyncTestBody): void;
}

// ============================================================================
// RESULTS
// ============================================================================

interface TestResultBase {
  readonly group: string;
  readonly name: string;
  readonly kind: TestKind;
  readonly durationMs: number;
}

export interface PassedTestResult extends TestResultBase {
  readonly status: "passed";
}

export interface FailedTestResult extends TestResultBase {
  readonly status: "failed";
  readonly failureKind: FailureKind;
  readonly message: string;
  readonly error: unknown;
}

export type TestResult = PassedTestResult | FailedTestResult;

export interface HarnessSummary {
  readonly passed: number;
  readonly failed: number;
  readonly results: readonly TestResult[];
}

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface HarnessOptions {
  /** Log sink for every test loop, unless `loopDefaults.logger` is set */
  readonly logger?: LoopLogger;
  /** Applied to every loop an `asyncTest` builds */
  readonly loopDefaults?: Omit<EventLoopConfig, "dones">;
  /** Report line sink (default: console.log) */
  readonly print?: (line: string) => void;
}
