/**
 * @asyncloop/harness
 *
 * Test registration sugar over the event loop: groups with `beforeEach`,
 * `asyncTest` / `syncTest`, `check`, colored reporting and a failure count.
 */

export const PACKAGE_NAME = "@asyncloop/harness" as const;

export { LoopTestContext, SyncTestContext } from "./context.js";
export { createHarness, TestHarness } from "./harness.js";
export { formatGroupHeader, formatResult, formatSummary } from "./reporter.js";
export type {
  AsyncTestBody,
  AsyncTestContext,
  BeforeEachHook,
  FailedTestResult,
  HarnessOptions,
  HarnessSummary,
  PassedTestResult,
  SyncTestBody,
  TestContext,
  TestGroup,
  TestKind,
  TestResult,
} from "./types.js";
