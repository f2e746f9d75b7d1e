import { classifyFailure, getErrorMessage } from "@asyncloop/errors";
import { type DoneSpec, EventLoop, type EventLoopConfig } from "@asyncloop/event-loop";
import { LoopTestContext, SyncTestContext } from "./context.js";
import { formatGroupHeader, formatResult, formatSummary } from "./reporter.js";
import type {
  AsyncTestBody,
  BeforeEachHook,
  HarnessOptions,
  HarnessSummary,
  SyncTestBody,
  TestGroup,
  TestResult,
} from "./types.js";

type RegisteredTest =
  | {
      readonly kind: "async";
      readonly name: string;
      readonly dones: readonly DoneSpec[] | undefined;
      readonly body: AsyncTestBody;
    }
  | { readonly kind: "sync"; readonly name: string; readonly body: SyncTestBody };

class Group implements TestGroup {
  beforeEach: BeforeEachHook | undefined = undefined;
  readonly tests: RegisteredTest[] = [];

  constructor(readonly name: string) {}

  asyncTest(name: string, dones: readonly DoneSpec[] | undefined, body: AsyncTestBody): void {
    this.tests.push({ kind: "async", name, dones, body });
  }

  syncTest(name: string, body: SyncTestBody): void {
    this.tests.push({ kind: "sync", name, body });
  }
}

/**
 * TestHarness: registers groups of loop-driven tests and runs them.
 *
 * Groups run in registration order, tests one at a time. Every `asyncTest`
 * gets a fresh EventLoop: `beforeEach`, then the body, then `loop.run()`.
 * Whatever a test throws is classified and reported; it never escapes `run()`.
 */
export class TestHarness {
  private readonly groups: Group[] = [];
  private readonly loopDefaults: Omit<EventLoopConfig, "dones">;
  private readonly print: (line: string) => void;
  private _numFailed = 0;

  constructor(options: HarnessOptions = {}) {
    const logger = options.loopDefaults?.logger ?? options.logger;
    this.loopDefaults = {
      ...options.loopDefaults,
      ...(logger !== undefined ? { logger } : {}),
    };
    this.print = options.print ?? ((line) => console.log(line));
  }

  /** Failed tests across every run of this harness; usable as an exit code */
  get numFailed(): number {
    return this._numFailed;
  }

  group(name: string, register: (group: TestGroup) => void): void {
    const group = new Group(name);
    register(group);
    this.groups.push(group);
  }

  async run(): Promise<HarnessSummary> {
    const results: TestResult[] = [];
    for (const group of this.groups) {
      this.print(formatGroupHeader(group.name));
      for (const test of group.tests) {
        const result = await this.runTest(group, test);
        results.push(result);
        this.print(formatResult(result));
      }
    }

    const failed = results.filter((r) => r.status === "failed").length;
    this._numFailed += failed;
    const summary: HarnessSummary = { passed: results.length - failed, failed, results };
    this.print(formatSummary(summary));
    return summary;
  }

  private async runTest(group: Group, test: RegisteredTest): Promise<TestResult> {
    const base = { group: group.name, name: test.name, kind: test.kind };
    const startedAt = Date.now();
    try {
      if (test.kind === "sync") {
        const context = new SyncTestContext(group.name, test.name);
        await group.beforeEach?.(context);
        test.body(context);
      } else {
        const loop = new EventLoop({
          ...this.loopDefaults,
          ...(test.dones !== undefined ? { dones: test.dones } : {}),
        });
        const context = new LoopTestContext(group.name, test.name, loop);
        await group.beforeEach?.(context);
        await test.body(loop, context);
        await loop.run();
      }
      return { ...base, status: "passed", durationMs: Date.now() - startedAt };
    } catch (error) {
      return {
        ...base,
        status: "failed",
        durationMs: Date.now() - startedAt,
        failureKind: classifyFailure(error),
        message: getErrorMessage(error),
        error,
      };
    }
  }
}

export function createHarness(options: HarnessOptions = {}): TestHarness {
  return new TestHarness(options);
}
