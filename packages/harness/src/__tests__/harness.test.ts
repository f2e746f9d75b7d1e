import { CheckFailedError, DoneOrderError } from "@asyncloop/errors";
import { EventLoop } from "@asyncloop/event-loop";
import { CapturingLogger, ManualClock } from "@asyncloop/test-utils";
import { describe, expect, it } from "vitest";
import { createHarness } from "../harness.js";
import { formatGroupHeader, formatResult, formatSummary } from "../reporter.js";
import type { FailedTestResult, TestResult } from "../types.js";
import { makeHarness } from "./helpers.js";

const ordered = [
  { tag: "event 1", orderRank: 1 },
  { tag: "event 2", timeoutMs: 4000, orderRank: 2 },
];

function failures(results: readonly TestResult[]): FailedTestResult[] {
  return results.filter((r): r is FailedTestResult => r.status === "failed");
}

describe("TestHarness", () => {
  describe("passing tests", () => {
    it("should run async and sync tests with beforeEach", async () => {
      const { harness } = makeHarness();
      const seen: string[] = [];

      harness.group("group one", (group) => {
        group.beforeEach = (test) => {
          seen.push(`${test.group}/${test.name}`);
        };
        group.asyncTest("in order", ordered, (loop, test) => {
          loop.jitterPct = 40;
          loop.schedCall(() => {
            test.done("event 1");
            loop.schedCall(() => test.done("event 2"));
          });
        });
        group.syncTest("arithmetic", (test) => {
          test.check(1 + 1 === 2);
        });
      });

      const summary = await harness.run();

      expect(summary.passed).toBe(2);
      expect(summary.failed).toBe(0);
      expect(summary.results.map((r) => [r.name, r.kind, r.status])).toEqual([
        ["in order", "async", "passed"],
        ["arithmetic", "sync", "passed"],
      ]);
      expect(seen).toEqual(["group one/in order", "group one/arithmetic"]);
      expect(harness.numFailed).toBe(0);
    });

    it("should give every async test its own loop", async () => {
      const { harness } = makeHarness();
      const loops: EventLoop[] = [];

      harness.group("loops", (group) => {
        for (const name of ["first", "second"]) {
          group.asyncTest(name, undefined, (loop, test) => {
            loops.push(loop);
            expect(test.loop).toBe(loop);
            loop.schedCall(() => test.done(), 10);
          });
        }
      });

      await harness.run();

      expect(loops).toHaveLength(2);
      expect(loops[0]).not.toBe(loops[1]);
      expect(loops.map((l) => l.state)).toEqual(["success", "success"]);
    });

    it("should pass an aborted test", async () => {
      const { harness } = makeHarness();
      harness.group("abort", (group) => {
        group.asyncTest("stops early", undefined, (loop) => {
          loop.schedCall(() => loop.abort(), 10);
        });
      });

      const summary = await harness.run();

      expect(summary.passed).toBe(1);
    });
  });

  describe("failure classification", () => {
    it("should classify every kind of failure", async () => {
      const { harness } = makeHarness();

      harness.group("failures", (group) => {
        group.asyncTest("swapped", ordered, (loop, test) => {
          loop.schedCall(() => {
            test.done("event 2");
            loop.schedCall(() => test.done("event 1"));
          });
        });
        group.asyncTest("never resolved", [{ tag: "e1", timeoutMs: 50 }], (loop) => {
          loop.schedCall(() => {}, 10);
        });
        group.asyncTest("resolved twice", undefined, (loop, test) => {
          loop.schedCall(() => {
            test.done();
            test.done();
          }, 10);
        });
        group.asyncTest("reported", undefined, (loop, test) => {
          loop.schedCall(() => test.error("bad reply"), 10);
        });
        group.asyncTest("tagged report", [{ tag: "io" }], (loop, test) => {
          loop.schedCall(() => test.error("io", "reset"), 10);
        });
        group.asyncTest("empty", undefined, () => {});
        group.asyncTest("throws", undefined, (loop) => {
          loop.schedCall(() => {
            throw new Error("kaboom");
          }, 10);
        });
        group.asyncTest("checks in a call", undefined, (loop, test) => {
          loop.schedCall(() => test.check(false), 10);
        });
        group.syncTest("checks", (test) => {
          test.check(2 + 2 === 5, "a == 2");
        });
        group.syncTest("bare throw", () => {
          throw new RangeError("nope");
        });
      });

      const summary = await harness.run();

      expect(summary.passed).toBe(0);
      expect(summary.failed).toBe(10);
      expect(failures(summary.results).map((r) => [r.name, r.failureKind, r.message])).toEqual([
        [
          "swapped",
          "ordering",
          "done('event 2'): Did not resolve in expected order. Expected rank: 1, actual rank: 2",
        ],
        ["never resolved", "timeout", "done('e1'): Timeout after 50ms"],
        ["resolved twice", "duplicate", "done('_default'): done() already resolved, can't resolve again"],
        ["reported", "failed", "done('_default'): bad reply"],
        ["tagged report", "failed", "done('io'): reset"],
        [
          "empty",
          "usage",
          "Usage error: Nothing to run: not even a single function call has been scheduled",
        ],
        ["throws", "action", "Scheduled call failed: kaboom"],
        ["checks in a call", "check", "Check failed: condition is false"],
        ["checks", "check", "Check failed: a == 2"],
        ["bare throw", "action", "nope"],
      ]);
      expect(failures(summary.results)[0]?.error).toBeInstanceOf(DoneOrderError);
      expect(failures(summary.results)[8]?.error).toBeInstanceOf(CheckFailedError);
    });

    it("should fail a test whose beforeEach throws", async () => {
      const { harness } = makeHarness();
      const ran: string[] = [];

      harness.group("setup", (group) => {
        group.beforeEach = (test) => {
          test.check(test.name !== "skipped by setup", "setup refused");
        };
        group.syncTest("skipped by setup", () => {
          ran.push("skipped by setup");
        });
        group.syncTest("runs", () => {
          ran.push("runs");
        });
      });

      const summary = await harness.run();

      expect(ran).toEqual(["runs"]);
      expect(failures(summary.results).map((r) => r.message)).toEqual(["Check failed: setup refused"]);
    });

    it("should accumulate failures across runs", async () => {
      const { harness } = makeHarness();
      harness.group("flaky", (group) => {
        group.syncTest("always fails", (test) => {
          test.check(false);
        });
      });

      await harness.run();
      await harness.run();

      expect(harness.numFailed).toBe(2);
    });
  });

  describe("reporting", () => {
    it("should print a header per group, a line per test and a summary", async () => {
      const { harness, lines } = makeHarness();
      harness.group("alpha", (group) => {
        group.syncTest("ok", () => {});
      });
      harness.group("beta", (group) => {
        group.syncTest("bad", (test) => {
          test.check(false);
        });
      });

      const summary = await harness.run();

      const [ok, bad] = summary.results;
      expect(ok).toBeDefined();
      expect(bad).toBeDefined();
      if (ok === undefined || bad === undefined) return;
      expect(lines).toEqual([
        formatGroupHeader("alpha"),
        formatResult(ok),
        formatGroupHeader("beta"),
        formatResult(bad),
        formatSummary(summary),
      ]);
    });

    it("should send loop logs to the harness logger", async () => {
      const { harness, logger } = makeHarness();
      harness.group("logs", (group) => {
        group.asyncTest("resolves", undefined, (loop, test) => {
          loop.schedCall(() => test.done(), 10);
        });
      });

      await harness.run();

      expect(logger.messages("info")).toEqual(["done('_default') -> success"]);
    });

    it("should prefer a logger from the loop defaults", async () => {
      const harnessLogger = new CapturingLogger();
      const loopLogger = new CapturingLogger();
      const harness = createHarness({
        logger: harnessLogger,
        loopDefaults: { clock: new ManualClock(), jitterPct: 0, logger: loopLogger },
        print: () => {},
      });
      harness.group("logs", (group) => {
        group.asyncTest("resolves", undefined, (loop, test) => {
          loop.schedCall(() => test.done(), 10);
        });
      });

      await harness.run();

      expect(loopLogger.messages("info")).toEqual(["done('_default') -> success"]);
      expect(harnessLogger.entries).toEqual([]);
    });
  });
});
