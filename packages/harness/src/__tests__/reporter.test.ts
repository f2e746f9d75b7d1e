import pc from "picocolors";
import { describe, expect, it } from "vitest";
import { formatGroupHeader, formatResult, formatSummary } from "../reporter.js";
import type { FailedTestResult, PassedTestResult } from "../types.js";

const passed: PassedTestResult = {
  group: "g",
  name: "works",
  kind: "sync",
  status: "passed",
  durationMs: 5,
};

const failed: FailedTestResult = {
  group: "g",
  name: "times out",
  kind: "async",
  status: "failed",
  durationMs: 50,
  failureKind: "timeout",
  message: "done('e1'): Timeout after 50ms",
  error: undefined,
};

describe("reporter", () => {
  it("should format a group header", () => {
    expect(formatGroupHeader("group one")).toBe(pc.bold("group one"));
  });

  it("should format a passed test with its duration", () => {
    expect(formatResult(passed)).toBe(`${pc.green("PASS")} ${pc.blue("g")} > works ${pc.dim("(5ms)")}`);
  });

  it("should format a failed test with its kind and message", () => {
    expect(formatResult(failed)).toBe(
      `${pc.red("FAIL")} ${pc.blue("g")} > times out ${pc.red("[timeout] done('e1'): Timeout after 50ms")}`,
    );
  });

  it("should summarise counts", () => {
    expect(formatSummary({ passed: 1, failed: 1, results: [passed, failed] })).toBe(
      `${pc.bold("Tests:")} ${pc.green("1 passed")}, ${pc.red("1 failed")}, 2 total`,
    );
  });

  it("should not color a zero failure count", () => {
    expect(formatSummary({ passed: 1, failed: 0, results: [passed] })).toBe(
      `${pc.bold("Tests:")} ${pc.green("1 passed")}, 0 failed, 1 total`,
    );
  });
});
