import { LoopUsageError } from "@asyncloop/errors";
import { ManualClock } from "@asyncloop/test-utils";
import { afterEach, describe, expect, it, vi } from "vitest";
import { defaultClock } from "../../clock.js";
import {
  doneSpecFromOptions,
  resolveDoneSpec,
  resolveEventLoopConfig,
  resolveLogLevel,
} from "../../config.js";
import { LOG_LEVEL_ENV } from "../../constants.js";

describe("resolveEventLoopConfig", () => {
  it("should apply defaults", () => {
    const resolved = resolveEventLoopConfig();

    expect(resolved.dones).toBeUndefined();
    expect(resolved.defaultTimeoutMs).toBe(2000);
    expect(resolved.jitterPct).toBe(50);
    expect(resolved.clock).toBe(defaultClock);
    expect(resolved.random).toBe(Math.random);
  });

  it("should keep provided values", () => {
    const clock = new ManualClock();
    const random = () => 0.25;
    const resolved = resolveEventLoopConfig({
      dones: [{ tag: "a" }],
      defaultTimeoutMs: 300,
      jitterPct: 0,
      clock,
      random,
    });

    expect(resolved.dones).toEqual([{ tag: "a" }]);
    expect(resolved.defaultTimeoutMs).toBe(300);
    expect(resolved.jitterPct).toBe(0);
    expect(resolved.clock).toBe(clock);
    expect(resolved.random).toBe(random);
  });

  it("should reject jitter outside 0-100", () => {
    try {
      resolveEventLoopConfig({ jitterPct: 150 });
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(LoopUsageError);
      if (error instanceof LoopUsageError) {
        expect(error.issues).toEqual(["jitterPct: jitterPct must be between 0 and 100"]);
        expect(error.message).toBe(
          "Usage error: Invalid event loop configuration: jitterPct: jitterPct must be between 0 and 100",
        );
      }
    }
  });

  it("should reject fractional jitter", () => {
    expect(() => resolveEventLoopConfig({ jitterPct: 2.5 })).toThrow(
      "jitterPct: jitterPct must be an integer",
    );
  });

  it("should reject a negative default timeout", () => {
    expect(() => resolveEventLoopConfig({ defaultTimeoutMs: -5 })).toThrow(
      "defaultTimeoutMs: timeout must be a non-negative number of ms",
    );
  });

  it("should accept a zero timeout", () => {
    expect(resolveEventLoopConfig({ defaultTimeoutMs: 0 }).defaultTimeoutMs).toBe(0);
  });

  it("should report the path of a bad done spec", () => {
    expect(() => resolveEventLoopConfig({ dones: [{ tag: "" }] })).toThrow(
      "dones.0.tag: tag must not be empty",
    );
  });

  it("should list every issue", () => {
    try {
      resolveEventLoopConfig({ jitterPct: -1, defaultTimeoutMs: -5 });
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(LoopUsageError);
      if (error instanceof LoopUsageError) {
        expect(error.issues).toHaveLength(2);
      }
    }
  });
});

describe("resolveDoneSpec", () => {
  it("should fill in the default timeout and unordered rank", () => {
    expect(resolveDoneSpec({ tag: "a" }, 700)).toEqual({ tag: "a", timeoutMs: 700, orderRank: 0 });
  });

  it("should keep explicit values", () => {
    expect(resolveDoneSpec({ tag: "a", timeoutMs: 5, orderRank: 2 }, 700)).toEqual({
      tag: "a",
      timeoutMs: 5,
      orderRank: 2,
    });
  });

  it("should reject unknown keys", () => {
    const spec = { tag: "a", order: 1 };
    expect(() => resolveDoneSpec(spec, 700)).toThrow(
      "Usage error: Invalid done() spec for tag 'a': Unrecognized key(s) in object: 'order'",
    );
  });

  it("should reject a negative rank", () => {
    expect(() => resolveDoneSpec({ tag: "a", orderRank: -1 }, 700)).toThrow(
      "orderRank: order must be >= 0 (0 means unordered)",
    );
  });
});

describe("doneSpecFromOptions", () => {
  it("should map short option names", () => {
    expect(doneSpecFromOptions("a", { timeout: 10, order: 2 })).toEqual({
      tag: "a",
      timeoutMs: 10,
      orderRank: 2,
    });
  });

  it("should accept tmo as an alias of timeout", () => {
    expect(doneSpecFromOptions("a", { tmo: 30 })).toEqual({ tag: "a", timeoutMs: 30 });
  });

  it("should prefer timeout over tmo", () => {
    expect(doneSpecFromOptions("a", { timeout: 10, tmo: 99 })).toEqual({ tag: "a", timeoutMs: 10 });
  });

  it("should leave everything to defaults without options", () => {
    expect(doneSpecFromOptions("a")).toEqual({ tag: "a" });
  });

  it("should reject unknown option names", () => {
    const options = { timeout: 10, deadline: 20 };
    expect(() => doneSpecFromOptions("a", options)).toThrow(
      "Usage error: Invalid done() options for tag 'a': Unrecognized key(s) in object: 'deadline'",
    );
  });
});

describe("resolveLogLevel", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should default to warn", () => {
    vi.stubEnv(LOG_LEVEL_ENV, "");
    expect(resolveLogLevel()).toBe("warn");
  });

  it("should read the environment", () => {
    vi.stubEnv(LOG_LEVEL_ENV, " Debug ");
    expect(resolveLogLevel()).toBe("debug");
  });

  it("should ignore unrecognised environment values", () => {
    vi.stubEnv(LOG_LEVEL_ENV, "verbose");
    expect(resolveLogLevel()).toBe("warn");
  });

  it("should prefer the configured level", () => {
    vi.stubEnv(LOG_LEVEL_ENV, "debug");
    expect(resolveLogLevel("error")).toBe("error");
  });
});
