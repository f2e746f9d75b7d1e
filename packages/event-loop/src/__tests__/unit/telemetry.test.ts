import { DoneTimeoutError } from "@asyncloop/errors";
import { ManualClock } from "@asyncloop/test-utils";
import { SpanStatusCode, trace } from "@opentelemetry/api";
import { InMemorySpanExporter, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-base";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EventLoop } from "../../event-loop.js";
import { silentLogger } from "../../logger.js";
import { recordLoopCompletion, withSpan } from "../../telemetry.js";

describe("telemetry", () => {
  let exporter: InMemorySpanExporter;
  let provider: NodeTracerProvider;

  beforeEach(() => {
    exporter = new InMemorySpanExporter();
    provider = new NodeTracerProvider();
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
    trace.disable();
    provider.register();
  });

  afterEach(async () => {
    trace.disable();
    exporter.reset();
    await provider.shutdown();
  });

  it("should end a span with OK status and the given attributes", async () => {
    const value = await withSpan("unit.op", { "unit.key": "v" }, async (span) => {
      span.setAttribute("unit.extra", 1);
      return 42;
    });

    expect(value).toBe(42);
    const spans = exporter.getFinishedSpans();
    expect(spans).toHaveLength(1);
    expect(spans[0]?.name).toBe("unit.op");
    expect(spans[0]?.attributes).toEqual({ "unit.key": "v", "unit.extra": 1 });
    expect(spans[0]?.status.code).toBe(SpanStatusCode.OK);
  });

  it("should record the error and rethrow", async () => {
    await expect(
      withSpan("unit.fail", {}, async () => {
        throw new Error("exploded");
      }),
    ).rejects.toThrow("exploded");

    const span = exporter.getFinishedSpans()[0];
    expect(span?.status).toEqual({ code: SpanStatusCode.ERROR, message: "exploded" });
    expect(span?.events.map((e) => e.name)).toEqual(["exception"]);
  });

  it("should trace a successful loop run", async () => {
    const clock = new ManualClock();
    const loop = new EventLoop({ clock, logger: silentLogger, jitterPct: 0 });
    loop.schedCall(() => loop.done(), 10);

    await loop.run();

    const span = exporter.getFinishedSpans()[0];
    expect(span?.name).toBe("asyncloop.loop.run");
    expect(span?.attributes).toEqual({
      "asyncloop.done_count": 1,
      "asyncloop.call_count": 1,
      "asyncloop.state": "success",
    });
    expect(span?.status.code).toBe(SpanStatusCode.OK);
  });

  it("should trace a failing loop run", async () => {
    const clock = new ManualClock();
    const loop = new EventLoop({
      clock,
      logger: silentLogger,
      jitterPct: 0,
      dones: [{ tag: "e1", timeoutMs: 20 }],
    });
    loop.schedCall(() => {}, 10);

    await expect(loop.run()).rejects.toBeInstanceOf(DoneTimeoutError);

    const span = exporter.getFinishedSpans()[0];
    expect(span?.attributes["asyncloop.state"]).toBe("error");
    expect(span?.status).toEqual({
      code: SpanStatusCode.ERROR,
      message: "done('e1'): Timeout after 20ms",
    });
  });

  it("should record completions without a meter provider", () => {
    expect(() => recordLoopCompletion("success", 12)).not.toThrow();
  });
});
