/**
 * OpenTelemetry instrumentation for loop runs.
 *
 * Spans and instruments come from the global providers; when none is
 * registered they are no-ops. Instruments are created lazily on first use.
 */

import {
  type Attributes,
  type Counter,
  type Histogram,
  metrics,
  type Span,
  SpanStatusCode,
  trace,
} from "@opentelemetry/api";
import type { CompletionState } from "./types.js";

const TRACER_NAME = "asyncloop";
const METER_NAME = "asyncloop.event-loop";

let _completions: Counter | undefined;
let _duration: Histogram | undefined;

/**
 * Execute an async function within a named span.
 *
 * - Sets provided attributes on the span; `fn` may add more
 * - Records exceptions and sets ERROR status on failure
 * - Always ends the span (even on error)
 *
 * @throws Re-throws any error from fn after recording it on the span
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, async (span) => {
    try {
      span.setAttributes(attributes);
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Counter of finished loop runs, by final state.
 */
export function getLoopCompletions(): Counter {
  if (_completions === undefined) {
    _completions = metrics.getMeter(METER_NAME).createCounter("asyncloop.loop.completions", {
      description: "Event loop runs by final completion state",
    });
  }
  return _completions;
}

/**
 * Histogram of loop run durations in milliseconds.
 */
export function getLoopDuration(): Histogram {
  if (_duration === undefined) {
    _duration = metrics.getMeter(METER_NAME).createHistogram("asyncloop.loop.duration_ms", {
      description: "Event loop run duration in milliseconds",
      unit: "ms",
    });
  }
  return _duration;
}

export function recordLoopCompletion(state: CompletionState, durationMs: number): void {
  getLoopCompletions().add(1, { state });
  getLoopDuration().record(durationMs, { state });
}
