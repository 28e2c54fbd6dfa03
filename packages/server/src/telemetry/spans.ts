/**
 * Span helpers for engine operations.
 *
 * Without a started SDK the global tracer is a no-op, so these helpers cost
 * nothing in tests.
 */

import { trace, SpanStatusCode, type Span } from "@opentelemetry/api";
import { TELEMETRY_CONFIG } from "../config/telemetry.js";
import type { RequestContext } from "../engine/types.js";
import { getErrorCode, getErrorMessage } from "../utils/errors.js";

const tracer = trace.getTracer(TELEMETRY_CONFIG.serviceName);

/** Spans already marked failed through recordError */
const spanFailed = new WeakSet<Span>();

export type SpanAttributes = Record<string, string | number | boolean>;

/**
 * Span attributes identifying the caller of an operation.
 */
export function contextAttributes(ctx: RequestContext): SpanAttributes {
  return {
    "site.project_id": ctx.projectId,
    "site.actor_id": ctx.actorId,
  };
}

/**
 * Run a synchronous function inside a span. A throw marks the span failed and
 * is rethrown; the function may also mark it through `recordError` and return.
 *
 * @example
 * ```ts
 * const totals = withSpanSync("engine.dailyTotals", () => stats.dailyTotals(ctx, date), contextAttributes(ctx));
 * ```
 */
export function withSpanSync<T>(name: string, fn: (span: Span) => T, attributes: SpanAttributes = {}): T {
  const span = tracer.startSpan(name, { attributes });
  let failed = false;

  try {
    return fn(span);
  } catch (error) {
    failed = true;
    recordError(span, error);
    throw error;
  } finally {
    if (!failed && !spanFailed.has(span)) {
      span.setStatus({ code: SpanStatusCode.OK });
    }
    spanFailed.delete(span);
    span.end();
  }
}

/**
 * Mark a span failed, with the error's name, message and code.
 */
export function recordError(span: Span, error: unknown): void {
  const message = getErrorMessage(error);
  spanFailed.add(span);
  span.setStatus({ code: SpanStatusCode.ERROR, message });

  if (error instanceof Error) {
    span.recordException(error);
    span.setAttribute("error.type", error.name);
  }
  span.setAttribute("error.message", message);

  const code = getErrorCode(error);
  if (code) {
    span.setAttribute("error.code", code);
  }
}
