/**
 * OpenTelemetry log correlation.
 *
 * Without a registered SDK the API hands out no-op spans, so these helpers are
 * safe to call from tests and one-shot CLI runs.
 */

import { trace, context as otelContext, SpanStatusCode } from '@opentelemetry/api';
import type { Span } from '@opentelemetry/api';

const TRACER_NAME = 'type-stats';

export type TraceContext = Readonly<{
  traceId: string | undefined;
  spanId: string | undefined;
  traceFlags: number | undefined;
}>;

export type SpanAttributes = Record<string, string | number | boolean>;

/**
 * Get current trace context from active span
 */
export function getTraceContext(): TraceContext {
  const spanContext = trace.getActiveSpan()?.spanContext();

  if (!spanContext) {
    return { traceId: undefined, spanId: undefined, traceFlags: undefined };
  }

  return {
    traceId: spanContext.traceId,
    spanId: spanContext.spanId,
    traceFlags: spanContext.traceFlags,
  };
}

/**
 * Run a function within a new span context (async version)
 */
export async function withSpan<T>(
  name: string,
  attributes: SpanAttributes,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const span = trace.getTracer(TRACER_NAME).startSpan(name, { attributes });

  try {
    const result = await otelContext.with(trace.setSpan(otelContext.active(), span), () =>
      fn(span)
    );
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (error) {
    span.setStatus({
      code: SpanStatusCode.ERROR,
      message: error instanceof Error ? error.message : 'Unknown error',
    });
    if (error instanceof Error) span.recordException(error);
    throw error;
  } finally {
    span.end();
  }
}

export function setSpanAttributes(span: Span, attributes: SpanAttributes): void {
  for (const [key, value] of Object.entries(attributes)) {
    span.setAttribute(key, value);
  }
}
