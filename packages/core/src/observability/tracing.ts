import { trace, type Span, SpanStatusCode } from '@opentelemetry/api';

const TRACER_NAME = 'ignis';

export function getTracer() {
  return trace.getTracer(TRACER_NAME);
}

export function startSpan(name: string, attributes?: Record<string, string | number>): Span {
  const span = getTracer().startSpan(name);
  if (attributes) {
    span.setAttributes(attributes);
  }
  return span;
}

export function endSpan(span: Span, error?: unknown): void {
  if (error instanceof Error) {
    span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
    span.recordException(error);
  } else if (error !== undefined) {
    span.setStatus({ code: SpanStatusCode.ERROR, message: String(error) });
  } else {
    span.setStatus({ code: SpanStatusCode.OK });
  }
  span.end();
}

/**
 * Run `fn` inside a span, closing it with the outcome. Synchronous only;
 * the engine never awaits while it holds a span.
 */
export function withSpan<T>(
  name: string,
  attributes: Record<string, string | number>,
  fn: (span: Span) => T,
): T {
  const span = startSpan(name, attributes);
  try {
    const result = fn(span);
    endSpan(span);
    return result;
  } catch (error) {
    endSpan(span, error);
    throw error;
  }
}

export { SpanStatusCode } from '@opentelemetry/api';
