import { Span, SpanStatusCode, trace } from '@opentelemetry/api';

export const TRACER_NAME = 'utility-tools';

type SpanAttributes = Record<string, string | number | boolean>;

/**
 * Execute a function within a new span.
 * Automatically handles errors and sets span status.
 */
export async function withSpan<T>(
  spanName: string,
  attributes: SpanAttributes,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(spanName, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      span.recordException(error instanceof Error ? error : String(error));
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Add an event to the current span (if one exists).
 */
export function addSpanEvent(name: string, attributes?: SpanAttributes): void {
  const span = trace.getActiveSpan();
  if (span) {
    span.addEvent(name, attributes);
  }
}

/**
 * Set attributes on the current span.
 */
export function setSpanAttributes(attributes: SpanAttributes): void {
  const span = trace.getActiveSpan();
  if (span) {
    span.setAttributes(attributes);
  }
}
