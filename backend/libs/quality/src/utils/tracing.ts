// utils/tracing.ts
// OpenTelemetry helpers. Spans are no-ops until an SDK registers a provider.

import { context, trace, SpanStatusCode, type Attributes, type Span, type Tracer } from "@opentelemetry/api";

const TRACER_NAME = "data-quality";

let tracer: Tracer | null = null;

/** Call once at bootstrap to name the service's tracer. */
export function initTracer(serviceName: string): Tracer {
  tracer = trace.getTracer(serviceName);
  return tracer;
}

export function getTracer(): Tracer {
  if (!tracer) tracer = trace.getTracer(TRACER_NAME);
  return tracer;
}

/**
 * Run `fn` inside a new active span. The span is marked OK or ERROR from the
 * outcome, and the error is rethrown.
 */
export function startSpan<T>(name: string, fn: (span: Span) => Promise<T> | T, attrs?: Attributes): Promise<T> {
  const span = getTracer().startSpan(name, { attributes: attrs });
  return context.with(trace.setSpan(context.active(), span), async () => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      if (err instanceof Error) span.recordException(err);
      throw err;
    } finally {
      span.end();
    }
  });
}
