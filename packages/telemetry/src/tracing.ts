import { SpanStatusCode, trace, type Attributes, type Span, type Tracer } from "@opentelemetry/api";

import type { ReloginInstrumentationOptions } from "./metrics.js";

export type ReloginTracer = Tracer;

export interface RunWithSpanOptions {
  readonly attributes?: Attributes;
  readonly onError?: (error: unknown, span: Span) => void;
}

export const getReloginTracer = (options: ReloginInstrumentationOptions = {}): Tracer =>
  trace.getTracerProvider().getTracer(options.name ?? "relogin", options.version, { schemaUrl: options.schemaUrl });

/**
 * Runs `callback` inside an active span, marking the span as failed and
 * rethrowing when the callback throws.
 */
export const runWithSpan = <T>(
  tracer: Tracer,
  name: string,
  callback: (span: Span) => Promise<T> | T,
  options: RunWithSpanOptions = {},
): Promise<T> =>
  tracer.startActiveSpan(name, { attributes: options.attributes }, async (span) => {
    try {
      const result = await callback(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      if (error instanceof Error) {
        span.recordException(error);
      }
      options.onError?.(error, span);
      throw error;
    } finally {
      span.end();
    }
  });

export { SpanStatusCode };
