/**
 * OpenTelemetry Tracing (Opt-in)
 *
 * Spans for grant exchanges and API requests. The client only talks to
 * `@opentelemetry/api`; the application registers its own SDK and exporter.
 *
 * Enable via environment variable:
 * - OTEL_ENABLED=1
 */

import { trace, context, SpanStatusCode, SpanKind } from '@opentelemetry/api';
import type { Span, Tracer } from '@opentelemetry/api';
import { v4 as uuidv4 } from 'uuid';

const TRACER_NAME = 'dracoon-session-client';

export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

export function getTracer(): Tracer | null {
  if (!isOTelEnabled()) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/**
 * Unique id sent as `X-Request-ID` and attached to log lines.
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Execute a function within a span
 *
 * @param name - Span name
 * @param fn - Function to execute
 * @param attributes - Optional span attributes
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | null) => Promise<T>,
  attributes?: Record<string, string | number | boolean>
): Promise<T> {
  const tracer = getTracer();

  if (!tracer) {
    return fn(null);
  }

  return tracer.startActiveSpan(name, async (span) => {
    try {
      if (attributes) {
        Object.entries(attributes).forEach(([key, value]) => {
          span.setAttribute(key, value);
        });
      }

      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error: unknown) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
      throw error;
    } finally {
      span.end();
    }
  });
}

export async function withHttpSpan<T>(
  method: string,
  url: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`HTTP ${method}`, fn, {
    'http.method': method,
    'http.url': url,
    'span.kind': SpanKind.CLIENT,
  });
}

/**
 * Span for an exchange at the identity endpoint
 *
 * @param grantType - 'password', 'authorization_code' or 'refresh_token'
 */
export async function withGrantSpan<T>(
  grantType: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`OAuth ${grantType}`, fn, {
    'oauth.grant_type': grantType,
  });
}

/**
 * Add event to the active span, if any
 */
export function addSpanEvent(name: string, attributes?: Record<string, string | number | boolean>): void {
  if (!isOTelEnabled()) return;
  const span = trace.getSpan(context.active());
  span?.addEvent(name, attributes);
}
