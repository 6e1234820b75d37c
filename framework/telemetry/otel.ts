/**
 * OpenTelemetry Integration
 *
 * Thin helpers over `@opentelemetry/api`. Without a registered SDK the API
 * hands out no-op spans, so these are safe to call unconditionally.
 *
 * @module
 */

import {
  trace,
  context,
  SpanKind,
  SpanStatusCode,
  type Tracer,
  type Span,
  type Context,
  type Attributes,
} from '@opentelemetry/api';
import type { Config } from '../config/config.ts';

/**
 * Check if tracing is switched on in configuration
 */
export function isOTELEnabled(config: Config): boolean {
  return config.get('telemetry').enabled;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Get the currently active span, if any
 */
export function getActiveSpan(): Span | undefined {
  return trace.getActiveSpan();
}

/**
 * Set the http.route attribute on the active span and optionally update span name
 *
 * @param routePattern - The matched route template (e.g., '/users/{id:int}')
 */
export function setRouteAttribute(routePattern: string, method: string, updateName = true): void {
  const span = getActiveSpan();
  if (span) {
    span.setAttribute('http.route', routePattern);
    if (updateName) {
      span.updateName(`${method} ${routePattern}`);
    }
  }
}

/**
 * Record an exception on the active span and set error status
 */
export function recordSpanException(error: unknown, message?: string): void {
  const span = getActiveSpan();
  if (span) {
    const err = toError(error);
    span.recordException(err);
    span.setStatus({ code: SpanStatusCode.ERROR, message: message ?? err.message });
  }
}

let _tracer: Tracer | undefined;

export function getOTELTracer(name = 'switchyard', version = '0.1.0'): Tracer {
  if (!_tracer) {
    _tracer = trace.getTracer(name, version);
  }
  return _tracer;
}

export interface CreateSpanOptions {
  /** Span kind (default: INTERNAL) */
  kind?: SpanKind;
  attributes?: Attributes;
  /** Parent context (uses current context if not provided) */
  parentContext?: Context;
  /** When false, `fn` runs without a span of its own */
  enabled?: boolean;
}

/**
 * Create a new span and run a function within its context.
 * The span ends when the function settles.
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | undefined) => Promise<T>,
  options: CreateSpanOptions = {}
): Promise<T> {
  if (options.enabled === false) {
    return await fn(undefined);
  }

  const tracer = getOTELTracer();
  const parentCtx = options.parentContext ?? context.active();

  return tracer.startActiveSpan(
    name,
    { kind: options.kind ?? SpanKind.INTERNAL, attributes: options.attributes },
    parentCtx,
    async (span) => {
      try {
        const result = await fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        const err = toError(error);
        span.recordException(err);
        span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
        throw error;
      } finally {
        span.end();
      }
    }
  );
}

export { trace, context, SpanKind, SpanStatusCode, type Span, type Attributes };
