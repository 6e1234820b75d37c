/**
 * Telemetry & Observability
 *
 * Structured logging and OpenTelemetry tracing.
 */

export {
  Logger,
  createLogger,
  createRequestLogger,
  isLogLevel,
  LOG_LEVELS,
  type LogEntry,
  type LogFormat,
  type LoggerOptions,
  type LogLevel,
  type RequestLogSource,
} from './logger.ts';

export {
  isOTELEnabled,
  getActiveSpan,
  setRouteAttribute,
  recordSpanException,
  getOTELTracer,
  withSpan,
  toError,
  trace,
  context,
  SpanKind,
  SpanStatusCode,
  type CreateSpanOptions,
  type Span as OTELSpan,
  type Attributes as OTELAttributes,
} from './otel.ts';
