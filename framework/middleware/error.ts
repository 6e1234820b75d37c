/**
 * Error Boundary Middleware
 *
 * Turns errors thrown by inner layers into JSON responses.
 */

import { HttpError } from '../errors.ts';
import type { HttpRequest } from '../http/request.ts';
import { ResponseBuilder } from '../http/response.ts';
import type { Middleware } from '../http/types.ts';
import { createRequestLogger, type Logger } from '../telemetry/logger.ts';
import { recordSpanException, toError } from '../telemetry/otel.ts';

export type ErrorMode = 'debug' | 'production';

export interface ErrorBoundaryOptions {
  /** `debug` exposes the error type, message and stack (default: production) */
  mode?: ErrorMode;
  logger?: Logger;
}

export interface ErrorBody {
  error: {
    type?: string;
    message: string;
    stack?: string;
  };
}

/**
 * Build the response body for an error
 */
export function errorBody(error: Error, mode: ErrorMode, status: number): ErrorBody {
  if (mode === 'debug') {
    return { error: { type: error.name, message: error.message, stack: error.stack } };
  }
  if (error instanceof HttpError && error.expose) {
    return { error: { message: error.message } };
  }
  return { error: { message: status >= 500 ? 'Internal Server Error' : 'Request Failed' } };
}

export function errorBoundary(options: ErrorBoundaryOptions = {}): Middleware<HttpRequest, Response> {
  const mode = options.mode ?? 'production';
  const logger = options.logger;

  return async function errorBoundary(request, next) {
    try {
      return await next(request);
    } catch (thrown) {
      const error = toError(thrown);
      const status = error instanceof HttpError ? error.status : 500;

      const log = logger ? createRequestLogger(logger, request) : undefined;
      if (status >= 500) {
        log?.error('Unhandled error', error);
        recordSpanException(error);
      } else {
        log?.debug(`${status} ${error.message}`);
      }

      return new ResponseBuilder().status(status).json(errorBody(error, mode, status));
    }
  };
}
