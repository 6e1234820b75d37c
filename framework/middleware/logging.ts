/**
 * Logging Middleware
 *
 * Request/response logging for monitoring and debugging.
 */

import type { HttpRequest } from '../http/request.ts';
import type { Middleware } from '../http/types.ts';
import { createRequestLogger, type Logger } from '../telemetry/logger.ts';

export interface RequestLoggerOptions {
  logger: Logger;
  excludePaths?: string[];
}

const DEFAULT_EXCLUDE_PATHS = ['/health', '/ready', '/favicon.ico'];

/**
 * Create logging middleware
 */
export function requestLogger(options: RequestLoggerOptions): Middleware<HttpRequest, Response> {
  const { logger } = options;
  const excludePaths = options.excludePaths ?? DEFAULT_EXCLUDE_PATHS;

  return async function requestLogger(request, next) {
    if (excludePaths.some((path) => request.path.startsWith(path))) {
      return await next(request);
    }

    const startTime = performance.now();
    let status = 500;

    logger.debug(`→ ${request.method} ${request.path}`);
    try {
      const response = await next(request);
      status = response.status;
      return response;
    } finally {
      const duration = Math.round((performance.now() - startTime) * 100) / 100;
      // route fields are known once dispatch has run
      createRequestLogger(logger, request).info(
        `← ${request.method} ${request.path} ${status} ${duration}ms`,
        { status, duration }
      );
    }
  };
}
