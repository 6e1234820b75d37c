/**
 * Middleware Layer
 *
 * Cross-cutting concerns that wrap every request/response cycle.
 * Implements the onion model where each middleware wraps the next.
 */

export {
  MiddlewareChain,
  conditional,
  forMethods,
  forPath,
  type ChainState,
  type MiddlewareChainOptions,
} from './chain.ts';
export { cors, type CorsOptions } from './cors.ts';
export {
  errorBoundary,
  errorBody,
  type ErrorBody,
  type ErrorBoundaryOptions,
  type ErrorMode,
} from './error.ts';
export { requestLogger, type RequestLoggerOptions } from './logging.ts';
