/**
 * HTTP Layer
 *
 * Request carrier, response builder and the node:http adapter.
 */

export {
  Server,
  serverOrigin,
  withServerDefaults,
  toWebRequest,
  writeWebResponse,
  type FetchHandler,
  type IncomingLike,
  type OutgoingLike,
  type ServerOptions,
} from './server.ts';
export { HttpRequest, type MatchedRoute, type RequestContext } from './request.ts';
export { ResponseBuilder, json, text, html, type ResponseOptions } from './response.ts';
export { HTTP_METHODS, isHttpMethod } from './types.ts';
export type {
  ComposedHandler,
  CookieOptions,
  HttpMethod,
  Middleware,
  Next,
  TerminalHandler,
} from './types.ts';
