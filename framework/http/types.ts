/**
 * HTTP Type Definitions
 */

import type { HttpRequest } from './request.ts';

/**
 * Continuation passed to middleware: the rest of the pipeline
 */
export type Next<Req = HttpRequest, Res = Response> = (request: Req) => Promise<Res>;

/**
 * Middleware function signature
 */
export type Middleware<Req = HttpRequest, Res = Response> = (
  request: Req,
  next: Next<Req, Res>
) => Promise<Res> | Res;

/**
 * Innermost step wrapped by the middleware chain
 */
export type TerminalHandler<Req = HttpRequest, Res = Response> = (
  request: Req
) => Promise<Res> | Res;

/**
 * The single function produced by folding a chain around its terminal
 */
export type ComposedHandler<Req = HttpRequest, Res = Response> = (request: Req) => Promise<Res>;

/**
 * HTTP methods a route may accept
 */
export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD', 'OPTIONS'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}

/**
 * Cookie options
 */
export interface CookieOptions {
  maxAge?: number;
  expires?: Date;
  path?: string;
  domain?: string;
  secure?: boolean;
  httpOnly?: boolean;
  sameSite?: 'Strict' | 'Lax' | 'None';
}
