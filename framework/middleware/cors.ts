/**
 * CORS Middleware
 *
 * Handles Cross-Origin Resource Sharing (CORS) headers
 * and preflight OPTIONS requests.
 */

import type { HttpRequest } from '../http/request.ts';
import type { Middleware } from '../http/types.ts';

export interface CorsOptions {
  origin?: string | string[] | ((origin: string) => boolean);
  methods?: string[];
  allowedHeaders?: string[];
  exposedHeaders?: string[];
  credentials?: boolean;
  maxAge?: number;
}

const DEFAULT_OPTIONS: Required<CorsOptions> = {
  origin: '*',
  methods: ['GET', 'HEAD', 'PUT', 'PATCH', 'POST', 'DELETE'],
  allowedHeaders: ['Content-Type', 'Authorization'],
  exposedHeaders: [],
  credentials: false,
  maxAge: 86400, // 24 hours
};

/**
 * Create CORS middleware
 */
export function cors(options: CorsOptions = {}): Middleware<HttpRequest, Response> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return async function cors(request, next) {
    const allowedOrigin = getOriginHeader(request.header('Origin'), opts.origin);
    const headers = new Headers();

    if (allowedOrigin) {
      headers.set('Access-Control-Allow-Origin', allowedOrigin);
      if (allowedOrigin !== '*') {
        headers.append('Vary', 'Origin');
      }
    }
    if (opts.credentials) {
      headers.set('Access-Control-Allow-Credentials', 'true');
    }
    if (opts.exposedHeaders.length > 0) {
      headers.set('Access-Control-Expose-Headers', opts.exposedHeaders.join(', '));
    }

    // Preflight
    if (request.method === 'OPTIONS' && request.header('Access-Control-Request-Method')) {
      headers.set('Access-Control-Allow-Methods', opts.methods.join(', '));
      headers.set('Access-Control-Allow-Headers', opts.allowedHeaders.join(', '));
      if (opts.maxAge) {
        headers.set('Access-Control-Max-Age', opts.maxAge.toString());
      }
      return new Response(null, { status: 204, headers });
    }

    const response = await next(request);
    return withHeaders(response, headers);
  };
}

/**
 * Copy of `response` with `extra` headers added
 */
function withHeaders(response: Response, extra: Headers): Response {
  const headers = new Headers(response.headers);
  extra.forEach((value, name) => {
    if (name === 'vary') {
      headers.append(name, value);
    } else {
      headers.set(name, value);
    }
  });
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}

/**
 * Determine the Access-Control-Allow-Origin header value
 */
function getOriginHeader(origin: string | null, allowed: CorsOptions['origin']): string | null {
  if (!origin) return null;

  if (allowed === '*') {
    return '*';
  }
  if (typeof allowed === 'string') {
    return origin === allowed ? allowed : null;
  }
  if (Array.isArray(allowed)) {
    return allowed.includes(origin) ? origin : null;
  }
  if (typeof allowed === 'function') {
    return allowed(origin) ? origin : null;
  }
  return null;
}
