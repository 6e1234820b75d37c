/**
 * Response Builder
 *
 * Fluent interface for building HTTP responses.
 */

import type { CookieOptions } from './types.ts';

export interface ResponseOptions {
  status?: number;
  headers?: Headers | Record<string, string>;
}

/**
 * Response builder
 */
export class ResponseBuilder {
  private _status: number = 200;
  private _headers: Headers = new Headers();
  private _body: string | null = null;
  private _cookies: string[] = [];

  constructor(options?: ResponseOptions) {
    if (options?.status) {
      this._status = options.status;
    }
    if (options?.headers) {
      new Headers(options.headers).forEach((value, key) => {
        this._headers.set(key, value);
      });
    }
  }

  /**
   * Set the response status code
   */
  status(code: number): this {
    this._status = code;
    return this;
  }

  /**
   * Set a response header
   */
  header(name: string, value: string): this {
    this._headers.set(name, value);
    return this;
  }

  /**
   * Set a cookie
   */
  cookie(name: string, value: string, options: CookieOptions = {}): this {
    const parts = [`${encodeURIComponent(name)}=${encodeURIComponent(value)}`];

    if (options.maxAge !== undefined) {
      parts.push(`Max-Age=${options.maxAge}`);
    }
    if (options.expires) {
      parts.push(`Expires=${options.expires.toUTCString()}`);
    }
    if (options.path) {
      parts.push(`Path=${options.path}`);
    }
    if (options.domain) {
      parts.push(`Domain=${options.domain}`);
    }
    if (options.secure) {
      parts.push('Secure');
    }
    if (options.httpOnly) {
      parts.push('HttpOnly');
    }
    if (options.sameSite) {
      parts.push(`SameSite=${options.sameSite}`);
    }

    this._cookies.push(parts.join('; '));
    return this;
  }

  /**
   * Send a JSON response
   */
  json(data: unknown): Response {
    this._headers.set('Content-Type', 'application/json; charset=utf-8');
    this._body = JSON.stringify(data);
    return this.build();
  }

  /**
   * Send an HTML response
   */
  html(content: string): Response {
    this._headers.set('Content-Type', 'text/html; charset=utf-8');
    this._body = content;
    return this.build();
  }

  /**
   * Send a plain text response
   */
  text(content: string): Response {
    this._headers.set('Content-Type', 'text/plain; charset=utf-8');
    this._body = content;
    return this.build();
  }

  /**
   * Send a redirect response
   */
  redirect(url: string, status: 301 | 302 | 303 | 307 | 308 = 302): Response {
    this._status = status;
    this._headers.set('Location', url);
    return this.build();
  }

  /**
   * Send an empty response
   */
  empty(): Response {
    this._body = null;
    return this.build();
  }

  /**
   * Send a 204 No Content response
   */
  noContent(): Response {
    this._status = 204;
    return this.empty();
  }

  /**
   * Error responses share the `{ error: { message } }` envelope of the
   * error boundary
   */
  notFound(message = 'Not Found'): Response {
    this._status = 404;
    return this.json({ error: { message } });
  }

  /**
   * 405 with the Allow header listing the methods the path accepts
   */
  methodNotAllowed(allowed: readonly string[], message = 'Method Not Allowed'): Response {
    this._status = 405;
    this._headers.set('Allow', allowed.join(', '));
    return this.json({ error: { message } });
  }

  serverError(message = 'Internal Server Error'): Response {
    this._status = 500;
    return this.json({ error: { message } });
  }

  /**
   * Build the final Response object
   */
  build(): Response {
    const headers = new Headers(this._headers);
    for (const cookie of this._cookies) {
      headers.append('Set-Cookie', cookie);
    }
    return new Response(this._body, { status: this._status, headers });
  }
}

export function json(data: unknown, options?: ResponseOptions): Response {
  return new ResponseBuilder(options).json(data);
}

export function text(content: string, options?: ResponseOptions): Response {
  return new ResponseBuilder(options).text(content);
}

export function html(content: string, options?: ResponseOptions): Response {
  return new ResponseBuilder(options).html(content);
}
