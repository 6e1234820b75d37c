/**
 * Request Carrier
 *
 * Wraps the native Request with the path parameters found by the router,
 * per-request state and the application's configuration.
 */

import type { Config } from '../config/config.ts';
import type { PathParams } from '../router/patterns.ts';

/**
 * The route dispatch matched, for logs and traces
 */
export interface MatchedRoute {
  template: string;
  name?: string;
}

export interface RequestContext {
  params: PathParams;
  route?: MatchedRoute;
  state: Map<string, unknown>;
  startTime: number;
  config?: Config;
}

/**
 * Request class handed to middleware and handlers
 */
export class HttpRequest {
  private _request: Request;
  private _url: URL;
  private _context: RequestContext;
  private _text: Promise<string> | null = null;
  private _cookies: Map<string, string> | null = null;

  constructor(request: Request, context?: Partial<RequestContext>) {
    this._request = request;
    this._url = new URL(request.url);
    this._context = {
      params: context?.params ?? {},
      route: context?.route,
      state: context?.state ?? new Map(),
      startTime: context?.startTime ?? performance.now(),
      config: context?.config,
    };
  }

  /**
   * The underlying native Request
   */
  get raw(): Request {
    return this._request;
  }

  get method(): string {
    return this._request.method;
  }

  /**
   * Full URL
   */
  get url(): string {
    return this._request.url;
  }

  /**
   * URL path (without query string)
   */
  get path(): string {
    return this._url.pathname;
  }

  get query(): URLSearchParams {
    return this._url.searchParams;
  }

  /**
   * Route parameters extracted from the path, already converted
   */
  get params(): PathParams {
    return this._context.params;
  }

  /**
   * Route matched by dispatch; undefined before routing or when none matched
   */
  get route(): MatchedRoute | undefined {
    return this._context.route;
  }

  get headers(): Headers {
    return this._request.headers;
  }

  /**
   * Get a specific header value
   */
  header(name: string): string | null {
    return this._request.headers.get(name);
  }

  /**
   * Request state for passing data between middleware
   */
  get state(): Map<string, unknown> {
    return this._context.state;
  }

  get startTime(): number {
    return this._context.startTime;
  }

  /**
   * Application configuration, when the request came through an Application
   */
  get config(): Config | undefined {
    return this._context.config;
  }

  get contentType(): string | null {
    return this.header('Content-Type');
  }

  get isJson(): boolean {
    return this.contentType?.toLowerCase().includes('application/json') ?? false;
  }

  /**
   * Check if request accepts JSON
   */
  get acceptsJson(): boolean {
    const accept = this.header('Accept') ?? '';
    return accept.includes('application/json') || accept.includes('*/*');
  }

  /**
   * Read the body as text. The body stream is consumed once and cached.
   */
  text(): Promise<string> {
    if (!this._text) {
      this._text = this._request.text();
    }
    return this._text;
  }

  /**
   * Parse the body as JSON
   */
  async json(): Promise<unknown> {
    const body = await this.text();
    if (body === '') {
      throw new SyntaxError('Request body is empty');
    }
    return JSON.parse(body);
  }

  /**
   * Cookies from the Cookie header; for repeated names the last value wins
   */
  get cookies(): Map<string, string> {
    if (!this._cookies) {
      const cookies = new Map<string, string>();
      for (const pair of (this.header('Cookie') ?? '').split(';')) {
        const eq = pair.indexOf('=');
        if (eq === -1) continue;
        const name = pair.slice(0, eq).trim();
        if (name) {
          cookies.set(name, pair.slice(eq + 1).trim());
        }
      }
      this._cookies = cookies;
    }
    return this._cookies;
  }

  /**
   * Get a specific cookie value
   */
  cookie(name: string): string | undefined {
    return this.cookies.get(name);
  }

  /**
   * Set route parameters (used by the dispatcher)
   */
  setParams(params: PathParams): void {
    this._context.params = params;
  }

  setRoute(route: MatchedRoute): void {
    this._context.route = route;
  }
}
