/**
 * URL Router
 *
 * Ordered collection of routes matched by descending priority. Routes of
 * equal priority keep their registration order.
 */

import { ConfigurationError } from '../errors.ts';
import type { HttpRequest } from '../http/request.ts';
import type { HttpMethod } from '../http/types.ts';
import { joinPaths, type ParamValue, type PathParams } from './patterns.ts';
import { Route, type HandlerLike } from './route.ts';

export interface RouteMatch<Req = HttpRequest, Res = Response> {
  route: Route<Req, Res>;
  params: PathParams;
}

/**
 * Outcome of resolving a request against every route
 */
export type Resolution<Req = HttpRequest, Res = Response> =
  | ({ status: 'found' } & RouteMatch<Req, Res>)
  | { status: 'method-not-allowed'; allowed: HttpMethod[] }
  | { status: 'not-found' };

export interface RouterOptions {
  prefix?: string;
}

export interface RegisterOptions {
  name?: string;
  priority?: number;
}

/**
 * URL Router
 */
export class Router<Req = HttpRequest, Res = Response> {
  private routes: Route<Req, Res>[] = [];
  private ordered: Route<Req, Res>[] | null = null;
  private namedRoutes = new Map<string, Route<Req, Res>>();
  readonly prefix: string;

  constructor(options: RouterOptions = {}) {
    this.prefix = options.prefix ? joinPaths(options.prefix) : '';
  }

  /**
   * Register a route for a set of methods
   */
  register(
    template: string,
    methods: Iterable<string>,
    handler: HandlerLike<Req, Res>,
    options: RegisterOptions = {}
  ): Route<Req, Res> {
    const route = new Route(joinPaths(this.prefix, template), handler, {
      methods,
      priority: options.priority,
      name: options.name,
    });
    this.add(route);
    return route;
  }

  /**
   * Register a GET route
   */
  get(path: string, handler: HandlerLike<Req, Res>, options?: RegisterOptions): this {
    this.register(path, ['GET'], handler, options);
    return this;
  }

  /**
   * Register a POST route
   */
  post(path: string, handler: HandlerLike<Req, Res>, options?: RegisterOptions): this {
    this.register(path, ['POST'], handler, options);
    return this;
  }

  /**
   * Register a PUT route
   */
  put(path: string, handler: HandlerLike<Req, Res>, options?: RegisterOptions): this {
    this.register(path, ['PUT'], handler, options);
    return this;
  }

  /**
   * Register a PATCH route
   */
  patch(path: string, handler: HandlerLike<Req, Res>, options?: RegisterOptions): this {
    this.register(path, ['PATCH'], handler, options);
    return this;
  }

  /**
   * Register a DELETE route
   */
  delete(path: string, handler: HandlerLike<Req, Res>, options?: RegisterOptions): this {
    this.register(path, ['DELETE'], handler, options);
    return this;
  }

  /**
   * Register a HEAD route
   */
  head(path: string, handler: HandlerLike<Req, Res>, options?: RegisterOptions): this {
    this.register(path, ['HEAD'], handler, options);
    return this;
  }

  /**
   * Register an OPTIONS route
   */
  options(path: string, handler: HandlerLike<Req, Res>, options?: RegisterOptions): this {
    this.register(path, ['OPTIONS'], handler, options);
    return this;
  }

  /**
   * Register a route for several methods at once
   */
  route(
    methods: Iterable<string>,
    path: string,
    handler: HandlerLike<Req, Res>,
    options?: RegisterOptions
  ): this {
    this.register(path, methods, handler, options);
    return this;
  }

  /**
   * Copy every route of a sub-router under a prefix.
   * The copy is taken now; later changes to the sub-router are not seen.
   */
  include(router: Router<Req, Res>, prefix: string = ''): this {
    for (const route of router.getRoutes()) {
      this.add(route.withTemplate(joinPaths(this.prefix, prefix, route.template)));
    }
    return this;
  }

  /**
   * Find the first route matching a path and method
   */
  find(path: string, method: string): RouteMatch<Req, Res> | null {
    for (const route of this.byPriority()) {
      const params = route.matches(path, method);
      if (params) {
        return { route, params };
      }
    }
    return null;
  }

  /**
   * Find a route, telling "wrong method" apart from "no such path"
   */
  resolve(path: string, method: string): Resolution<Req, Res> {
    const match = this.find(path, method);
    if (match) {
      return { status: 'found', ...match };
    }

    const allowed = new Set<HttpMethod>();
    for (const route of this.byPriority()) {
      if (route.matchesPath(path)) {
        for (const m of route.methods) {
          allowed.add(m);
        }
      }
    }

    if (allowed.size > 0) {
      return { status: 'method-not-allowed', allowed: [...allowed].sort() };
    }
    return { status: 'not-found' };
  }

  /**
   * Generate a URL for a named route
   */
  url(
    name: string,
    params: Record<string, ParamValue> = {},
    query?: Record<string, string | string[]>
  ): string | null {
    const route = this.namedRoutes.get(name);
    return route ? route.url(params, query) : null;
  }

  /**
   * Get all registered routes in registration order
   */
  getRoutes(): Route<Req, Res>[] {
    return [...this.routes];
  }

  private add(route: Route<Req, Res>): void {
    if (route.name !== undefined) {
      if (this.namedRoutes.has(route.name)) {
        throw new ConfigurationError(
          'DUPLICATE_ROUTE_NAME',
          `A route named '${route.name}' is already registered`
        );
      }
      this.namedRoutes.set(route.name, route);
    }

    this.routes.push(route);
    this.ordered = null;
  }

  /**
   * Routes sorted by descending priority; Array.prototype.sort is stable
   */
  private byPriority(): Route<Req, Res>[] {
    if (!this.ordered) {
      this.ordered = [...this.routes].sort((a, b) => b.priority - a.priority);
    }
    return this.ordered;
  }
}
