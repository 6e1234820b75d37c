/**
 * Middleware Chain
 *
 * Folds an ordered list of middleware around a terminal handler (onion
 * model). The first middleware added is the outermost layer. Each
 * middleware can:
 * - Inspect/modify the request before passing it on
 * - Short-circuit and return early response
 * - Inspect/modify the response on the way out
 * - Handle exceptions thrown by inner layers
 */

import { ConfigurationError } from '../errors.ts';
import type { HttpRequest } from '../http/request.ts';
import type { ComposedHandler, Middleware, TerminalHandler } from '../http/types.ts';
import type { Logger } from '../telemetry/logger.ts';

export type ChainState = 'empty' | 'accumulating' | 'built';

export interface MiddlewareChainOptions {
  /** Logs entering and leaving each layer at debug level */
  logger?: Logger;
}

interface BuiltChain<Req, Res> {
  terminal: TerminalHandler<Req, Res>;
  handler: ComposedHandler<Req, Res>;
}

/**
 * Ordered middleware list that builds into a single handler, once
 */
export class MiddlewareChain<Req = HttpRequest, Res = Response> {
  private middleware: Middleware<Req, Res>[] = [];
  private built: BuiltChain<Req, Res> | null = null;
  private logger?: Logger;

  constructor(options: MiddlewareChainOptions = {}) {
    this.logger = options.logger;
  }

  /**
   * Append middleware. Fails once the chain has been built.
   */
  add(middleware: Middleware<Req, Res>): this {
    if (this.built) {
      throw new ConfigurationError(
        'CHAIN_BUILT',
        'Cannot add middleware after the middleware chain has been built'
      );
    }
    this.middleware.push(middleware);
    return this;
  }

  count(): number {
    return this.middleware.length;
  }

  get state(): ChainState {
    if (this.built) return 'built';
    return this.middleware.length === 0 ? 'empty' : 'accumulating';
  }

  /**
   * Fold the chain around `terminal`. Building again with the same terminal
   * returns the handler already built.
   */
  build(terminal: TerminalHandler<Req, Res>): ComposedHandler<Req, Res> {
    if (this.built) {
      if (this.built.terminal === terminal) {
        return this.built.handler;
      }
      throw new ConfigurationError(
        'CHAIN_BUILT',
        'The middleware chain has already been built around a different terminal handler'
      );
    }

    let app: ComposedHandler<Req, Res> = async (request) => await terminal(request);

    for (const [index, middleware] of [...this.middleware.entries()].reverse()) {
      app = this.wrap(middleware, index, app);
    }

    this.built = { terminal, handler: app };
    return app;
  }

  private wrap(
    middleware: Middleware<Req, Res>,
    index: number,
    next: ComposedHandler<Req, Res>
  ): ComposedHandler<Req, Res> {
    const logger = this.logger;
    if (!logger) {
      return async (request) => await middleware(request, next);
    }

    const name = middleware.name || `middleware[${index}]`;
    return async (request) => {
      logger.debug(`Entering ${name}`, { index });
      try {
        return await middleware(request, next);
      } finally {
        logger.debug(`Exiting ${name}`, { index });
      }
    };
  }
}

/**
 * Create a middleware that runs conditionally
 */
export function conditional<Req = HttpRequest, Res = Response>(
  condition: (request: Req) => boolean,
  middleware: Middleware<Req, Res>
): Middleware<Req, Res> {
  return async (request, next) => {
    if (condition(request)) {
      return await middleware(request, next);
    }
    return await next(request);
  };
}

/**
 * Create a middleware that runs for specific paths
 */
export function forPath<Req extends { path: string }, Res = Response>(
  pathPrefix: string,
  middleware: Middleware<Req, Res>
): Middleware<Req, Res> {
  return conditional((request: Req) => request.path.startsWith(pathPrefix), middleware);
}

/**
 * Create a middleware that runs for specific methods
 */
export function forMethods<Req extends { method: string }, Res = Response>(
  methods: string[],
  middleware: Middleware<Req, Res>
): Middleware<Req, Res> {
  const methodSet = new Set(methods.map((m) => m.toUpperCase()));
  return conditional((request: Req) => methodSet.has(request.method), middleware);
}
