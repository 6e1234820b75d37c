/**
 * Application Class
 *
 * The main entry point for building applications. Owns the configuration,
 * logger, router and middleware chain, and turns native Requests into
 * Responses.
 */

import { Config, type ConfigOptions } from './config/config.ts';
import { HttpRequest } from './http/request.ts';
import { ResponseBuilder } from './http/response.ts';
import { Server } from './http/server.ts';
import type { ComposedHandler, Middleware } from './http/types.ts';
import { MiddlewareChain } from './middleware/chain.ts';
import { errorBoundary } from './middleware/error.ts';
import type { HandlerLike } from './router/route.ts';
import { Router, type RegisterOptions } from './router/router.ts';
import { createLogger, createRequestLogger, type Logger } from './telemetry/logger.ts';
import {
  isOTELEnabled,
  setRouteAttribute,
  SpanKind,
  toError,
  withSpan,
} from './telemetry/otel.ts';

export type LifecycleHook = () => Promise<void> | void;

export interface ApplicationOptions {
  config?: Config | ConfigOptions;
  logger?: Logger;
  /** Install the error boundary as the outermost middleware (default: true) */
  errorBoundary?: boolean;
}

export interface ListenOptions {
  port?: number;
  host?: string;
}

/**
 * Main Application class
 */
export class Application {
  readonly config: Config;
  readonly logger: Logger;
  readonly router: Router;
  private middleware: MiddlewareChain;
  private handler: ComposedHandler | null = null;
  private startupHooks: LifecycleHook[] = [];
  private shutdownHooks: LifecycleHook[] = [];
  private started = false;
  private stopped = false;
  private server: Server | null = null;

  constructor(options: ApplicationOptions = {}) {
    this.config = options.config instanceof Config ? options.config : new Config(options.config);
    this.logger = options.logger ?? createLogger(this.config);
    this.router = new Router();
    this.middleware = new MiddlewareChain({ logger: this.logger.child({ component: 'middleware' }) });

    if (options.errorBoundary !== false) {
      this.middleware.add(
        errorBoundary({ mode: this.config.get('errors').mode, logger: this.logger })
      );
    }
  }

  /**
   * Add global middleware. Fails once the application has started.
   */
  use(middleware: Middleware): this {
    this.middleware.add(middleware);
    return this;
  }

  get(path: string, handler: HandlerLike, options?: RegisterOptions): this {
    this.router.get(path, handler, options);
    return this;
  }

  post(path: string, handler: HandlerLike, options?: RegisterOptions): this {
    this.router.post(path, handler, options);
    return this;
  }

  put(path: string, handler: HandlerLike, options?: RegisterOptions): this {
    this.router.put(path, handler, options);
    return this;
  }

  patch(path: string, handler: HandlerLike, options?: RegisterOptions): this {
    this.router.patch(path, handler, options);
    return this;
  }

  delete(path: string, handler: HandlerLike, options?: RegisterOptions): this {
    this.router.delete(path, handler, options);
    return this;
  }

  route(
    methods: Iterable<string>,
    path: string,
    handler: HandlerLike,
    options?: RegisterOptions
  ): this {
    this.router.route(methods, path, handler, options);
    return this;
  }

  /**
   * Register routes from a router
   */
  include(router: Router, prefix = ''): this {
    this.router.include(router, prefix);
    return this;
  }

  onStartup(hook: LifecycleHook): this {
    this.startupHooks.push(hook);
    return this;
  }

  onShutdown(hook: LifecycleHook): this {
    this.shutdownHooks.push(hook);
    return this;
  }

  /**
   * Build the middleware chain, then run startup hooks in registration order
   */
  async startup(): Promise<void> {
    if (this.started) return;
    this.started = true;

    this.composed();
    for (const hook of this.startupHooks) {
      await hook();
    }
    this.logger.info('Application started', { routes: this.router.getRoutes().length });
  }

  /**
   * Stop the server, if any, then run shutdown hooks in registration order
   */
  async shutdown(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    if (this.server) {
      await this.server.close();
      this.server = null;
    }
    for (const hook of this.shutdownHooks) {
      await hook();
    }
    this.logger.info('Application stopped');
  }

  /**
   * Handle a native Request
   */
  async handle(request: Request): Promise<Response> {
    const req = new HttpRequest(request, { config: this.config });
    const handler = this.composed();

    try {
      return await withSpan(
        `HTTP ${req.method}`,
        async (span) => {
          const response = await handler(req);
          span?.setAttribute('http.response.status_code', response.status);
          return response;
        },
        {
          kind: SpanKind.SERVER,
          attributes: { 'http.request.method': req.method, 'url.path': req.path },
          enabled: isOTELEnabled(this.config),
        }
      );
    } catch (error) {
      createRequestLogger(this.logger, req).error('Request error', toError(error));
      return new Response('Internal Server Error', { status: 500 });
    }
  }

  /**
   * Start the server
   */
  async listen(options: ListenOptions = {}): Promise<{ hostname: string; port: number }> {
    await this.startup();

    const server = new Server((request) => this.handle(request), {
      port: options.port ?? this.config.get('port'),
      hostname: options.host ?? this.config.get('host'),
    });
    const address = await server.listen();
    this.server = server;

    this.logger.info(`Server listening on http://${address.hostname}:${address.port}`);
    return address;
  }

  private composed(): ComposedHandler {
    if (!this.handler) {
      this.handler = this.middleware.build(this.dispatch);
    }
    return this.handler;
  }

  /**
   * Terminal step: route the request and call the matched handler
   */
  private readonly dispatch = async (request: HttpRequest): Promise<Response> => {
    const resolution = this.router.resolve(request.path, request.method);

    switch (resolution.status) {
      case 'not-found':
        return new ResponseBuilder().notFound();
      case 'method-not-allowed':
        return new ResponseBuilder().methodNotAllowed(resolution.allowed);
      case 'found':
        request.setParams(resolution.params);
        request.setRoute({ template: resolution.route.template, name: resolution.route.name });
        setRouteAttribute(resolution.route.template, request.method);
        return await resolution.route.handle(request, resolution.params);
    }
  };
}

/**
 * Create a new application instance
 */
export function createApp(options?: ApplicationOptions): Application {
  return new Application(options);
}
