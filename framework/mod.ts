/**
 * Switchyard
 *
 * Request routing and middleware dispatch for Node.js.
 *
 * @module switchyard
 */

// Application
export {
  Application,
  createApp,
  type ApplicationOptions,
  type LifecycleHook,
  type ListenOptions,
} from './app.ts';

export {
  SwitchyardError,
  ConfigurationError,
  HttpError,
  isConfigurationError,
  type ConfigurationErrorCode,
} from './errors.ts';

// HTTP
export {
  Server,
  HttpRequest,
  ResponseBuilder,
  json,
  text,
  html,
  type ComposedHandler,
  type HttpMethod,
  type Middleware,
  type Next,
  type ServerOptions,
  type TerminalHandler,
} from './http/mod.ts';

// Middleware
export {
  MiddlewareChain,
  conditional,
  forMethods,
  forPath,
  cors,
  errorBoundary,
  requestLogger,
  type CorsOptions,
  type ErrorBoundaryOptions,
  type RequestLoggerOptions,
} from './middleware/mod.ts';

// Router
export {
  Router,
  Route,
  defineHandler,
  defineRequestHandler,
  compilePattern,
  type HandlerLike,
  type PathParams,
  type Resolution,
  type RouteMatch,
} from './router/mod.ts';

// Config
export { Config, loadConfig, type ConfigOptions, type ConfigValues } from './config/mod.ts';

// Telemetry
export { Logger, createLogger, createRequestLogger, type LogEntry, type LogLevel } from './telemetry/mod.ts';
