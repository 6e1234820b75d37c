/**
 * Routing Layer
 *
 * Maps incoming request paths to handlers.
 * Supports typed path parameters, priorities, method binding and URL reversing.
 */

export {
  Router,
  type RegisterOptions,
  type Resolution,
  type RouteMatch,
  type RouterOptions,
} from './router.ts';
export {
  Route,
  defineHandler,
  defineRequestHandler,
  toHandlerAdapter,
  type DeclaredType,
  type HandlerAdapter,
  type HandlerLike,
  type ParamDeclaration,
  type ParamsHandlerAdapter,
  type RequestHandlerAdapter,
  type RouteOptions,
} from './route.ts';
export {
  buildPath,
  compilePattern,
  convertParam,
  countSegments,
  isParamKind,
  joinPaths,
  normalizePath,
  type CompiledPattern,
  type ParameterSpec,
  type ParamKind,
  type ParamValue,
  type PathParams,
  type PatternToken,
} from './patterns.ts';
