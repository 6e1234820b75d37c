/**
 * Route
 *
 * A compiled path pattern bound to a method set, a priority and a handler
 * adapter. Handlers declare the path parameters they consume; the
 * declaration is checked against the pattern when the route is built.
 */

import { ConfigurationError } from '../errors.ts';
import type { HttpRequest } from '../http/request.ts';
import { type HttpMethod, isHttpMethod } from '../http/types.ts';
import {
  buildPath,
  compilePattern,
  convertParam,
  countSegments,
  normalizePath,
  type CompiledPattern,
  type ParamKind,
  type ParamValue,
  type PathParams,
} from './patterns.ts';

/**
 * Type a handler may declare for a path parameter
 */
export type DeclaredType = 'str' | 'int' | 'float' | 'uuid';

export type ParamDeclaration = string | { name: string; type?: DeclaredType };

type HandlerResult<Res> = Promise<Res> | Res;

interface DeclaredParams {
  readonly params: readonly ParamDeclaration[];
}

/**
 * Adapter for a handler that receives the request along with its parameters
 */
export interface RequestHandlerAdapter<Req, Res> extends DeclaredParams {
  readonly request: true;
  call(params: PathParams, request: Req): HandlerResult<Res>;
}

/**
 * Adapter for a handler that only sees its path parameters
 */
export interface ParamsHandlerAdapter<Res> extends DeclaredParams {
  readonly request: false;
  call(params: PathParams): HandlerResult<Res>;
}

/**
 * A handler together with the parameters it consumes
 */
export type HandlerAdapter<Req = HttpRequest, Res = Response> =
  | RequestHandlerAdapter<Req, Res>
  | ParamsHandlerAdapter<Res>;

/**
 * Plain functions are handlers with no path parameters that receive the request
 */
export type HandlerLike<Req = HttpRequest, Res = Response> =
  | HandlerAdapter<Req, Res>
  | ((request: Req) => HandlerResult<Res>);

export interface RouteOptions {
  methods?: Iterable<string>;
  priority?: number;
  name?: string;
}

/**
 * Declare the path parameters a handler consumes
 *
 * @example
 * defineHandler([{ name: 'id', type: 'int' }], ({ id }) => json({ id }))
 */
export function defineHandler<Res = Response>(
  params: readonly ParamDeclaration[],
  fn: (params: PathParams) => HandlerResult<Res>
): ParamsHandlerAdapter<Res> {
  return { params, request: false, call: fn };
}

/**
 * Like defineHandler, for handlers that also need the request
 */
export function defineRequestHandler<Req = HttpRequest, Res = Response>(
  params: readonly ParamDeclaration[],
  fn: (params: PathParams, request: Req) => HandlerResult<Res>
): RequestHandlerAdapter<Req, Res> {
  return { params, request: true, call: fn };
}

export function toHandlerAdapter<Req, Res>(handler: HandlerLike<Req, Res>): HandlerAdapter<Req, Res> {
  if (typeof handler === 'function') {
    return { params: [], request: true, call: (_params, request) => handler(request) };
  }
  return handler;
}

const COMPATIBLE_TYPES: Record<ParamKind, DeclaredType> = {
  str: 'str',
  int: 'int',
  float: 'float',
  uuid: 'uuid',
  multipath: 'str',
};

function normalizeDeclaration(declaration: ParamDeclaration): { name: string; type?: DeclaredType } {
  return typeof declaration === 'string' ? { name: declaration } : declaration;
}

function formatNames(names: Iterable<string>): string {
  return `[${[...names].join(', ')}]`;
}

/**
 * A single route
 */
export class Route<Req = HttpRequest, Res = Response> {
  readonly template: string;
  readonly pattern: CompiledPattern;
  readonly methods: ReadonlySet<HttpMethod>;
  readonly priority: number;
  readonly name?: string;
  readonly handler: HandlerAdapter<Req, Res>;
  private readonly parameterNames: readonly string[];

  constructor(template: string, handler: HandlerLike<Req, Res>, options: RouteOptions = {}) {
    this.template = normalizePath(template);
    this.methods = Route.parseMethods(options.methods ?? ['GET']);
    this.priority = Route.parsePriority(options.priority ?? 0);
    this.name = options.name;
    this.handler = toHandlerAdapter(handler);
    this.pattern = compilePattern(this.template);
    this.parameterNames = this.validateHandler();
  }

  private static parsePriority(priority: number): number {
    if (!Number.isInteger(priority)) {
      throw new ConfigurationError('INVALID_PRIORITY', `Route priority must be an integer, got ${priority}`);
    }
    return priority;
  }

  private static parseMethods(methods: Iterable<string>): ReadonlySet<HttpMethod> {
    const parsed = new Set<HttpMethod>();
    const invalid: string[] = [];

    for (const method of methods) {
      const upper = method.toUpperCase();
      if (isHttpMethod(upper)) {
        parsed.add(upper);
      } else {
        invalid.push(method);
      }
    }

    if (invalid.length > 0) {
      throw new ConfigurationError('INVALID_METHOD', `Invalid HTTP methods: ${formatNames(invalid)}`);
    }
    if (parsed.size === 0) {
      throw new ConfigurationError('INVALID_METHOD', 'A route needs at least one HTTP method');
    }

    return parsed;
  }

  /**
   * Check the handler's declared parameters against the pattern, both ways
   */
  private validateHandler(): string[] {
    const declared = this.handler.params.map(normalizeDeclaration);
    const declaredNames = new Set<string>();
    for (const { name } of declared) {
      if (declaredNames.has(name)) {
        throw new ConfigurationError(
          'PARAMETER_MISMATCH',
          `Handler declares parameter '${name}' more than once`
        );
      }
      declaredNames.add(name);
    }

    const routeNames = new Set(this.pattern.params.map((param) => param.name));

    const missingInHandler = [...routeNames].filter((name) => !declaredNames.has(name));
    if (missingInHandler.length > 0) {
      throw new ConfigurationError(
        'PARAMETER_MISMATCH',
        `Route pattern '${this.template}' defines path parameters ${formatNames(missingInHandler)} ` +
          `but the handler does not declare them. Handler parameters: ${formatNames(declaredNames)}`
      );
    }

    const missingInRoute = [...declaredNames].filter((name) => !routeNames.has(name));
    if (missingInRoute.length > 0) {
      throw new ConfigurationError(
        'PARAMETER_MISMATCH',
        `Handler declares path parameters ${formatNames(missingInRoute)} ` +
          `but route pattern '${this.template}' only defines ${formatNames(routeNames)}`
      );
    }

    for (const spec of this.pattern.params) {
      const declaration = declared.find((d) => d.name === spec.name);
      const expected = COMPATIBLE_TYPES[spec.kind];
      if (declaration?.type !== undefined && declaration.type !== expected) {
        throw new ConfigurationError(
          'PARAMETER_TYPE',
          `Parameter '${spec.name}' type mismatch: route expects ${spec.kind} ` +
            `but handler declares ${declaration.type}`
        );
      }
    }

    return [...declaredNames];
  }

  /**
   * Match a request path and method.
   * Returns the converted parameters, or null.
   */
  matches(path: string, method: string): PathParams | null {
    const upper = method.toUpperCase();
    if (!isHttpMethod(upper) || !this.methods.has(upper)) {
      return null;
    }
    return this.matchesPath(path);
  }

  /**
   * Match a request path, ignoring the method
   */
  matchesPath(path: string): PathParams | null {
    const { regex, segmentCount, hasTailParameter } = this.pattern;
    const normalized = normalizePath(path);

    // Cheap segment check before running the regex
    const requestSegments = countSegments(path);
    const segmentMatch =
      requestSegments === segmentCount ||
      countSegments(normalized) === segmentCount ||
      (requestSegments > segmentCount && hasTailParameter);

    if (!segmentMatch) {
      return null;
    }

    // Raw path first, so `/files/` can bind an empty tail
    if (hasTailParameter) {
      const raw = regex.exec(path);
      if (raw) {
        return this.extractParams(raw);
      }
    }

    const match = regex.exec(normalized);
    return match ? this.extractParams(match) : null;
  }

  private extractParams(match: RegExpExecArray): PathParams | null {
    const params: PathParams = {};
    for (const [index, spec] of this.pattern.params.entries()) {
      const value = convertParam(spec.kind, match[index + 1] ?? '');
      if (value === undefined) {
        return null;
      }
      params[spec.name] = value;
    }
    return params;
  }

  /**
   * Invoke the handler with the parameters it declared
   */
  async handle(request: Req, params: PathParams): Promise<Res> {
    const args: PathParams = {};
    for (const name of this.parameterNames) {
      if (name in params) {
        args[name] = params[name];
      }
    }

    const handler = this.handler;
    return handler.request ? await handler.call(args, request) : await handler.call(args);
  }

  /**
   * Copy this route under a new template
   */
  withTemplate(template: string): Route<Req, Res> {
    return new Route(template, this.handler, {
      methods: this.methods,
      priority: this.priority,
      name: this.name,
    });
  }

  /**
   * Build a concrete path for this route
   */
  url(params: Record<string, ParamValue> = {}, query?: Record<string, string | string[]>): string {
    return buildPath(this.pattern, params, query);
  }

  toString(): string {
    const methods = [...this.methods].sort().join(',');
    const priority = this.priority !== 0 ? ` priority=${this.priority}` : '';
    return `<Route ${methods} ${this.template}${priority}>`;
  }
}
