/**
 * Path Pattern Compiler
 *
 * Turns templates such as `/users/{id:int}/files/{rest:multipath}` into an
 * anchored regular expression plus the ordered parameter metadata needed to
 * convert the captured groups.
 */

import { ConfigurationError, SwitchyardError } from '../errors.ts';

export type ParamKind = 'str' | 'int' | 'float' | 'uuid' | 'multipath';

export type ParamValue = string | number;

export type PathParams = Record<string, ParamValue>;

export interface ParameterSpec {
  name: string;
  kind: ParamKind;
}

export type PatternToken =
  | { type: 'literal'; value: string }
  | { type: 'param'; spec: ParameterSpec };

export interface CompiledPattern {
  template: string;
  tokens: readonly PatternToken[];
  params: readonly ParameterSpec[];
  regex: RegExp;
  segmentCount: number;
  hasTailParameter: boolean;
}

const KIND_PATTERNS: Record<ParamKind, string> = {
  str: '([^/]+)',
  int: '(\\d+)',
  float: '(\\d+(?:\\.\\d+)?)',
  uuid: '([0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12})',
  multipath: '(.*)',
};

const PARAM_NAME = /^[A-Za-z_$][\w$]*$/;

// Names that cannot be stored as own keys of a params object
const RESERVED_NAMES = new Set(['__proto__']);

export function isParamKind(value: string): value is ParamKind {
  return Object.hasOwn(KIND_PATTERNS, value);
}

/**
 * Strip the trailing slash of a path, keeping the root as `/`
 */
export function normalizePath(path: string): string {
  const stripped = path.replace(/\/+$/, '');
  return stripped === '' ? '/' : stripped;
}

/**
 * Join path fragments with exactly one slash between them
 * e.g., joinPaths('/api/', 'v1', '/users') -> '/api/v1/users'
 */
export function joinPaths(...parts: string[]): string {
  const segments = parts
    .map((part) => part.replace(/^\/+|\/+$/g, ''))
    .filter((part) => part.length > 0);
  return '/' + segments.join('/');
}

/**
 * Count path segments by counting separators.
 * The root path counts as one segment, and a trailing slash opens an
 * empty last segment.
 */
export function countSegments(path: string): number {
  if (path === '/' || path === '') return 1;

  const clean = path.endsWith('/') ? path.replace(/^\/+/, '') : path.replace(/^\/+|\/+$/g, '');
  if (clean === '') return 1;

  let count = 1;
  for (const char of clean) {
    if (char === '/') count++;
  }
  return count;
}

function escapeLiteral(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function parseParameter(body: string, position: number): ParameterSpec {
  const colon = body.indexOf(':');
  const name = colon === -1 ? body : body.slice(0, colon);
  const kind = colon === -1 ? 'str' : body.slice(colon + 1);

  if (!isParamKind(kind)) {
    throw new ConfigurationError('UNSUPPORTED_KIND', `Unsupported parameter type: ${kind}`);
  }
  if (!PARAM_NAME.test(name) || RESERVED_NAMES.has(name)) {
    throw new ConfigurationError(
      'INVALID_PARAMETER',
      `Invalid parameter name '${name}' at position ${position}`
    );
  }

  return { name, kind };
}

/**
 * Compile a path template
 */
export function compilePattern(template: string): CompiledPattern {
  if (template.includes('*')) {
    throw new ConfigurationError(
      'WILDCARD',
      `Wildcard patterns (*/**) are not supported in '${template}'. ` +
        'Use multipath parameters instead: {name:multipath}'
    );
  }

  const path = normalizePath(template);
  const tokens: PatternToken[] = [];
  const params: ParameterSpec[] = [];
  const seen = new Set<string>();
  let source = '^';
  let literal = '';

  const flushLiteral = () => {
    if (literal) {
      tokens.push({ type: 'literal', value: literal });
      source += escapeLiteral(literal);
      literal = '';
    }
  };

  let i = 0;
  while (i < path.length) {
    if (path[i] !== '{') {
      literal += path[i];
      i++;
      continue;
    }

    const end = path.indexOf('}', i);
    if (end === -1) {
      throw new ConfigurationError('UNCLOSED_PARAMETER', `Unclosed parameter at position ${i}`);
    }

    const spec = parseParameter(path.slice(i + 1, end), i);
    if (seen.has(spec.name)) {
      throw new ConfigurationError(
        'INVALID_PARAMETER',
        `Duplicate parameter '${spec.name}' in '${path}'`
      );
    }
    seen.add(spec.name);

    flushLiteral();
    tokens.push({ type: 'param', spec });
    params.push(spec);
    source += KIND_PATTERNS[spec.kind];
    i = end + 1;
  }
  flushLiteral();

  return {
    template: path,
    tokens,
    params,
    regex: new RegExp(source + '$'),
    segmentCount: countSegments(path),
    hasTailParameter: params.some((param) => param.kind === 'multipath'),
  };
}

/**
 * Percent-decode a captured value; undefined for a malformed escape
 */
export function decodeSegment(raw: string): string | undefined {
  try {
    return decodeURIComponent(raw);
  } catch (error) {
    if (error instanceof URIError) return undefined;
    throw error;
  }
}

/**
 * Convert a captured group according to its kind.
 * Captures are matched against the encoded path, so an encoded `/` never
 * splits a segment; string kinds are decoded afterwards.
 * Returns undefined when the value cannot be represented.
 */
export function convertParam(kind: ParamKind, raw: string): ParamValue | undefined {
  switch (kind) {
    case 'int': {
      const value = Number(raw);
      return Number.isSafeInteger(value) ? value : undefined;
    }
    case 'float': {
      const value = Number(raw);
      return Number.isFinite(value) ? value : undefined;
    }
    case 'uuid':
      return raw.toLowerCase();
    case 'str':
    case 'multipath':
      return decodeSegment(raw);
  }
}

/**
 * Build a URL from compiled tokens and parameters
 */
export function buildPath(
  pattern: CompiledPattern,
  params: Record<string, ParamValue>,
  query?: Record<string, string | string[]>
): string {
  let url = '';
  for (const token of pattern.tokens) {
    if (token.type === 'literal') {
      url += token.value;
      continue;
    }

    const value = params[token.spec.name];
    if (value === undefined) {
      throw new SwitchyardError(
        'MISSING_PARAMETER',
        `Missing value for path parameter '${token.spec.name}'`
      );
    }
    // multipath values keep their separators
    url += token.spec.kind === 'multipath'
      ? String(value).split('/').map(encodeURIComponent).join('/')
      : encodeURIComponent(String(value));
  }

  if (query && Object.keys(query).length > 0) {
    const searchParams = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (Array.isArray(value)) {
        for (const v of value) {
          searchParams.append(key, v);
        }
      } else {
        searchParams.append(key, value);
      }
    }
    url += '?' + searchParams.toString();
  }

  return url;
}
