/**
 * Middleware Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { ConfigurationError, HttpError } from '../../framework/errors.ts';
import { HttpRequest } from '../../framework/http/request.ts';
import type { Middleware, Next, TerminalHandler } from '../../framework/http/types.ts';
import {
  MiddlewareChain,
  conditional,
  forMethods,
  forPath,
} from '../../framework/middleware/chain.ts';
import { cors } from '../../framework/middleware/cors.ts';
import { errorBoundary } from '../../framework/middleware/error.ts';
import { requestLogger } from '../../framework/middleware/logging.ts';
import { Logger, type LogEntry } from '../../framework/telemetry/logger.ts';

function traced(name: string, trace: string[]): Middleware<string, string> {
  return async (request, next) => {
    trace.push(`${name}-enter`);
    try {
      return await next(request);
    } finally {
      trace.push(`${name}-exit`);
    }
  };
}

function captureLogger(entries: LogEntry[]): Logger {
  return new Logger({ level: 'debug', output: (entry) => entries.push(entry) });
}

function runOne(
  middleware: Middleware,
  request: Request,
  terminal: TerminalHandler = () => new Response('ok')
): Promise<Response> {
  return new MiddlewareChain().add(middleware).build(terminal)(new HttpRequest(request));
}

// Chain

test('MiddlewareChain - first registered is outermost', async () => {
  const trace: string[] = [];
  const chain = new MiddlewareChain<string, string>();
  chain.add(traced('A', trace)).add(traced('B', trace)).add(traced('C', trace));

  const handler = chain.build(() => {
    trace.push('T');
    return 'done';
  });

  assert.equal(await handler('req'), 'done');
  assert.deepEqual(trace, ['A-enter', 'B-enter', 'C-enter', 'T', 'C-exit', 'B-exit', 'A-exit']);
});

test('MiddlewareChain - short-circuit skips inner layers and the terminal', async () => {
  const trace: string[] = [];
  const chain = new MiddlewareChain<string, string>();
  chain.add(traced('A', trace));
  chain.add(() => {
    trace.push('B-blocked');
    return 'denied';
  });
  chain.add(traced('C', trace));

  const handler = chain.build(() => {
    trace.push('T');
    return 'done';
  });

  assert.equal(await handler('req'), 'denied');
  assert.deepEqual(trace, ['A-enter', 'B-blocked', 'A-exit']);
});

test('MiddlewareChain - exit steps run when the terminal throws', async () => {
  const trace: string[] = [];
  const chain = new MiddlewareChain<string, string>();
  chain.add(traced('A', trace)).add(traced('B', trace));

  const handler = chain.build(() => {
    throw new Error('boom');
  });

  await assert.rejects(handler('req'), { message: 'boom' });
  assert.deepEqual(trace, ['A-enter', 'B-enter', 'B-exit', 'A-exit']);
});

test('MiddlewareChain - add after build fails and leaves the handler unchanged', async () => {
  const trace: string[] = [];
  const chain = new MiddlewareChain<string, string>();
  chain.add(traced('A', trace));
  const handler = chain.build(() => 'done');

  assert.throws(
    () => chain.add(traced('late', trace)),
    (error: unknown) => error instanceof ConfigurationError && error.code === 'CHAIN_BUILT'
  );
  assert.equal(chain.count(), 1);

  assert.equal(await handler('req'), 'done');
  assert.deepEqual(trace, ['A-enter', 'A-exit']);
});

test('MiddlewareChain - build again returns the same handler', () => {
  const chain = new MiddlewareChain<string, string>();
  const terminal = () => 'done';

  const first = chain.build(terminal);
  assert.equal(chain.build(terminal), first);
  assert.throws(() => chain.build(() => 'other'), ConfigurationError);
});

test('MiddlewareChain - state and count', () => {
  const chain = new MiddlewareChain<string, string>();
  assert.equal(chain.state, 'empty');
  assert.equal(chain.count(), 0);

  chain.add(traced('A', []));
  assert.equal(chain.state, 'accumulating');
  assert.equal(chain.count(), 1);

  chain.build(() => 'done');
  assert.equal(chain.state, 'built');
});

test('MiddlewareChain - empty chain calls the terminal', async () => {
  const handler = new MiddlewareChain<string, string>().build((request) => `T:${request}`);
  assert.equal(await handler('x'), 'T:x');
});

test('MiddlewareChain - middleware may replace the request', async () => {
  const chain = new MiddlewareChain<string, string>();
  chain.add((request, next) => next(`${request}+a`));
  chain.add((request, next) => next(`${request}+b`));

  const handler = chain.build((request) => request);
  assert.equal(await handler('x'), 'x+a+b');
});

test('MiddlewareChain - logs entering and leaving each layer', async () => {
  const entries: LogEntry[] = [];
  const chain = new MiddlewareChain<string, string>({ logger: captureLogger(entries) });

  async function auth(request: string, next: Next<string, string>): Promise<string> {
    return await next(request);
  }
  chain.add(auth);
  chain.add((request, next) => next(request));

  await chain.build(() => 'done')('req');
  assert.deepEqual(
    entries.map((entry) => entry.message),
    ['Entering auth', 'Entering middleware[1]', 'Exiting middleware[1]', 'Exiting auth']
  );
});

// Conditional wrappers

type Simple = { path: string; method: string };

function mark(label: string): Middleware<Simple, string> {
  return async (request, next) => `${label}(${await next(request)})`;
}

test('conditional - runs the middleware only when the predicate holds', async () => {
  const handler = new MiddlewareChain<Simple, string>()
    .add(conditional((request: Simple) => request.path === '/x', mark('c')))
    .build(() => 'T');

  assert.equal(await handler({ path: '/x', method: 'GET' }), 'c(T)');
  assert.equal(await handler({ path: '/y', method: 'GET' }), 'T');
});

test('forPath - matches by path prefix', async () => {
  const handler = new MiddlewareChain<Simple, string>()
    .add(forPath('/admin', mark('admin')))
    .build(() => 'T');

  assert.equal(await handler({ path: '/admin/users', method: 'GET' }), 'admin(T)');
  assert.equal(await handler({ path: '/public', method: 'GET' }), 'T');
});

test('forMethods - matches by method', async () => {
  const handler = new MiddlewareChain<Simple, string>()
    .add(forMethods(['post', 'put'], mark('write')))
    .build(() => 'T');

  assert.equal(await handler({ path: '/', method: 'POST' }), 'write(T)');
  assert.equal(await handler({ path: '/', method: 'GET' }), 'T');
});

// Error boundary

test('errorBoundary - production mode hides internal errors', async () => {
  const entries: LogEntry[] = [];
  const response = await runOne(
    errorBoundary({ logger: captureLogger(entries) }),
    new Request('http://localhost/fail'),
    () => {
      throw new Error('secret detail');
    }
  );

  assert.equal(response.status, 500);
  assert.deepEqual(await response.json(), { error: { message: 'Internal Server Error' } });
  assert.equal(entries.length, 1);
  assert.equal(entries[0]?.level, 'error');
  assert.equal(entries[0]?.message, 'Unhandled error');
  assert.equal(entries[0]?.error?.message, 'secret detail');
  assert.deepEqual(entries[0]?.context, { method: 'GET', path: '/fail' });
});

test('errorBoundary - debug mode exposes type, message and stack', async () => {
  const error = new TypeError('bad input');
  const response = await runOne(
    errorBoundary({ mode: 'debug' }),
    new Request('http://localhost/fail'),
    () => {
      throw error;
    }
  );

  assert.equal(response.status, 500);
  assert.deepEqual(await response.json(), {
    error: { type: 'TypeError', message: 'bad input', stack: error.stack },
  });
});

test('errorBoundary - HttpError maps to its status', async () => {
  const response = await runOne(errorBoundary(), new Request('http://localhost/users/1'), () => {
    throw new HttpError(404, 'No such user');
  });

  assert.equal(response.status, 404);
  assert.deepEqual(await response.json(), { error: { message: 'No such user' } });
});

test('errorBoundary - server HttpError messages stay hidden in production', async () => {
  const response = await runOne(errorBoundary(), new Request('http://localhost/'), () => {
    throw new HttpError(503, 'database unreachable');
  });

  assert.equal(response.status, 503);
  assert.deepEqual(await response.json(), { error: { message: 'Internal Server Error' } });
});

test('errorBoundary - passes successful responses through', async () => {
  const response = await runOne(errorBoundary(), new Request('http://localhost/'));
  assert.equal(response.status, 200);
  assert.equal(await response.text(), 'ok');
});

// Request logger

test('requestLogger - logs on the way in and out', async () => {
  const entries: LogEntry[] = [];
  await runOne(requestLogger({ logger: captureLogger(entries) }), new Request('http://localhost/users'));

  assert.equal(entries.length, 2);
  assert.equal(entries[0]?.level, 'debug');
  assert.equal(entries[0]?.message, '→ GET /users');
  assert.equal(entries[1]?.level, 'info');
  assert.match(entries[1]?.message ?? '', /^← GET \/users 200 [\d.]+ms$/);
  assert.equal(entries[1]?.context?.status, 200);
});

test('requestLogger - logs status 500 when the inner step throws', async () => {
  const entries: LogEntry[] = [];
  await assert.rejects(
    runOne(requestLogger({ logger: captureLogger(entries) }), new Request('http://localhost/x'), () => {
      throw new Error('boom');
    }),
    { message: 'boom' }
  );

  assert.equal(entries[1]?.context?.status, 500);
});

test('requestLogger - skips excluded paths', async () => {
  const entries: LogEntry[] = [];
  await runOne(requestLogger({ logger: captureLogger(entries) }), new Request('http://localhost/health'));
  assert.deepEqual(entries, []);
});

// CORS

test('cors - no Origin header adds no allow-origin header', async () => {
  const response = await runOne(cors(), new Request('http://localhost/'));
  assert.equal(response.headers.get('Access-Control-Allow-Origin'), null);
  assert.equal(await response.text(), 'ok');
});

test('cors - wildcard origin', async () => {
  const response = await runOne(
    cors(),
    new Request('http://localhost/', { headers: { Origin: 'http://a.test' } })
  );
  assert.equal(response.headers.get('Access-Control-Allow-Origin'), '*');
});

test('cors - allow list', async () => {
  const middleware = cors({ origin: ['http://a.test'] });

  const allowed = await runOne(
    middleware,
    new Request('http://localhost/', { headers: { Origin: 'http://a.test' } })
  );
  assert.equal(allowed.headers.get('Access-Control-Allow-Origin'), 'http://a.test');
  assert.equal(allowed.headers.get('Vary'), 'Origin');

  const denied = await runOne(
    middleware,
    new Request('http://localhost/', { headers: { Origin: 'http://b.test' } })
  );
  assert.equal(denied.headers.get('Access-Control-Allow-Origin'), null);
});

test('cors - answers preflight requests without calling the handler', async () => {
  let called = false;
  const response = await runOne(
    cors({ credentials: true }),
    new Request('http://localhost/items', {
      method: 'OPTIONS',
      headers: { Origin: 'http://a.test', 'Access-Control-Request-Method': 'POST' },
    }),
    () => {
      called = true;
      return new Response('ok');
    }
  );

  assert.equal(called, false);
  assert.equal(response.status, 204);
  assert.equal(response.headers.get('Access-Control-Allow-Methods'), 'GET, HEAD, PUT, PATCH, POST, DELETE');
  assert.equal(response.headers.get('Access-Control-Allow-Headers'), 'Content-Type, Authorization');
  assert.equal(response.headers.get('Access-Control-Allow-Credentials'), 'true');
  assert.equal(response.headers.get('Access-Control-Max-Age'), '86400');
});
