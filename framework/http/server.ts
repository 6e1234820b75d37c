/**
 * HTTP Server
 *
 * Bridges node:http to the WHATWG Request/Response objects the rest of the
 * framework works with.
 */

import { createServer, type IncomingHttpHeaders, type Server as NodeServer, type ServerResponse } from 'node:http';

export type FetchHandler = (request: Request) => Promise<Response>;

export interface ServerOptions {
  port?: number;
  hostname?: string;
  onListen?: (address: { hostname: string; port: number }) => void;
  onError?: (error: unknown) => Response;
}

/**
 * The parts of an IncomingMessage needed to build a Request
 */
export interface IncomingLike extends AsyncIterable<Uint8Array | string> {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
}

async function readBody(incoming: IncomingLike) {
  const chunks: Buffer[] = [];
  for await (const chunk of incoming) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
  }
  return chunks.length > 0 ? new Uint8Array(Buffer.concat(chunks)) : undefined;
}

/**
 * Origin used to turn request targets into absolute URLs
 */
export function serverOrigin(hostname: string, port?: number): string {
  const host = hostname.includes(':') ? `[${hostname}]` : hostname;
  return port === undefined ? `http://${host}` : `http://${host}:${port}`;
}

/**
 * Convert an incoming node:http message to a Request.
 * Origin-form targets are appended to `base` verbatim, so a leading `//`
 * stays part of the path.
 */
export async function toWebRequest(incoming: IncomingLike, base: string): Promise<Request> {
  const method = incoming.method ?? 'GET';
  const headers = new Headers();

  for (const [name, value] of Object.entries(incoming.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const v of value) {
        headers.append(name, v);
      }
    } else {
      headers.set(name, value);
    }
  }

  const body = method !== 'GET' && method !== 'HEAD' ? await readBody(incoming) : undefined;

  const target = incoming.url ?? '/';
  const url = target.startsWith('/') ? new URL(base + target) : new URL(target, base);

  return new Request(url, { method, headers, body });
}

/**
 * The parts of a ServerResponse needed to write a Response
 */
export interface OutgoingLike {
  statusCode: number;
  setHeader(name: string, value: string | string[]): unknown;
  end(body?: Uint8Array): unknown;
}

/**
 * Write a Response to a node:http ServerResponse
 */
export async function writeWebResponse(res: OutgoingLike, response: Response): Promise<void> {
  res.statusCode = response.status;

  const cookies = response.headers.getSetCookie();
  response.headers.forEach((value, name) => {
    if (name !== 'set-cookie') {
      res.setHeader(name, value);
    }
  });
  if (cookies.length > 0) {
    res.setHeader('set-cookie', cookies);
  }

  const body = response.body ? Buffer.from(await response.arrayBuffer()) : undefined;
  res.end(body);
}

/**
 * Fill in the port and hostname; an explicit `undefined` takes the default
 */
export function withServerDefaults(options: ServerOptions): ServerOptions {
  return {
    ...options,
    port: options.port ?? 8000,
    hostname: options.hostname ?? '0.0.0.0',
  };
}

/**
 * HTTP server serving a fetch-style handler
 */
export class Server {
  private handler: FetchHandler;
  private options: ServerOptions;
  private server: NodeServer | null = null;

  constructor(handler: FetchHandler, options: ServerOptions = {}) {
    this.handler = handler;
    this.options = withServerDefaults(options);
  }

  /**
   * Start listening; resolves once the socket is bound
   */
  listen(): Promise<{ hostname: string; port: number }> {
    const hostname = this.options.hostname ?? '0.0.0.0';
    const base = serverOrigin(hostname);

    const server = createServer((req, res) => {
      this.respond(req, res, base).catch((error: unknown) => {
        res.destroy(error instanceof Error ? error : new Error(String(error)));
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.port, hostname, () => {
        server.off('error', reject);
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.options.port ?? 0;
        const bound = { hostname, port };
        this.options.onListen?.(bound);
        resolve(bound);
      });
    });
  }

  private async respond(req: IncomingLike, res: ServerResponse, base: string): Promise<void> {
    let response: Response;
    try {
      response = await this.handler(await toWebRequest(req, base));
    } catch (error) {
      response = this.options.onError
        ? this.options.onError(error)
        : new Response('Internal Server Error', { status: 500 });
    }
    await writeWebResponse(res, response);
  }

  /**
   * Stop accepting connections and wait for open ones to finish
   */
  close(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();

    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
