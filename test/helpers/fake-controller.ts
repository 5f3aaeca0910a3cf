import http from 'http';
import https from 'https';
import { readFileSync } from 'fs';

export interface RecordedRequest {
  method: string;
  path: string;
  headers: http.IncomingHttpHeaders;
  body: string;
}

export interface FakeReply {
  status?: number;
  headers?: Record<string, string | string[]>;
  // Objects are sent as JSON; strings verbatim
  body?: unknown;
}

type Route = FakeReply | ((request: RecordedRequest) => FakeReply);

export const TEST_USERNAME = 'admin';
export const TEST_PASSWORD = 'test-secret';
export const TEST_COOKIE = 'unifises=test-session-cookie';
export const TEST_CSRF = 'test-csrf';

export function envelope(data: unknown, rc = 'ok', msg?: string) {
  return { meta: msg === undefined ? { rc } : { rc, msg }, data };
}

export function loadTlsFixture() {
  return {
    key: readFileSync(new URL('../fixtures/localhost.key', import.meta.url)),
    cert: readFileSync(new URL('../fixtures/localhost.crt', import.meta.url)),
  };
}

/**
 * In-process stand-in for a UniFi controller. Routes are keyed by
 * `METHOD /path` (query string excluded); every request is recorded.
 */
export class FakeController {
  readonly requests: RecordedRequest[] = [];
  private routes = new Map<string, Route>();
  private server: http.Server;
  private scheme: 'http' | 'https';

  constructor(tls?: { key: Buffer; cert: Buffer }) {
    const handler = (req: http.IncomingMessage, res: http.ServerResponse) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => {
        const recorded: RecordedRequest = {
          method: req.method ?? 'GET',
          path: req.url ?? '/',
          headers: req.headers,
          body: Buffer.concat(chunks).toString('utf8'),
        };
        this.requests.push(recorded);

        const pathname = recorded.path.split('?')[0];
        const route = this.routes.get(`${recorded.method} ${pathname}`);
        const reply: FakeReply = route === undefined
          ? { status: 404, body: envelope([], 'error', 'api.err.NotFound') }
          : typeof route === 'function'
            ? route(recorded)
            : route;

        res.statusCode = reply.status ?? 200;
        for (const [name, value] of Object.entries(reply.headers ?? {})) {
          res.setHeader(name, value);
        }
        if (typeof reply.body === 'string') {
          res.end(reply.body);
        } else if (reply.body !== undefined) {
          res.setHeader('Content-Type', 'application/json');
          res.end(JSON.stringify(reply.body));
        } else {
          res.end();
        }
      });
    };

    this.scheme = tls ? 'https' : 'http';
    this.server = tls ? https.createServer(tls, handler) : http.createServer(handler);

    this.on('POST /api/login', (request) => {
      const credentials: unknown = JSON.parse(request.body || '{}');
      const valid =
        typeof credentials === 'object' &&
        credentials !== null &&
        'username' in credentials &&
        'password' in credentials &&
        credentials.username === TEST_USERNAME &&
        credentials.password === TEST_PASSWORD;

      if (!valid) {
        return { status: 400, body: envelope([], 'error', 'api.err.Invalid') };
      }
      return {
        headers: {
          'Set-Cookie': [`${TEST_COOKIE}; Path=/; HttpOnly`, `csrf_token=${TEST_CSRF}; Path=/`],
          'X-CSRF-Token': TEST_CSRF,
        },
        body: envelope([]),
      };
    });
    this.on('POST /api/logout', { body: envelope([]) });
  }

  on(route: string, reply: Route): this {
    this.routes.set(route, reply);
    return this;
  }

  async start(): Promise<string> {
    await new Promise<void>((resolve) => this.server.listen(0, '127.0.0.1', resolve));
    const address = this.server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Fake controller is not listening on a TCP port');
    }
    return `${this.scheme}://127.0.0.1:${address.port}`;
  }

  async stop(): Promise<void> {
    this.server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  requestsTo(pathname: string): RecordedRequest[] {
    return this.requests.filter((request) => request.path.split('?')[0] === pathname);
  }
}
