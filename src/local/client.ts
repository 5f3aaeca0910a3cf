import fetch, { RequestInit, Response } from 'node-fetch';
import https from 'https';
import {
  ControllerClientConfig,
  EnvelopeData,
  Envelope,
  QueryOptions,
  Session,
} from '../types/index.js';
import { AuthError, QueryError, TransportError, UnknownQueryError } from './errors.js';
import { parseEnvelope } from './envelope.js';
import { buildQueryRequest, isQueryName } from './queries.js';

type SessionState = 'authenticated' | 'queried' | 'logged-out';

export class UniFiControllerClient {
  private baseUrl: string;
  private username: string;
  private password: string;
  private site: string;
  private debug: boolean;
  private now: () => number;
  private sessions = new WeakMap<Session, SessionState>();

  // rejectUnauthorized follows verifyTls; controllers usually ship self-signed certs
  private agent: https.Agent;

  constructor(config: ControllerClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.username = config.username;
    this.password = config.password;
    this.site = config.site;
    this.debug = config.debug ?? false;
    this.now = config.now ?? Date.now;
    this.agent = new https.Agent({ rejectUnauthorized: config.verifyTls });

    this.log('UniFi controller client initialized');
    this.log(`Base URL: ${this.baseUrl}`);
    this.log(`Username: ${this.username}`);
    this.log(`Site: ${this.site}`);
    this.log(`TLS verification: ${config.verifyTls ? 'enabled' : 'disabled'}`);
  }

  // stdout belongs to the query result, so diagnostics go to stderr
  private log(message: string, data?: unknown) {
    if (this.debug) {
      console.error(`[DEBUG] ${message}`);
      if (data !== undefined) {
        console.error('[DEBUG]', JSON.stringify(data, null, 2));
      }
    }
  }

  private async send(path: string, options: RequestInit): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    const method = options.method || 'GET';
    this.log(`Request: ${method} ${url}`);

    let response: Response;
    try {
      response = await fetch(url, {
        ...options,
        agent: (parsed) => (parsed.protocol === 'https:' ? this.agent : undefined),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.log(`Transport failure: ${reason}`);
      throw new TransportError(`${method} ${path} failed: ${reason}`, undefined, { cause: error });
    }

    this.log(`Response: ${response.status} ${response.statusText}`);
    return response;
  }

  private async readEnvelope(response: Response, label: string): Promise<Envelope | undefined> {
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`${label}: failed to read response: ${reason}`, response.status, {
        cause: error,
      });
    }

    const envelope = parseEnvelope(text);
    if (envelope) {
      this.log(`${label} envelope:`, { meta: envelope.meta });
    } else {
      this.log(`${label}: response body is not a controller envelope`);
    }
    return envelope;
  }

  private sessionHeaders(session: Session): Record<string, string> {
    return {
      'Cookie': session.cookie,
      'Accept': 'application/json',
      ...(session.csrfToken ? { 'X-CSRF-Token': session.csrfToken } : {}),
    };
  }

  private requireSession(session: Session): void {
    const state = this.sessions.get(session);
    if (state === undefined) {
      throw new AuthError('Not logged in: session was not issued by this client');
    }
    if (state === 'logged-out') {
      throw new AuthError('Not logged in: session has been logged out');
    }
    if (state === 'queried') {
      throw new AuthError('Session already used for a query');
    }
  }

  async login(): Promise<Session> {
    this.log('Attempting login...');

    const response = await this.send('/api/login', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Accept': 'application/json',
        'Referer': `${this.baseUrl}/login`,
      },
      body: JSON.stringify({
        username: this.username,
        password: this.password,
      }),
    });

    const envelope = await this.readEnvelope(response, 'login');

    if (!response.ok || (envelope && envelope.meta.rc !== 'ok')) {
      const reason = envelope?.meta.msg ?? response.statusText;
      throw new AuthError(`Login failed: ${response.status} ${reason}`.trim(), response.status);
    }

    const cookie = (response.headers.raw()['set-cookie'] ?? [])
      .map((raw) => raw.split(';')[0].trim())
      .filter((pair) => pair.includes('='))
      .join('; ');

    if (!cookie) {
      throw new AuthError('Login failed: controller did not return a session cookie', response.status);
    }

    const csrfToken = response.headers.get('x-csrf-token') ?? undefined;
    const session: Session = Object.freeze(csrfToken ? { cookie, csrfToken } : { cookie });
    this.sessions.set(session, 'authenticated');

    this.log('Login successful!');
    return session;
  }

  async execute(
    session: Session,
    query: string,
    site: string = this.site,
    options: QueryOptions = {}
  ): Promise<EnvelopeData> {
    if (!isQueryName(query)) {
      throw new UnknownQueryError(query);
    }
    this.requireSession(session);
    this.sessions.set(session, 'queried');

    const request = buildQueryRequest(query, site, options, this.now());
    this.log(`Running ${query}...`);

    const response = await this.send(request.path, {
      method: request.method,
      headers: {
        ...this.sessionHeaders(session),
        ...(request.body ? { 'Content-Type': 'application/json' } : {}),
      },
      body: request.body,
    });

    const envelope = await this.readEnvelope(response, query);

    if (response.status === 401) {
      const reason = envelope?.meta.msg;
      throw new AuthError(
        `${query}: controller rejected the session${reason ? `: ${reason}` : ''}`,
        response.status
      );
    }

    if (!envelope) {
      throw new TransportError(
        `${query}: controller responded ${response.status} without a JSON envelope`,
        response.status
      );
    }

    if (envelope.meta.rc !== 'ok') {
      throw new QueryError(query, envelope.meta.msg, response.status);
    }

    if (!response.ok) {
      throw new TransportError(`${query}: controller responded ${response.status}`, response.status);
    }

    this.log(`${query} returned`, {
      entries: Array.isArray(envelope.data) ? envelope.data.length : typeof envelope.data,
    });
    return envelope.data;
  }

  async logout(session: Session): Promise<void> {
    const state = this.sessions.get(session);
    if (state === undefined || state === 'logged-out') {
      return;
    }

    this.log('Logging out...');
    this.sessions.set(session, 'logged-out');

    try {
      const response = await this.send('/api/logout', {
        method: 'POST',
        headers: this.sessionHeaders(session),
      });
      if (!response.ok) {
        console.warn(`[WARN] Logout returned ${response.status} ${response.statusText}`);
      }
    } catch (error) {
      console.warn(`[WARN] Logout failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
