import { readFile } from 'node:fs/promises';
import type { Logger } from 'pino';
import { Agent, request, type Dispatcher } from 'undici';

import { RedfishMcpError, transportCodeOf, validationError } from '../errors.js';
import type { AuthMethod } from '../hosts/hostRegistry.js';

export const SERVICE_ROOT_PATH = '/redfish/v1';
const SESSIONS_PATH = '/redfish/v1/SessionService/Sessions';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export type ResponseHeaders = Record<string, string | string[] | undefined>;

export interface RedfishResponse {
  status: number;
  /** Lower-cased names; repeated headers arrive as arrays. */
  headers: ResponseHeaders;
  /** Parsed JSON object, or null for an empty body. */
  data: Record<string, unknown> | null;
}

export interface ResolvedConnection {
  address: string;
  port: number;
  baseUrl: string;
  authMethod: AuthMethod;
  username: string;
  password: string;
  tlsServerCaCert?: string;
}

/**
 * Wire seam under the resilient client: one authenticated conversation with
 * one host. `request` resolves to null when the host produced no response.
 */
export interface RedfishTransport {
  login(): Promise<void>;
  request(method: HttpMethod, path: string, body?: Record<string, unknown>): Promise<RedfishResponse | null>;
  logout(): Promise<void>;
}

export interface HttpRequestOptions {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  dispatcher: Dispatcher;
  headersTimeout: number;
  bodyTimeout: number;
}

export interface HttpResponseData {
  statusCode: number;
  headers: ResponseHeaders;
  body: { text(): Promise<string> };
}

export type HttpRequestFn = (url: string, options: HttpRequestOptions) => Promise<HttpResponseData>;

export interface HttpRedfishTransportOptions {
  connection: ResolvedConnection;
  timeoutMs: number;
  logger: Logger;
  requestImpl?: HttpRequestFn;
  readFileImpl?: (path: string) => Promise<string>;
}

const RESOURCE_HEADER_NAMES = ['Allow', 'Content-Type', 'Content-Encoding', 'ETag', 'Link', 'OData-Version'] as const;

/** Picks the headers an agent needs to navigate a resource, with canonical names. */
export function selectResourceHeaders(headers: ResponseHeaders): Record<string, string | string[]> {
  const result: Record<string, string | string[]> = {};
  for (const name of RESOURCE_HEADER_NAMES) {
    const value = headers[name.toLowerCase()];
    if (value === undefined) {
      continue;
    }
    result[name] = Array.isArray(value) && value.length === 1 ? value[0] ?? '' : value;
  }
  return result;
}

function firstHeader(headers: ResponseHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseBody(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function extractRedfishMessage(payload: unknown): string | undefined {
  if (!isRecord(payload) || !isRecord(payload.error)) {
    return undefined;
  }
  const extended = payload.error['@Message.ExtendedInfo'];
  if (Array.isArray(extended)) {
    const first: unknown = extended[0];
    if (isRecord(first) && typeof first.Message === 'string') {
      return first.Message;
    }
  }
  return typeof payload.error.message === 'string' ? payload.error.message : undefined;
}

const defaultRequest: HttpRequestFn = (url, options) => request(url, options);

export class HttpRedfishTransport implements RedfishTransport {
  private readonly requestImpl: HttpRequestFn;
  private readonly readFileImpl: (path: string) => Promise<string>;
  private dispatcher: Agent | null = null;
  private authHeaders: Record<string, string> | null = null;
  private sessionUri: string | null = null;

  constructor(private readonly options: HttpRedfishTransportOptions) {
    this.requestImpl = options.requestImpl ?? defaultRequest;
    this.readFileImpl = options.readFileImpl ?? ((path) => readFile(path, 'utf8'));
  }

  private async ensureDispatcher(): Promise<Agent> {
    if (this.dispatcher) {
      return this.dispatcher;
    }

    const caPath = this.options.connection.tlsServerCaCert;
    if (!caPath) {
      // BMCs ship self-signed certificates; verification needs a configured CA.
      this.dispatcher = new Agent({ connect: { rejectUnauthorized: false } });
      return this.dispatcher;
    }

    let ca: string;
    try {
      ca = await this.readFileImpl(caPath);
    } catch (error) {
      throw new RedfishMcpError('CONFIG', `Unable to read TLS CA certificate ${caPath}`, { cause: error });
    }
    this.dispatcher = new Agent({ connect: { ca, rejectUnauthorized: true } });
    return this.dispatcher;
  }

  private resolveUrl(target: string): string {
    const base = new URL(this.options.connection.baseUrl);
    let path: string;
    if (/^https?:\/\//i.test(target)) {
      const absolute = new URL(target);
      if (absolute.hostname !== base.hostname) {
        throw validationError(`Resource ${target} does not belong to host ${base.hostname}`);
      }
      path = `${absolute.pathname}${absolute.search}`;
    } else {
      path = target.startsWith('/') ? target : `/${target}`;
    }

    // `//host` and `/\host` would resolve as a network path to another server.
    if (/^\/[\\/]/.test(path) || path.includes('\\')) {
      throw validationError(`Resource ${target} does not belong to host ${base.hostname}`);
    }
    const resolved = new URL(`${base.origin}${path}`);
    if (resolved.host !== base.host) {
      throw validationError(`Resource ${target} does not belong to host ${base.hostname}`);
    }
    return resolved.toString();
  }

  private async send(
    method: HttpMethod,
    target: string,
    body?: Record<string, unknown>,
    headers: Record<string, string> = {}
  ): Promise<RedfishResponse> {
    const url = this.resolveUrl(target);
    const dispatcher = await this.ensureDispatcher();
    const path = new URL(url).pathname;

    this.options.logger.debug({ method, url }, 'Redfish HTTP request');

    let status: number;
    let responseHeaders: ResponseHeaders;
    let text: string;
    try {
      const response = await this.requestImpl(url, {
        method,
        headers: {
          Accept: 'application/json',
          'OData-Version': '4.0',
          ...(body ? { 'Content-Type': 'application/json' } : {}),
          ...headers
        },
        body: body ? JSON.stringify(body) : undefined,
        dispatcher,
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs
      });
      status = response.statusCode;
      responseHeaders = response.headers;
      text = await response.body.text();
    } catch (error) {
      const transportCode = transportCodeOf(error);
      if (transportCode === 'TIMEOUT') {
        throw new RedfishMcpError('TIMEOUT', `${method} ${path} timed out`, { cause: error });
      }
      if (transportCode === 'NETWORK') {
        throw new RedfishMcpError('NETWORK', `Network failure for ${method} ${path}`, { cause: error });
      }
      throw new RedfishMcpError('REDFISH_ERROR', `${method} ${path} could not be sent`, { cause: error });
    }

    const parsed = text.trim() ? parseBody(text) : { ok: true as const, value: null };

    if (status >= 400) {
      const payload = parsed.ok ? parsed.value : text.slice(0, 500);
      const detail = extractRedfishMessage(payload) ?? `HTTP ${status}`;
      const code = status === 401 || status === 403 ? 'AUTH' : status === 404 ? 'NOT_FOUND' : 'HTTP_ERROR';
      throw new RedfishMcpError(code, `${method} ${path} failed: ${detail}`, {
        statusCode: status,
        details: { status, body: payload }
      });
    }

    const value = parsed.ok ? parsed.value : undefined;
    if (value === null) {
      return { status, headers: responseHeaders, data: null };
    }
    if (!isRecord(value)) {
      throw new RedfishMcpError('REDFISH_ERROR', `${method} ${path} returned a body that is not a JSON object`, {
        statusCode: status
      });
    }

    return { status, headers: responseHeaders, data: value };
  }

  async login(): Promise<void> {
    const { authMethod, username, password } = this.options.connection;

    if (authMethod === 'basic') {
      this.authHeaders = {
        Authorization: `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`
      };
      await this.send('GET', SERVICE_ROOT_PATH, undefined, this.authHeaders);
      return;
    }

    const response = await this.send('POST', SESSIONS_PATH, { UserName: username, Password: password });
    const token = firstHeader(response.headers, 'x-auth-token');
    if (!token) {
      throw new RedfishMcpError('AUTH', 'Session login did not return an X-Auth-Token header', {
        statusCode: response.status
      });
    }
    this.authHeaders = { 'X-Auth-Token': token };
    const location = firstHeader(response.headers, 'location');
    const odataId = response.data?.['@odata.id'];
    this.sessionUri = location ?? (typeof odataId === 'string' ? odataId : null);
  }

  async request(method: HttpMethod, path: string, body?: Record<string, unknown>): Promise<RedfishResponse | null> {
    if (!this.authHeaders) {
      throw new RedfishMcpError('NOT_INITIALIZED', 'Redfish transport is not logged in');
    }
    return this.send(method, path, body, this.authHeaders);
  }

  async logout(): Promise<void> {
    const headers = this.authHeaders;
    const sessionUri = this.sessionUri;
    this.authHeaders = null;
    this.sessionUri = null;

    try {
      if (headers && sessionUri) {
        await this.send('DELETE', sessionUri, undefined, headers);
      }
    } finally {
      const dispatcher = this.dispatcher;
      this.dispatcher = null;
      await dispatcher?.close();
    }
  }
}
