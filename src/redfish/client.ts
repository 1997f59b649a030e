import type { Logger } from 'pino';

import type { Env, RedfishDefaults } from '../config.js';
import { ensureError, RedfishMcpError, validationError } from '../errors.js';
import { AUTH_METHODS, type AuthMethod, type HostEntry } from '../hosts/hostRegistry.js';
import { loadRetryConfig, RetryPolicy, type RetryConfig } from './retryPolicy.js';
import {
  HttpRedfishTransport,
  selectResourceHeaders,
  type HttpMethod,
  type RedfishResponse,
  type RedfishTransport,
  type ResolvedConnection
} from './transport.js';

export interface RedfishClientOptions {
  logger: Logger;
  timeoutMs: number;
  /** Read from `env` on every connect when omitted. */
  retryConfig?: RetryConfig;
  env?: Env;
  sleep?: (ms: number) => Promise<void>;
  transportFactory?: (connection: ResolvedConnection) => RedfishTransport;
}

export interface ResourceWithHeaders {
  headers: Record<string, string | string[]>;
  data: Record<string, unknown>;
}

function isAuthMethod(value: string): value is AuthMethod {
  return AUTH_METHODS.some((method) => method === value);
}

function formatAuthority(address: string): string {
  return address.includes(':') && !address.startsWith('[') ? `[${address}]` : address;
}

/**
 * Host-specific settings win over the global defaults. Empty strings count
 * as unset, so a host with `"username": ""` inherits the default username.
 */
export function resolveConnection(host: HostEntry, defaults: RedfishDefaults): ResolvedConnection {
  const authMethod = host.authMethod || defaults.authMethod;
  if (!isAuthMethod(authMethod)) {
    throw validationError(`Invalid auth_method: ${authMethod}. Allowed values: ${AUTH_METHODS.join(', ')}`, {
      address: host.address
    });
  }

  const port = host.port || defaults.port || 443;
  const tlsServerCaCert = host.tlsServerCaCert || defaults.tlsServerCaCert;

  return {
    address: host.address,
    port,
    baseUrl: `https://${formatAuthority(host.address)}:${port}`,
    authMethod,
    username: host.username || defaults.username,
    password: host.password || defaults.password,
    ...(tlsServerCaCert ? { tlsServerCaCert } : {})
  };
}

export class RedfishClient {
  private transport: RedfishTransport | null = null;
  private closed = false;

  private constructor(
    readonly connection: ResolvedConnection,
    private readonly retry: RetryPolicy,
    private readonly logger: Logger
  ) {}

  /**
   * Resolves the host settings and logs in. Connection failures during login
   * are retried; authentication and configuration failures are not.
   */
  static async connect(host: HostEntry, defaults: RedfishDefaults, options: RedfishClientOptions): Promise<RedfishClient> {
    const connection = resolveConnection(host, defaults);
    const retry = new RetryPolicy({
      config: options.retryConfig ?? loadRetryConfig(options.env ?? process.env),
      logger: options.logger,
      sleep: options.sleep
    });
    const transportFactory =
      options.transportFactory ??
      ((resolved: ResolvedConnection) =>
        new HttpRedfishTransport({ connection: resolved, timeoutMs: options.timeoutMs, logger: options.logger }));

    const client = new RedfishClient(connection, retry, options.logger);
    await client.setup(transportFactory(connection));
    return client;
  }

  private async setup(transport: RedfishTransport): Promise<void> {
    this.logger.info({ baseUrl: this.connection.baseUrl, authMethod: this.connection.authMethod }, 'Setting up Redfish client');

    try {
      await this.retry.run(`Redfish login to ${this.connection.address}`, async () => {
        try {
          await transport.login();
        } catch (error) {
          this.logger.error(
            { address: this.connection.address, error: ensureError(error).message },
            'Failed to create Redfish client'
          );
          throw new RedfishMcpError('REDFISH_ERROR', `Failed to create Redfish client: ${ensureError(error).message}`, {
            cause: error,
            details: { operation: 'login', address: this.connection.address }
          });
        }
      });
    } catch (error) {
      await transport.logout().catch((logoutError: unknown) => {
        this.logger.debug({ error: ensureError(logoutError).message }, 'Releasing failed Redfish transport failed');
      });
      throw error;
    }

    this.transport = transport;
    this.logger.info({ address: this.connection.address }, 'Redfish client setup completed');
  }

  private async perform(method: HttpMethod, path: string, body?: Record<string, unknown>): Promise<RedfishResponse> {
    const transport = this.transport;
    if (!transport) {
      throw new RedfishMcpError('NOT_INITIALIZED', 'Redfish client not initialized');
    }

    this.logger.debug({ method, path, address: this.connection.address }, 'Performing Redfish request');

    let response: RedfishResponse | null;
    try {
      response = await transport.request(method, path, body);
    } catch (error) {
      const message = ensureError(error).message;
      this.logger.warn({ method, path, address: this.connection.address, error: message }, 'Redfish request failed');
      throw new RedfishMcpError('REDFISH_ERROR', `Redfish ${method} request failed: ${message}`, {
        cause: error,
        statusCode: error instanceof RedfishMcpError ? error.statusCode : undefined,
        details: { operation: method, path, address: this.connection.address }
      });
    }

    if (response === null) {
      this.logger.error({ method, path }, 'Redfish request returned no response');
      throw new RedfishMcpError('EMPTY_RESPONSE', `Redfish ${method} request returned no response`, {
        details: { operation: method, path }
      });
    }

    return response;
  }

  private async read(path: string): Promise<RedfishResponse & { data: Record<string, unknown> }> {
    const response = await this.perform('GET', path);
    const data = response.data;
    if (data === null) {
      throw new RedfishMcpError('EMPTY_RESPONSE', 'Redfish GET request returned an empty body', {
        statusCode: response.status,
        details: { operation: 'GET', path }
      });
    }
    return { ...response, data };
  }

  async get(path: string): Promise<Record<string, unknown>> {
    return this.retry.run(`Redfish GET ${path}`, async () => {
      const response = await this.read(path);
      this.logger.debug({ path }, 'Retrieved Redfish resource');
      return response.data;
    });
  }

  async getWithHeaders(path: string): Promise<ResourceWithHeaders> {
    return this.retry.run(`Redfish GET ${path}`, async () => {
      const response = await this.read(path);
      return {
        headers: selectResourceHeaders(response.headers),
        data: response.data
      };
    });
  }

  async post(path: string, body: Record<string, unknown>): Promise<Record<string, unknown>> {
    return this.retry.run(`Redfish POST ${path}`, async () => {
      const response = await this.perform('POST', path, body);
      return response.data ?? {};
    });
  }

  async patch(path: string, body: Record<string, unknown>): Promise<Record<string, unknown>> {
    return this.retry.run(`Redfish PATCH ${path}`, async () => {
      const response = await this.perform('PATCH', path, body);
      return response.data ?? {};
    });
  }

  async delete(path: string): Promise<Record<string, unknown>> {
    return this.retry.run(`Redfish DELETE ${path}`, async () => {
      const response = await this.perform('DELETE', path);
      return response.data ?? {};
    });
  }

  /** Best-effort logout. Never throws; later calls are no-ops. */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const transport = this.transport;
    this.transport = null;
    if (!transport) {
      return;
    }

    try {
      await transport.logout();
      this.logger.info({ address: this.connection.address }, 'Redfish client logged out');
    } catch (error) {
      this.logger.warn({ address: this.connection.address, error: ensureError(error).message }, 'Error during Redfish logout');
    }
  }
}

/** Connects, runs `fn`, and logs out on every exit path. */
export async function withRedfishClient<T>(
  host: HostEntry,
  defaults: RedfishDefaults,
  options: RedfishClientOptions,
  fn: (client: RedfishClient) => Promise<T>
): Promise<T> {
  const client = await RedfishClient.connect(host, defaults, options);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
