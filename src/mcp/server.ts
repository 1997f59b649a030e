import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import * as z from 'zod/v4';
import type { Logger } from 'pino';

import type { AppConfig } from '../config.js';
import { actionableErrorFields, asRedfishMcpError, RedfishMcpError, validationError, type ErrorCode } from '../errors.js';
import type { HostEntry, HostRegistry } from '../hosts/hostRegistry.js';
import type { DiscoveryTask } from '../discovery/discoveryTask.js';
import { withRedfishClient, type RedfishClientOptions } from '../redfish/client.js';

export const SERVER_NAME = 'mcp-redfish';
export const SERVER_VERSION = '1.0.0';

export interface ServerDependencies {
  config: AppConfig;
  logger: Logger;
  registry: HostRegistry;
  /** One-off discovery used by `redfish.discovery.run`. */
  discovery?: { discover(timeoutMs: number): Promise<HostEntry[]> };
  discoveryTask?: DiscoveryTask;
  clientOptions?: Partial<RedfishClientOptions>;
}

export interface ResourceTarget {
  address: string;
  path: string;
}

function toJsonText(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

function successResult(data: unknown) {
  const structuredContent: Record<string, unknown> = {
    result: data
  };
  return {
    content: [
      {
        type: 'text' as const,
        text: toJsonText(data)
      }
    ],
    structuredContent
  };
}

function errorResult(code: ErrorCode, message: string, details?: unknown) {
  const actionable = actionableErrorFields(code);
  const error =
    details === undefined
      ? {
          code,
          message,
          ...actionable
        }
      : {
          code,
          message,
          ...actionable,
          details
        };
  return {
    isError: true,
    content: [
      {
        type: 'text' as const,
        text: toJsonText({
          error
        })
      }
    ],
    structuredContent: {
      error
    }
  };
}

/**
 * A wrapper carrying only context reports the code of what it wraps, so the
 * caller sees AUTH or NOT_FOUND rather than a generic failure.
 */
function reportedError(error: RedfishMcpError): { code: ErrorCode; details?: Record<string, unknown> } {
  const cause = error.cause;
  const details = {
    ...(error.details ?? {}),
    ...(error.attempts !== undefined ? { attempts: error.attempts } : {}),
    ...(error.statusCode !== undefined ? { statusCode: error.statusCode } : {})
  };
  const code = error.code === 'REDFISH_ERROR' && cause instanceof RedfishMcpError ? cause.code : error.code;
  return Object.keys(details).length ? { code, details } : { code };
}

/** Splits a resource URL into a registry address and a resource path. */
export function parseResourceUrl(url: string): ResourceTarget {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw validationError(`Invalid URL: missing server address or resource path: ${url}`);
  }

  const address = parsed.hostname.replace(/^\[(.*)\]$/, '$1');
  const path = parsed.pathname === '/' ? '' : parsed.pathname;
  if (!address || !path) {
    throw validationError(`Invalid URL: missing server address or resource path: ${url}`);
  }
  // A leading `//` (or `/\`, which the parser normalises to it) names a second host.
  if (path.startsWith('//')) {
    throw validationError(`Invalid URL: resource path must not start with '//': ${url}`);
  }

  return { address, path: `${path}${parsed.search}` };
}

export function buildMcpServer(deps: ServerDependencies): McpServer {
  const { config, logger, registry } = deps;
  const clientOptions: RedfishClientOptions = {
    logger,
    timeoutMs: config.requestTimeoutMs,
    ...deps.clientOptions
  };

  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
      websiteUrl: 'https://www.dmtf.org/standards/redfish'
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  async function runTool<T>(tool: string, details: Record<string, unknown>, fn: () => Promise<T>) {
    const started = Date.now();
    try {
      const data = await fn();
      logger.info({ tool, ...details, durationMs: Date.now() - started }, 'Tool call succeeded');
      return successResult(data);
    } catch (error) {
      const mapped = asRedfishMcpError(error);
      const reported = reportedError(mapped);
      logger.warn(
        { tool, ...details, durationMs: Date.now() - started, errorCode: reported.code, kind: mapped.kind },
        mapped.message
      );
      return errorResult(reported.code, mapped.message, reported.details);
    }
  }

  server.registerTool(
    'redfish.servers.list',
    {
      description: 'List the addresses of all Redfish servers that can be accessed, configured or discovered.'
    },
    async () => {
      return runTool('redfish.servers.list', {}, async () => {
        const servers = registry.addresses();
        if (!servers.length) {
          logger.warn('No Redfish servers found');
        }
        return { servers };
      });
    }
  );

  server.registerTool(
    'redfish.resource.get',
    {
      description:
        'Fetch a Redfish resource and return its headers and JSON data. ' +
        "Build URLs as 'https://<server address>/redfish/v1/<resource path>', starting from the service root " +
        'and following @odata.id links.',
      inputSchema: {
        url: z.string().min(1)
      }
    },
    async ({ url }) => {
      return runTool('redfish.resource.get', { url }, async () => {
        const target = parseResourceUrl(url);
        const host = registry.find(target.address);
        if (!host) {
          throw validationError(`Server ${target.address} not found in config`, { address: target.address });
        }

        return withRedfishClient(host, config.redfishDefaults, clientOptions, (client) =>
          client.getWithHeaders(target.path)
        );
      });
    }
  );

  server.registerTool(
    'redfish.health.get',
    {
      description: 'Report known Redfish hosts and the state of endpoint discovery.'
    },
    async () => {
      return runTool('redfish.health.get', {}, async () => {
        return {
          server: { name: SERVER_NAME, version: SERVER_VERSION },
          transport: config.mcpTransport,
          hosts: registry.counts(),
          discovery: {
            enabled: config.discoveryEnabled,
            intervalSec: config.discoveryIntervalSec,
            ...(deps.discoveryTask ? deps.discoveryTask.status() : {})
          },
          checkedAt: new Date().toISOString()
        };
      });
    }
  );

  server.registerTool(
    'redfish.discovery.run',
    {
      description: 'Run one SSDP discovery cycle now and return the Redfish endpoints that answered.',
      inputSchema: {
        timeoutSec: z.number().int().min(1).max(60).optional()
      }
    },
    async ({ timeoutSec }) => {
      return runTool('redfish.discovery.run', { timeoutSec }, async () => {
        const discovery = deps.discovery;
        if (!config.discoveryEnabled || !discovery) {
          throw validationError('Redfish discovery is disabled. Set REDFISH_DISCOVERY_ENABLED=true to enable it.');
        }

        const found = await discovery.discover((timeoutSec ?? config.discoveryTimeoutSec) * 1000);
        return {
          found: found.map((host) => ({ address: host.address, serviceRoot: host.serviceRoot })),
          servers: registry.addresses()
        };
      });
    }
  );

  logger.info({ transport: config.mcpTransport }, 'MCP Redfish server constructed');
  return server;
}
