import process from 'node:process';

import { createMcpExpressApp } from '@modelcontextprotocol/sdk/server/express.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';

import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { HostRegistry } from './hosts/hostRegistry.js';
import { SsdpDiscovery } from './discovery/ssdpDiscovery.js';
import { DiscoveryTask } from './discovery/discoveryTask.js';
import { buildMcpServer, type ServerDependencies } from './mcp/server.js';

function isLoopbackHost(host: string): boolean {
  const normalized = host.trim().toLowerCase().replace(/^\[(.*)\]$/, '$1');
  if (!normalized) {
    return false;
  }
  if (normalized === 'localhost' || normalized === '::1') {
    return true;
  }
  return normalized.startsWith('127.');
}

function extractBearerToken(authorizationHeader: string | string[] | undefined): string | undefined {
  if (!authorizationHeader) {
    return undefined;
  }

  const rawValue = Array.isArray(authorizationHeader) ? authorizationHeader[0] : authorizationHeader;
  const match = rawValue?.match(/^Bearer\s+(.+)$/i);
  const token = match?.[1]?.trim();
  return token || undefined;
}

function jsonRpcError(code: number, message: string) {
  return {
    jsonrpc: '2.0',
    error: {
      code,
      message
    },
    id: null
  };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  const registry = new HostRegistry({ logger });
  registry.loadStatic(config.redfishHostsJson);

  const discovery = new SsdpDiscovery({
    logger,
    registry,
    timeoutMs: config.discoveryTimeoutSec * 1000
  });
  const discoveryTask = config.discoveryEnabled
    ? new DiscoveryTask({
        intervalMs: config.discoveryIntervalSec * 1000,
        logger,
        runCycle: (signal) => discovery.discover(undefined, signal)
      })
    : undefined;
  discoveryTask?.start();

  const deps: ServerDependencies = {
    config,
    logger,
    registry,
    discovery: config.discoveryEnabled ? discovery : undefined,
    discoveryTask
  };

  logger.info(
    {
      hosts: registry.counts(),
      discoveryEnabled: config.discoveryEnabled,
      discoveryIntervalSec: config.discoveryIntervalSec
    },
    'Starting Redfish MCP server'
  );

  if (config.mcpTransport === 'stdio') {
    const server = buildMcpServer(deps);
    const transport = new StdioServerTransport();
    await server.connect(transport);

    logger.info({ transport: 'stdio' }, 'mcp-redfish running on stdio');

    const shutdown = async () => {
      logger.info('Shutting down stdio server');
      await discoveryTask?.stop();
      await server.close();
      process.exit(0);
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
    return;
  }

  if (!isLoopbackHost(config.mcpHttpHost)) {
    if (!config.mcpHttpAllowNonLoopback) {
      throw new Error(
        `Refusing to bind MCP HTTP transport to non-loopback host "${config.mcpHttpHost}". ` +
          'Set MCP_HTTP_ALLOW_NON_LOOPBACK=true to override intentionally.'
      );
    }
    logger.warn({ host: config.mcpHttpHost, port: config.mcpHttpPort }, 'MCP HTTP transport is binding to a non-loopback host');
  }

  const app = createMcpExpressApp({
    host: config.mcpHttpHost
  });

  app.get('/healthz', (_req, res) => {
    res.status(200).json({
      status: 'ok',
      hosts: registry.counts(),
      discovery: discoveryTask?.status() ?? { running: false },
      transport: config.mcpTransport,
      timestamp: new Date().toISOString()
    });
  });

  app.post('/mcp', async (req, res) => {
    if (config.mcpHttpAuthToken) {
      const provided = extractBearerToken(req.headers.authorization);
      if (!provided) {
        logger.warn('HTTP request denied: missing Bearer token');
        res.status(401).json(jsonRpcError(-32001, 'Unauthorized'));
        return;
      }
      if (provided !== config.mcpHttpAuthToken) {
        logger.warn('HTTP request denied: invalid Bearer token');
        res.status(403).json(jsonRpcError(-32003, 'Forbidden'));
        return;
      }
    }

    const server = buildMcpServer(deps);
    try {
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined
      });
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);

      res.on('close', () => {
        transport.close().catch((error: unknown) => logger.debug({ error }, 'MCP transport close failed'));
        server.close().catch((error: unknown) => logger.debug({ error }, 'MCP server close failed'));
      });
    } catch (error) {
      logger.error({ error }, 'HTTP transport request failed');
      if (!res.headersSent) {
        res.status(500).json(jsonRpcError(-32603, 'Internal server error'));
      }
      await server.close().catch((closeError: unknown) => logger.debug({ error: closeError }, 'MCP server close failed'));
    }
  });

  app.get('/mcp', (_req, res) => {
    res.status(405).json(jsonRpcError(-32000, 'Method not allowed.'));
  });

  app.delete('/mcp', (_req, res) => {
    res.status(405).json(jsonRpcError(-32000, 'Method not allowed.'));
  });

  const httpServer = app.listen(config.mcpHttpPort, config.mcpHttpHost, () => {
    logger.info(
      {
        transport: 'http',
        host: config.mcpHttpHost,
        port: config.mcpHttpPort,
        authRequired: Boolean(config.mcpHttpAuthToken)
      },
      'mcp-redfish running on streamable HTTP'
    );
  });

  const shutdown = async () => {
    logger.info('Shutting down HTTP server');
    await discoveryTask?.stop();
    httpServer.close(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  const text = error instanceof Error ? error.stack ?? error.message : String(error);
  console.error(text);
  process.exit(1);
});
