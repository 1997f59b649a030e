import { z } from 'zod/v4';

export type McpTransport = 'stdio' | 'http';

export interface RedfishDefaults {
  port: number;
  /** Raw value; checked when a host connection is resolved. */
  authMethod: string;
  username: string;
  password: string;
  tlsServerCaCert?: string;
}

export interface AppConfig {
  redfishHostsJson: string;
  redfishDefaults: RedfishDefaults;
  requestTimeoutMs: number;

  discoveryEnabled: boolean;
  discoveryIntervalSec: number;
  discoveryTimeoutSec: number;

  mcpTransport: McpTransport;
  mcpHttpHost: string;
  mcpHttpPort: number;
  mcpHttpAllowNonLoopback: boolean;
  mcpHttpAuthToken?: string;

  logLevel: string;
}

export type Env = Record<string, string | undefined>;

const envSchema = z.object({
  REDFISH_HOSTS: z.string().optional(),
  REDFISH_PORT: z.string().optional(),
  REDFISH_AUTH_METHOD: z.string().optional(),
  REDFISH_USERNAME: z.string().optional(),
  REDFISH_PASSWORD: z.string().optional(),
  REDFISH_SERVER_CA_CERT: z.string().optional(),
  REDFISH_TIMEOUT_MS: z.string().optional(),

  REDFISH_DISCOVERY_ENABLED: z.string().optional(),
  REDFISH_DISCOVERY_INTERVAL: z.string().optional(),
  REDFISH_DISCOVERY_TIMEOUT: z.string().optional(),

  MCP_TRANSPORT: z.string().optional(),
  MCP_HTTP_HOST: z.string().optional(),
  MCP_HTTP_PORT: z.string().optional(),
  MCP_HTTP_ALLOW_NON_LOOPBACK: z.string().optional(),
  MCP_HTTP_AUTH_TOKEN: z.string().optional(),

  MCP_REDFISH_LOG_LEVEL: z.string().optional(),
  MCP_LOG_LEVEL: z.string().optional()
});

const DEFAULT_HOSTS_JSON = '[{"address":"127.0.0.1"}]';

export function parseBoolean(raw: string | undefined, defaultValue: boolean): boolean {
  if (raw === undefined) {
    return defaultValue;
  }

  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  return defaultValue;
}

export function parseNumber(raw: string | undefined, defaultValue: number, min: number, max: number): number {
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    return defaultValue;
  }
  return Math.min(max, Math.max(min, Math.floor(n)));
}

export function parseFloatNumber(raw: string | undefined, defaultValue: number, min: number, max: number): number {
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    return defaultValue;
  }
  return Math.min(max, Math.max(min, n));
}

function parseTransport(raw: string | undefined): McpTransport {
  const normalized = raw?.trim().toLowerCase();
  if (normalized === 'http' || normalized === 'streamable-http') {
    return 'http';
  }
  return 'stdio';
}

function parseOptionalString(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    redfishHostsJson: parsed.REDFISH_HOSTS?.trim() || DEFAULT_HOSTS_JSON,
    redfishDefaults: {
      port: parseNumber(parsed.REDFISH_PORT, 443, 1, 65535),
      authMethod: parsed.REDFISH_AUTH_METHOD?.trim().toLowerCase() || 'session',
      username: parsed.REDFISH_USERNAME ?? '',
      password: parsed.REDFISH_PASSWORD ?? '',
      tlsServerCaCert: parseOptionalString(parsed.REDFISH_SERVER_CA_CERT)
    },
    requestTimeoutMs: parseNumber(parsed.REDFISH_TIMEOUT_MS, 10_000, 500, 300_000),

    discoveryEnabled: parseBoolean(parsed.REDFISH_DISCOVERY_ENABLED, false),
    discoveryIntervalSec: parseNumber(parsed.REDFISH_DISCOVERY_INTERVAL, 30, 1, 86_400),
    discoveryTimeoutSec: parseNumber(parsed.REDFISH_DISCOVERY_TIMEOUT, 5, 1, 60),

    mcpTransport: parseTransport(parsed.MCP_TRANSPORT),
    mcpHttpHost: parsed.MCP_HTTP_HOST?.trim() || '127.0.0.1',
    mcpHttpPort: parseNumber(parsed.MCP_HTTP_PORT, 8000, 1, 65535),
    mcpHttpAllowNonLoopback: parseBoolean(parsed.MCP_HTTP_ALLOW_NON_LOOPBACK, false),
    mcpHttpAuthToken: parseOptionalString(parsed.MCP_HTTP_AUTH_TOKEN),

    logLevel: (parsed.MCP_REDFISH_LOG_LEVEL ?? parsed.MCP_LOG_LEVEL)?.trim().toLowerCase() || 'info'
  };
}
