import { describe, expect, test } from 'vitest';

import { loadConfig, parseBoolean, parseNumber } from '../../src/config.js';

describe('loadConfig', () => {
  test('falls back to a local host and session auth', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      redfishHostsJson: '[{"address":"127.0.0.1"}]',
      redfishDefaults: {
        port: 443,
        authMethod: 'session',
        username: '',
        password: '',
        tlsServerCaCert: undefined
      },
      requestTimeoutMs: 10_000,
      discoveryEnabled: false,
      discoveryIntervalSec: 30,
      discoveryTimeoutSec: 5,
      mcpTransport: 'stdio',
      mcpHttpHost: '127.0.0.1',
      mcpHttpPort: 8000,
      mcpHttpAllowNonLoopback: false,
      mcpHttpAuthToken: undefined,
      logLevel: 'info'
    });
  });

  test('reads Redfish defaults and discovery settings', () => {
    const config = loadConfig({
      REDFISH_HOSTS: '[{"address":"10.0.0.1"}]',
      REDFISH_PORT: '8443',
      REDFISH_AUTH_METHOD: ' BASIC ',
      REDFISH_USERNAME: 'admin',
      REDFISH_PASSWORD: 'test-secret',
      REDFISH_SERVER_CA_CERT: '/etc/redfish/ca.pem',
      REDFISH_DISCOVERY_ENABLED: 'true',
      REDFISH_DISCOVERY_INTERVAL: '120',
      REDFISH_DISCOVERY_TIMEOUT: '90'
    });

    expect(config.redfishHostsJson).toBe('[{"address":"10.0.0.1"}]');
    expect(config.redfishDefaults).toEqual({
      port: 8443,
      authMethod: 'basic',
      username: 'admin',
      password: 'test-secret',
      tlsServerCaCert: '/etc/redfish/ca.pem'
    });
    expect(config.discoveryEnabled).toBe(true);
    expect(config.discoveryIntervalSec).toBe(120);
    expect(config.discoveryTimeoutSec).toBe(60);
  });

  test('passes an unknown auth method through for connection-time checks', () => {
    expect(loadConfig({ REDFISH_AUTH_METHOD: 'Digest' }).redfishDefaults.authMethod).toBe('digest');
  });

  test('selects the HTTP transport and its settings', () => {
    const config = loadConfig({
      MCP_TRANSPORT: 'streamable-http',
      MCP_HTTP_HOST: '0.0.0.0',
      MCP_HTTP_PORT: '9100',
      MCP_HTTP_ALLOW_NON_LOOPBACK: 'yes',
      MCP_HTTP_AUTH_TOKEN: ' test-token '
    });

    expect(config.mcpTransport).toBe('http');
    expect(config.mcpHttpHost).toBe('0.0.0.0');
    expect(config.mcpHttpPort).toBe(9100);
    expect(config.mcpHttpAllowNonLoopback).toBe(true);
    expect(config.mcpHttpAuthToken).toBe('test-token');
  });

  test('prefers the Redfish-specific log level', () => {
    expect(loadConfig({ MCP_LOG_LEVEL: 'warn' }).logLevel).toBe('warn');
    expect(loadConfig({ MCP_REDFISH_LOG_LEVEL: 'DEBUG', MCP_LOG_LEVEL: 'warn' }).logLevel).toBe('debug');
  });
});

describe('value parsers', () => {
  test('parseBoolean accepts common spellings and keeps the default otherwise', () => {
    expect(parseBoolean('on', false)).toBe(true);
    expect(parseBoolean('0', true)).toBe(false);
    expect(parseBoolean('maybe', true)).toBe(true);
    expect(parseBoolean(undefined, false)).toBe(false);
  });

  test('parseNumber floors and clamps', () => {
    expect(parseNumber('12.7', 1, 0, 100)).toBe(12);
    expect(parseNumber('-5', 1, 0, 100)).toBe(0);
    expect(parseNumber('500', 1, 0, 100)).toBe(100);
    expect(parseNumber('abc', 7, 0, 100)).toBe(7);
    expect(parseNumber(' ', 7, 0, 100)).toBe(7);
  });
});
