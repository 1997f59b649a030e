import type { Logger } from 'pino';
import { describe, expect, test, vi } from 'vitest';

import type { HostEntry } from '../../src/hosts/hostRegistry.js';
import {
  buildSearchMessage,
  isValidServiceRoot,
  parseAlHeader,
  SsdpDiscovery,
  type DiscoverySocket
} from '../../src/discovery/ssdpDiscovery.js';

function makeLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
}

interface Reply {
  from: string;
  body: string;
}

function ssdpReply(location: string): string {
  return (
    'HTTP/1.1 200 OK\r\n' +
    'CACHE-CONTROL: max-age=1800\r\n' +
    'ST: urn:dmtf-org:service:redfish-rest:1\r\n' +
    `AL: ${location}\r\n\r\n`
  );
}

class FakeSocket implements DiscoverySocket {
  readonly sent: Array<{ message: string; port: number; address: string }> = [];
  closed = 0;
  private messageListener: ((payload: Buffer, senderAddress: string) => void) | null = null;

  constructor(
    private readonly replies: Reply[],
    private readonly sendError?: Error
  ) {}

  async send(message: string, port: number, address: string): Promise<void> {
    this.sent.push({ message, port, address });
    if (this.sendError) {
      throw this.sendError;
    }
    for (const reply of this.replies) {
      this.messageListener?.(Buffer.from(reply.body, 'utf8'), reply.from);
    }
  }

  onMessage(listener: (payload: Buffer, senderAddress: string) => void): void {
    this.messageListener = listener;
  }

  onError(): void {}

  close(): void {
    this.closed += 1;
  }
}

function makeDiscovery(
  socket: FakeSocket,
  registry = { replaceDiscovered: vi.fn((_hosts: readonly HostEntry[]): void => {}) }
) {
  const logger = makeLogger();
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
  const discovery = new SsdpDiscovery({
    logger: logger as unknown as Logger,
    registry,
    timeoutMs: 5000,
    createSocket: () => socket,
    sleep
  });
  return { discovery, registry, logger, sleep };
}

describe('SSDP helpers', () => {
  test('builds the Redfish M-SEARCH request', () => {
    expect(buildSearchMessage()).toBe(
      'M-SEARCH * HTTP/1.1\r\n' +
        'HOST: 239.255.255.250:1900\r\n' +
        'MAN: "ssdp:discover"\r\n' +
        'MX: 2\r\n' +
        'ST: urn:dmtf-org:service:redfish-rest:1\r\n\r\n'
    );
  });

  test('reads the first AL header case-insensitively', () => {
    expect(parseAlHeader('HTTP/1.1 200 OK\r\nal:  https://10.0.0.1/redfish/v1/ \r\nAL: second\r\n')).toBe(
      'https://10.0.0.1/redfish/v1/'
    );
    expect(parseAlHeader('HTTP/1.1 200 OK\r\nLOCATION: x\r\n')).toBeNull();
  });

  test('accepts only https service roots', () => {
    expect(isValidServiceRoot('https://10.0.0.1/redfish/v1')).toBe(true);
    expect(isValidServiceRoot('https://10.0.0.1:8443/redfish/v1/')).toBe(true);
    expect(isValidServiceRoot('http://10.0.0.1/redfish/v1')).toBe(false);
    expect(isValidServiceRoot('https://10.0.0.1/redfish/v2')).toBe(false);
    expect(isValidServiceRoot('https://10.0.0.1/redfish/v1/Systems')).toBe(false);
    expect(isValidServiceRoot('not a url')).toBe(false);
  });
});

describe('SsdpDiscovery', () => {
  test('publishes valid responders and ignores the rest', async () => {
    const socket = new FakeSocket([
      { from: '10.0.0.2', body: ssdpReply('https://10.0.0.2/redfish/v1/') },
      { from: '10.0.0.3', body: ssdpReply('http://10.0.0.3/redfish/v1/') },
      { from: '10.0.0.4', body: 'HTTP/1.1 200 OK\r\nST: upnp:rootdevice\r\n\r\n' },
      { from: '10.0.0.5', body: ssdpReply('https://10.0.0.5/redfish/v1') }
    ]);
    const { discovery, registry, sleep } = makeDiscovery(socket);

    const found = await discovery.discover();

    expect(found).toEqual([
      { address: '10.0.0.2', serviceRoot: 'https://10.0.0.2/redfish/v1/' },
      { address: '10.0.0.5', serviceRoot: 'https://10.0.0.5/redfish/v1' }
    ]);
    expect(registry.replaceDiscovered).toHaveBeenCalledWith(found);
    expect(socket.sent).toEqual([{ message: buildSearchMessage(), port: 1900, address: '239.255.255.250' }]);
    expect(sleep).toHaveBeenCalledWith(5000, undefined);
    expect(socket.closed).toBe(1);
  });

  test('keeps repeated answers from one address', async () => {
    const socket = new FakeSocket([
      { from: '10.0.0.2', body: ssdpReply('https://10.0.0.2/redfish/v1/') },
      { from: '10.0.0.2', body: ssdpReply('https://10.0.0.2/redfish/v1/') }
    ]);
    const { discovery } = makeDiscovery(socket);

    await expect(discovery.discover(1000)).resolves.toHaveLength(2);
  });

  test('waits for the timeout passed to a single run', async () => {
    const { discovery, sleep } = makeDiscovery(new FakeSocket([]));

    await expect(discovery.discover(1500)).resolves.toEqual([]);
    expect(sleep).toHaveBeenCalledWith(1500, undefined);
  });

  test('returns an empty list when the search cannot be sent', async () => {
    const socket = new FakeSocket([], Object.assign(new Error('no route'), { code: 'ENETUNREACH' }));
    const { discovery, registry, logger } = makeDiscovery(socket);

    await expect(discovery.discover()).resolves.toEqual([]);
    expect(logger.error).toHaveBeenCalledWith({ error: 'no route' }, 'Error during SSDP discovery');
    expect(registry.replaceDiscovered).toHaveBeenCalledWith([]);
    expect(socket.closed).toBe(1);
  });

  test('stops listening when the signal aborts and keeps what it heard', async () => {
    const socket = new FakeSocket([{ from: '10.0.0.2', body: ssdpReply('https://10.0.0.2/redfish/v1/') }]);
    const registry = { replaceDiscovered: vi.fn((_hosts: readonly HostEntry[]): void => {}) };
    const logger = makeLogger();
    const discovery = new SsdpDiscovery({
      logger: logger as unknown as Logger,
      registry,
      timeoutMs: 60_000,
      createSocket: () => socket
    });
    const controller = new AbortController();

    const pending = discovery.discover(undefined, controller.signal);
    controller.abort();

    await expect(pending).resolves.toEqual([{ address: '10.0.0.2', serviceRoot: 'https://10.0.0.2/redfish/v1/' }]);
    expect(logger.error).not.toHaveBeenCalled();
    expect(logger.debug).toHaveBeenCalledWith({ found: 1 }, 'SSDP discovery cancelled');
    expect(registry.replaceDiscovered).toHaveBeenCalledWith([
      { address: '10.0.0.2', serviceRoot: 'https://10.0.0.2/redfish/v1/' }
    ]);
    expect(socket.closed).toBe(1);
  });

  test('passes the signal to the listening wait', async () => {
    const { discovery, sleep } = makeDiscovery(new FakeSocket([]));
    const controller = new AbortController();

    await discovery.discover(2000, controller.signal);

    expect(sleep).toHaveBeenCalledWith(2000, controller.signal);
  });

  test('survives a registry that refuses the update', async () => {
    const socket = new FakeSocket([{ from: '10.0.0.2', body: ssdpReply('https://10.0.0.2/redfish/v1/') }]);
    const registry = {
      replaceDiscovered: vi.fn((_hosts: readonly HostEntry[]): void => {
        throw new Error('registry unavailable');
      })
    };
    const { discovery, logger } = makeDiscovery(socket, registry);

    await expect(discovery.discover()).resolves.toEqual([
      { address: '10.0.0.2', serviceRoot: 'https://10.0.0.2/redfish/v1/' }
    ]);
    expect(logger.warn).toHaveBeenCalledWith(
      { error: 'registry unavailable' },
      'Failed to publish discovered Redfish hosts'
    );
  });
});
