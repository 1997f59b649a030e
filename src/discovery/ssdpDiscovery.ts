import { createSocket } from 'node:dgram';
import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';

import { ensureError } from '../errors.js';
import type { HostEntry, HostRegistry } from '../hosts/hostRegistry.js';

export const SSDP_ADDR = '239.255.255.250';
export const SSDP_PORT = 1900;
export const SSDP_MX = 2;
export const SSDP_ST = 'urn:dmtf-org:service:redfish-rest:1';

const SERVICE_ROOT_PATTERN = /^\/redfish\/v1\/?$/;
const AL_HEADER_PATTERN = /^AL:\s*(.*)$/i;

export function buildSearchMessage(): string {
  return (
    'M-SEARCH * HTTP/1.1\r\n' +
    `HOST: ${SSDP_ADDR}:${SSDP_PORT}\r\n` +
    'MAN: "ssdp:discover"\r\n' +
    `MX: ${SSDP_MX}\r\n` +
    `ST: ${SSDP_ST}\r\n\r\n`
  );
}

/** First AL header value of an SSDP response, if any. */
export function parseAlHeader(response: string): string | null {
  for (const line of response.split(/\r?\n/)) {
    const match = line.match(AL_HEADER_PATTERN);
    if (match) {
      return (match[1] ?? '').trim();
    }
  }
  return null;
}

export function isValidServiceRoot(uri: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(uri);
  } catch {
    return false;
  }
  return parsed.protocol === 'https:' && parsed.host !== '' && SERVICE_ROOT_PATTERN.test(parsed.pathname);
}

/** The slice of a UDP socket discovery needs; tests supply their own. */
export interface DiscoverySocket {
  send(message: string, port: number, address: string): Promise<void>;
  onMessage(listener: (payload: Buffer, senderAddress: string) => void): void;
  onError(listener: (error: Error) => void): void;
  close(): void;
}

function createUdpSocket(): DiscoverySocket {
  const socket = createSocket('udp4');
  return {
    send: (message, port, address) =>
      new Promise<void>((resolve, reject) => {
        socket.send(message, port, address, (error) => (error ? reject(error) : resolve()));
      }),
    onMessage: (listener) => {
      socket.on('message', (payload, remote) => listener(payload, remote.address));
    },
    onError: (listener) => {
      socket.on('error', listener);
    },
    close: () => {
      socket.close();
    }
  };
}

export interface SsdpDiscoveryOptions {
  logger: Logger;
  registry: Pick<HostRegistry, 'replaceDiscovered'>;
  timeoutMs: number;
  createSocket?: () => DiscoverySocket;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Finds Redfish services with one SSDP M-SEARCH and publishes them to the
 * registry. Never rejects: socket and publishing failures only shrink the
 * result. Repeated answers from one address are kept; the registry merge
 * collapses them. Aborting `signal` ends the listening window early.
 */
export class SsdpDiscovery {
  private readonly createSocket: () => DiscoverySocket;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(private readonly options: SsdpDiscoveryOptions) {
    this.createSocket = options.createSocket ?? createUdpSocket;
    this.sleep = options.sleep ?? ((ms, signal) => delay(ms, undefined, { signal }));
  }

  async discover(timeoutMs: number = this.options.timeoutMs, signal?: AbortSignal): Promise<HostEntry[]> {
    const { logger } = this.options;
    const found: HostEntry[] = [];
    let socket: DiscoverySocket | null = null;

    logger.info({ timeoutMs }, 'Starting SSDP discovery');
    try {
      socket = this.createSocket();
      socket.onError((error) => {
        logger.error({ error: error.message }, 'Error receiving SSDP response');
      });
      socket.onMessage((payload, senderAddress) => {
        const entry = this.toHostEntry(payload, senderAddress);
        if (entry) {
          found.push(entry);
        }
      });
      await socket.send(buildSearchMessage(), SSDP_PORT, SSDP_ADDR);
      await this.sleep(timeoutMs, signal);
    } catch (error) {
      if (signal?.aborted) {
        logger.debug({ found: found.length }, 'SSDP discovery cancelled');
      } else {
        logger.error({ error: ensureError(error).message }, 'Error during SSDP discovery');
      }
    } finally {
      this.closeSocket(socket);
    }

    try {
      this.options.registry.replaceDiscovered(found);
    } catch (error) {
      logger.warn({ error: ensureError(error).message }, 'Failed to publish discovered Redfish hosts');
    }

    return found;
  }

  private toHostEntry(payload: Buffer, senderAddress: string): HostEntry | null {
    const response = payload.toString('utf8');
    const location = parseAlHeader(response);
    if (!location || !isValidServiceRoot(location)) {
      this.options.logger.debug(
        { address: senderAddress, location },
        'SSDP response without a valid Redfish service root; ignoring'
      );
      return null;
    }

    this.options.logger.info({ address: senderAddress, serviceRoot: location }, 'Discovered Redfish endpoint');
    return { address: senderAddress, serviceRoot: location };
  }

  private closeSocket(socket: DiscoverySocket | null): void {
    if (!socket) {
      return;
    }
    try {
      socket.close();
    } catch (error) {
      this.options.logger.debug({ error: ensureError(error).message }, 'SSDP socket already closed');
    }
  }
}
