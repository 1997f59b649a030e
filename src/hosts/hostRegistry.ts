import type { Logger } from 'pino';
import { z } from 'zod/v4';

export const AUTH_METHODS = ['basic', 'session'] as const;
export type AuthMethod = (typeof AUTH_METHODS)[number];

export interface HostEntry {
  address: string;
  port?: number;
  username?: string;
  password?: string;
  authMethod?: AuthMethod;
  tlsServerCaCert?: string;
  /** Advertised service-root URI; set on discovered hosts. */
  serviceRoot?: string;
}

const hostEntrySchema = z.object({
  address: z.string().trim().min(1, 'Host address cannot be empty'),
  port: z.number().int().min(1).max(65535).nullish(),
  username: z.string().nullish(),
  password: z.string().nullish(),
  auth_method: z.enum(AUTH_METHODS).nullish(),
  tls_server_ca_cert: z.string().nullish(),
  service_root: z.string().nullish()
});

const hostListSchema = z.array(hostEntrySchema);

type RawHostEntry = z.infer<typeof hostEntrySchema>;

function toHostEntry(raw: RawHostEntry): HostEntry {
  const entry: HostEntry = { address: raw.address };
  if (raw.port != null) {
    entry.port = raw.port;
  }
  if (raw.username != null) {
    entry.username = raw.username;
  }
  if (raw.password != null) {
    entry.password = raw.password;
  }
  if (raw.auth_method != null) {
    entry.authMethod = raw.auth_method;
  }
  if (raw.tls_server_ca_cert != null) {
    entry.tlsServerCaCert = raw.tls_server_ca_cert;
  }
  if (raw.service_root != null) {
    entry.serviceRoot = raw.service_root;
  }
  return entry;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

/**
 * Parses a host list in its configuration form (snake_case keys).
 * Throws on malformed input; callers decide how to degrade.
 */
export function parseHostList(input: unknown): HostEntry[] {
  const raw: unknown = typeof input === 'string' ? JSON.parse(input) : input;
  const result = hostListSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid host list: ${describeIssues(result.error)}`);
  }
  return result.data.map(toHostEntry);
}

function isValidHostEntry(entry: HostEntry): boolean {
  if (!entry.address.trim()) {
    return false;
  }
  if (entry.port !== undefined && (!Number.isInteger(entry.port) || entry.port < 1 || entry.port > 65535)) {
    return false;
  }
  return entry.authMethod === undefined || AUTH_METHODS.includes(entry.authMethod);
}

export interface HostRegistryOptions {
  logger: Logger;
}

/**
 * Static hosts from configuration merged with hosts found by discovery.
 *
 * All methods are synchronous, so a read can never observe a half-applied
 * discovery swap. The discovered list is replaced by reference, never mutated.
 */
export class HostRegistry {
  private readonly logger: Logger;
  private staticHosts: readonly HostEntry[] = [];
  private staticLoaded = false;
  private discoveredHosts: readonly HostEntry[] = Object.freeze([]);

  constructor(opts: HostRegistryOptions) {
    this.logger = opts.logger;
  }

  /** Loads static hosts once. Malformed input leaves the static list empty. */
  loadStatic(input: unknown): void {
    if (this.staticLoaded) {
      this.logger.warn('Static Redfish hosts already loaded; ignoring reload');
      return;
    }
    this.staticLoaded = true;

    try {
      this.staticHosts = Object.freeze(parseHostList(input));
      if (!this.staticHosts.length) {
        this.logger.warn('No static Redfish hosts configured');
      }
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to parse REDFISH_HOSTS; continuing without static hosts');
      this.staticHosts = Object.freeze([]);
    }
  }

  replaceDiscovered(hosts: readonly HostEntry[]): void {
    const accepted: HostEntry[] = [];
    for (const host of hosts) {
      if (!isValidHostEntry(host)) {
        this.logger.warn({ address: host.address }, 'Dropping invalid discovered host');
        continue;
      }
      accepted.push({ ...host });
    }
    this.discoveredHosts = Object.freeze(accepted);
  }

  allHosts(): HostEntry[] {
    const merged = new Map<string, HostEntry>();
    // A repeated static address keeps its first position and its last definition.
    for (const host of this.staticHosts) {
      merged.set(host.address, host);
    }
    for (const host of this.discoveredHosts) {
      if (!merged.has(host.address)) {
        merged.set(host.address, host);
      }
    }
    return Array.from(merged.values(), (host) => ({ ...host }));
  }

  find(address: string): HostEntry | undefined {
    return this.allHosts().find((host) => host.address === address);
  }

  addresses(): string[] {
    return this.allHosts().map((host) => host.address);
  }

  counts(): { static: number; discovered: number; merged: number } {
    return {
      static: this.staticHosts.length,
      discovered: this.discoveredHosts.length,
      merged: this.allHosts().length
    };
  }
}
