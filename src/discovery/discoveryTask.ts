import type { Logger } from 'pino';

import { ensureError } from '../errors.js';
import type { HostEntry } from '../hosts/hostRegistry.js';

export interface DiscoveryTaskOptions {
  intervalMs: number;
  logger: Logger;
  runCycle: (signal: AbortSignal) => Promise<HostEntry[]>;
}

export interface DiscoveryTaskStatus {
  running: boolean;
  cycles: number;
  lastRunAt: string | null;
  lastFound: number;
}

/**
 * Runs discovery now and then every `intervalMs`, never two cycles at once.
 * A failing cycle is logged and the schedule continues.
 */
export class DiscoveryTask {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private active = false;
  private abort = new AbortController();
  private cycles = 0;
  private lastRunAt: string | null = null;
  private lastFound = 0;

  constructor(private readonly options: DiscoveryTaskOptions) {}

  start(): void {
    if (this.active) {
      return;
    }
    this.active = true;
    this.abort = new AbortController();
    this.options.logger.info({ intervalMs: this.options.intervalMs }, 'Redfish discovery task started');
    this.tick();
  }

  /** Cancels the next tick, aborts a cycle already in progress and waits for it. */
  async stop(): Promise<void> {
    this.active = false;
    this.abort.abort();
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.inFlight;
    this.options.logger.info('Redfish discovery task stopped');
  }

  async runOnce(): Promise<HostEntry[]> {
    try {
      const hosts = await this.options.runCycle(this.abort.signal);
      this.lastFound = hosts.length;
      this.options.logger.info({ found: hosts.length }, 'Redfish discovery cycle finished');
      return hosts;
    } catch (error) {
      this.options.logger.error({ error: ensureError(error).message }, 'Redfish discovery cycle failed');
      return [];
    } finally {
      this.cycles += 1;
      this.lastRunAt = new Date().toISOString();
    }
  }

  status(): DiscoveryTaskStatus {
    return {
      running: this.active,
      cycles: this.cycles,
      lastRunAt: this.lastRunAt,
      lastFound: this.lastFound
    };
  }

  private tick(): void {
    this.timer = null;
    this.inFlight = this.runOnce().then(() => {
      this.inFlight = null;
      if (!this.active) {
        return;
      }
      this.timer = setTimeout(() => this.tick(), this.options.intervalMs);
      this.timer.unref();
    });
  }
}
