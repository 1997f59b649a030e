import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';

import { parseBoolean, parseFloatNumber, parseNumber, type Env } from '../config.js';
import { ensureError, RedfishMcpError, transportCodeOf, type ErrorKind } from '../errors.js';

export interface RetryConfig {
  /** Total attempts, first one included. */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
  jitter: boolean;
}

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_INITIAL_DELAY_SEC = 1.0;
const DEFAULT_MAX_DELAY_SEC = 60.0;
const DEFAULT_BACKOFF_FACTOR = 2.0;

/**
 * Reads the retry knobs from the environment. Called for every client so
 * that configuration changes apply without a restart.
 */
export function loadRetryConfig(env: Env = process.env): RetryConfig {
  const maxRetries = parseNumber(env.REDFISH_MAX_RETRIES, DEFAULT_MAX_RETRIES, 0, 10);
  const initialDelaySec = parseFloatNumber(env.REDFISH_INITIAL_DELAY, DEFAULT_INITIAL_DELAY_SEC, 0, 3_600);
  const maxDelaySec = parseFloatNumber(env.REDFISH_MAX_DELAY, DEFAULT_MAX_DELAY_SEC, 0, 3_600);
  const rawFactor = parseFloatNumber(env.REDFISH_BACKOFF_FACTOR, DEFAULT_BACKOFF_FACTOR, 0, 100);

  return {
    maxAttempts: maxRetries + 1,
    initialDelayMs: Math.round(initialDelaySec * 1000),
    maxDelayMs: Math.round(Math.max(maxDelaySec, initialDelaySec) * 1000),
    backoffFactor: rawFactor > 1 ? rawFactor : DEFAULT_BACKOFF_FACTOR,
    jitter: parseBoolean(env.REDFISH_JITTER, true)
  };
}

/**
 * Wait before the attempt that follows failed attempt number `attempt`.
 * Exponential growth capped at maxDelayMs; with jitter, uniform in [0, cap].
 */
export function computeDelayMs(config: RetryConfig, attempt: number, random: () => number = Math.random): number {
  const exponent = Math.max(0, attempt - 1);
  const bound = Math.min(config.maxDelayMs, config.initialDelayMs * config.backoffFactor ** exponent);
  if (!config.jitter) {
    return bound;
  }
  return Math.floor(random() * bound);
}

/**
 * Tagged errors answer for themselves; an `other` error is looked through
 * exactly one level of `cause`, so a validation failure wrapped in a generic
 * error stays non-retryable.
 */
export function classifyFailure(error: unknown): ErrorKind {
  if (error instanceof RedfishMcpError) {
    if (error.kind !== 'other') {
      return error.kind;
    }
    const cause = error.cause;
    if (cause instanceof RedfishMcpError) {
      return cause.kind;
    }
    return transportCodeOf(cause) ? 'transport' : 'other';
  }

  return transportCodeOf(error) ? 'transport' : 'other';
}

export function isRetryable(error: unknown): boolean {
  if (error instanceof RedfishMcpError && error.code === 'RETRIES_EXHAUSTED') {
    return false;
  }
  return classifyFailure(error) === 'transport';
}

export interface RetryPolicyOptions {
  config: RetryConfig;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export class RetryPolicy {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(private readonly options: RetryPolicyOptions) {
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.random = options.random ?? Math.random;
  }

  get config(): RetryConfig {
    return this.options.config;
  }

  async run<T>(operation: string, fn: (attempt: number) => Promise<T>): Promise<T> {
    const { maxAttempts } = this.options.config;

    let lastError: unknown;
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        return await fn(attempt);
      } catch (error) {
        if (!isRetryable(error)) {
          throw error;
        }
        lastError = error;
        if (attempt >= maxAttempts) {
          break;
        }

        const waitMs = computeDelayMs(this.options.config, attempt, this.random);
        this.options.logger.warn(
          { operation, attempt, maxAttempts, waitMs, error: ensureError(error).message },
          'Redfish operation failed at transport level; retrying'
        );
        await this.sleep(waitMs);
      }
    }

    const message = ensureError(lastError).message;
    this.options.logger.error({ operation, attempts: maxAttempts, error: message }, 'Redfish operation retries exhausted');
    throw new RedfishMcpError('RETRIES_EXHAUSTED', `${operation} failed after ${maxAttempts} attempts: ${message}`, {
      cause: lastError,
      attempts: maxAttempts
    });
  }
}
