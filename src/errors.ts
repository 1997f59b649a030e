export type ErrorCode =
  | 'VALIDATION'
  | 'CONFIG'
  | 'AUTH'
  | 'NOT_FOUND'
  | 'NETWORK'
  | 'TIMEOUT'
  | 'RETRIES_EXHAUSTED'
  | 'HTTP_ERROR'
  | 'EMPTY_RESPONSE'
  | 'NOT_INITIALIZED'
  | 'REDFISH_ERROR'
  | 'INTERNAL'
  | 'UNKNOWN';

/**
 * Coarse failure class the retry policy acts on.
 * `validation` is never retried, `transport` is, `other` defers to its cause.
 */
export type ErrorKind = 'validation' | 'transport' | 'other';

const ERROR_KINDS: Record<ErrorCode, ErrorKind> = {
  VALIDATION: 'validation',
  CONFIG: 'validation',
  AUTH: 'validation',
  NOT_FOUND: 'validation',
  NETWORK: 'transport',
  TIMEOUT: 'transport',
  RETRIES_EXHAUSTED: 'transport',
  HTTP_ERROR: 'other',
  EMPTY_RESPONSE: 'other',
  NOT_INITIALIZED: 'other',
  REDFISH_ERROR: 'other',
  INTERNAL: 'other',
  UNKNOWN: 'other'
};

export interface SuggestedToolCall {
  name: string;
  args?: Record<string, unknown>;
}

export interface ActionableErrorFields {
  retryable: boolean;
  fixHint: string;
  suggestedNextToolCalls: SuggestedToolCall[];
}

const ACTIONABLE_ERROR_DEFAULTS: Record<ErrorCode, ActionableErrorFields> = {
  VALIDATION: {
    retryable: false,
    fixHint: 'Fix the tool arguments. Resource URLs look like https://<server address>/redfish/v1/<resource path>.',
    suggestedNextToolCalls: [{ name: 'redfish.servers.list' }]
  },
  CONFIG: {
    retryable: false,
    fixHint: 'Correct the REDFISH_* environment configuration and restart the server.',
    suggestedNextToolCalls: [{ name: 'redfish.health.get' }]
  },
  AUTH: {
    retryable: false,
    fixHint: 'Verify the Redfish credentials and auth method configured for this host.',
    suggestedNextToolCalls: [{ name: 'redfish.health.get' }]
  },
  NOT_FOUND: {
    retryable: false,
    fixHint: 'Navigate from the service root and follow @odata.id links to a resource that exists.',
    suggestedNextToolCalls: [{ name: 'redfish.resource.get', args: { url: 'https://<server address>/redfish/v1' } }]
  },
  NETWORK: {
    retryable: true,
    fixHint: 'Check that the Redfish host is reachable on its configured port, then retry.',
    suggestedNextToolCalls: [{ name: 'redfish.health.get' }]
  },
  TIMEOUT: {
    retryable: true,
    fixHint: 'Retry the operation and increase REDFISH_TIMEOUT_MS if the BMC is slow to answer.',
    suggestedNextToolCalls: [{ name: 'redfish.health.get' }]
  },
  RETRIES_EXHAUSTED: {
    retryable: true,
    fixHint: 'The host kept failing at the transport level. Check its availability before retrying.',
    suggestedNextToolCalls: [{ name: 'redfish.health.get' }, { name: 'redfish.servers.list' }]
  },
  HTTP_ERROR: {
    retryable: false,
    fixHint: 'Inspect the HTTP status and the Redfish error payload in details.',
    suggestedNextToolCalls: [{ name: 'redfish.resource.get', args: { url: 'https://<server address>/redfish/v1' } }]
  },
  EMPTY_RESPONSE: {
    retryable: false,
    fixHint: 'The host answered without a resource body. Verify the resource path.',
    suggestedNextToolCalls: [{ name: 'redfish.resource.get', args: { url: 'https://<server address>/redfish/v1' } }]
  },
  NOT_INITIALIZED: {
    retryable: false,
    fixHint: 'The Redfish session was never established. Retry the tool call.',
    suggestedNextToolCalls: [{ name: 'redfish.health.get' }]
  },
  REDFISH_ERROR: {
    retryable: false,
    fixHint: 'Inspect the error details and the server logs for the underlying cause.',
    suggestedNextToolCalls: [{ name: 'redfish.health.get' }]
  },
  INTERNAL: {
    retryable: true,
    fixHint: 'Retry once; if it fails again, inspect the server logs.',
    suggestedNextToolCalls: [{ name: 'redfish.health.get' }]
  },
  UNKNOWN: {
    retryable: true,
    fixHint: 'Retry once; if it fails again, inspect the server logs.',
    suggestedNextToolCalls: [{ name: 'redfish.health.get' }]
  }
};

export function actionableErrorFields(code: ErrorCode): ActionableErrorFields {
  const defaults = ACTIONABLE_ERROR_DEFAULTS[code] ?? ACTIONABLE_ERROR_DEFAULTS.UNKNOWN;
  return {
    retryable: defaults.retryable,
    fixHint: defaults.fixHint,
    suggestedNextToolCalls: defaults.suggestedNextToolCalls.map((item) => ({
      name: item.name,
      ...(item.args ? { args: { ...item.args } } : {})
    }))
  };
}

export function kindOfCode(code: ErrorCode): ErrorKind {
  return ERROR_KINDS[code] ?? 'other';
}

export class RedfishMcpError extends Error {
  public readonly code: ErrorCode;
  public readonly kind: ErrorKind;
  public readonly statusCode?: number;
  public readonly attempts?: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      cause?: unknown;
      kind?: ErrorKind;
      statusCode?: number;
      attempts?: number;
      details?: Record<string, unknown>;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'RedfishMcpError';
    this.code = code;
    this.kind = options?.kind ?? kindOfCode(code);
    this.statusCode = options?.statusCode;
    this.attempts = options?.attempts;
    this.details = options?.details;
  }
}

export function validationError(message: string, details?: Record<string, unknown>): RedfishMcpError {
  return new RedfishMcpError('VALIDATION', message, { details });
}

export function ensureError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}

const TRANSPORT_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'EHOSTDOWN',
  'ENETUNREACH',
  'ENETDOWN',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
  'UND_ERR_DESTROYED'
]);

const TIMEOUT_ERROR_CODES = new Set([
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT'
]);

function errorCodeOf(err: Error): string | undefined {
  const code: unknown = Reflect.get(err, 'code');
  return typeof code === 'string' ? code : undefined;
}

/**
 * Maps a raw low-level failure (socket, DNS, undici) to a transport code.
 * Returns null when the error does not look like a transport failure.
 */
export function transportCodeOf(value: unknown): 'NETWORK' | 'TIMEOUT' | null {
  if (!(value instanceof Error)) {
    return null;
  }

  const code = errorCodeOf(value);
  if (value.name === 'AbortError' || value.name === 'TimeoutError' || (code && TIMEOUT_ERROR_CODES.has(code))) {
    return 'TIMEOUT';
  }
  if (code && TRANSPORT_ERROR_CODES.has(code)) {
    return 'NETWORK';
  }
  // Any other Node system error, such as EPROTO or EADDRNOTAVAIL.
  if (typeof Reflect.get(value, 'errno') === 'number' || typeof Reflect.get(value, 'syscall') === 'string') {
    return 'NETWORK';
  }
  return null;
}

export function asRedfishMcpError(value: unknown): RedfishMcpError {
  if (value instanceof RedfishMcpError) {
    return value;
  }

  const err = ensureError(value);
  const transportCode = transportCodeOf(err);
  if (transportCode) {
    return new RedfishMcpError(transportCode, err.message, { cause: err });
  }

  return new RedfishMcpError('INTERNAL', err.message, { cause: err });
}
