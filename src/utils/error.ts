// Path: src/utils/error.ts
// Error taxonomy for configuration, transport and registry failures

/**
 * Extract error message from unknown error type.
 * Handles Error objects, strings, and other types.
 *
 * @param err - Unknown error value
 * @returns Error message string
 */
export function extractErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === 'string') {
    return err;
  }
  return String(err);
}

/**
 * Check if an error is a network-level failure of the socket layer.
 */
export function isRetryableError(err: unknown): boolean {
  if (err instanceof ClientError) {
    return err.retryable;
  }
  const msg = extractErrorMessage(err);
  return /econnrefused|enotfound|etimedout|socket hang up|econnreset|epipe|network/i.test(msg);
}

/**
 * Base error with a stable code and metadata.
 */
export class ClientError extends Error {
  readonly code: string;
  readonly metadata?: Record<string, unknown>;
  readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: Error;
      metadata?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = 'ClientError';
    this.code = code;
    this.metadata = options?.metadata;
    this.retryable = options?.retryable ?? false;

    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}

/**
 * A required configuration field is missing or malformed.
 * Raised at plan/build time, before any connection is opened.
 */
export class ConfigError extends ClientError {
  readonly field: string;

  constructor(field: string, message?: string) {
    super(message ?? `Missing required configuration: ${field}`, 'CONFIG_ERROR', { metadata: { field } });
    this.name = 'ConfigError';
    this.field = field;
  }
}

export class MissingSubscriptionError extends ConfigError {
  constructor() {
    super('subscription', 'Consumer connections require a subscription');
    this.name = 'MissingSubscriptionError';
  }
}

export class InvalidHostFormatError extends ClientError {
  constructor(host: unknown) {
    super(
      `Invalid host format: ${JSON.stringify(host) ?? String(host)}. Expected "host:port" or a single host/port pair`,
      'INVALID_HOST_FORMAT',
      { metadata: { host } }
    );
    this.name = 'InvalidHostFormatError';
  }
}

/**
 * The socket layer could not establish the connection.
 */
export class TransportStartFailure extends ClientError {
  constructor(url: string, cause?: Error) {
    super(
      `Failed to connect to ${url}${cause ? `: ${cause.message}` : ''}`,
      'TRANSPORT_START_FAILURE',
      { cause, metadata: { url }, retryable: true }
    );
    this.name = 'TransportStartFailure';
  }
}

export class ConnectionClosedError extends ClientError {
  readonly closeCode: number;

  constructor(closeCode: number, reason: string) {
    super(`Connection closed (${closeCode})${reason ? `: ${reason}` : ''}`, 'CONNECTION_CLOSED', {
      metadata: { closeCode, reason },
      retryable: true,
    });
    this.name = 'ConnectionClosedError';
    this.closeCode = closeCode;
  }
}

export class ConnectionNotOpenError extends ClientError {
  constructor(name: string) {
    super(`Connection ${name} is not open`, 'CONNECTION_NOT_OPEN', { metadata: { name } });
    this.name = 'ConnectionNotOpenError';
  }
}

/**
 * Two processes claimed the same name in one registry.
 * Names are unique by construction, so this is never retried.
 */
export class DuplicateRegistrationError extends ClientError {
  constructor(registry: string, name: string) {
    super(`Name "${name}" is already registered in ${registry}`, 'DUPLICATE_REGISTRATION', {
      metadata: { registry, name },
    });
    this.name = 'DuplicateRegistrationError';
  }
}

export class RegistryUnavailableError extends ClientError {
  constructor(registry: string) {
    super(`Registry ${registry} is not running`, 'REGISTRY_UNAVAILABLE', { metadata: { registry } });
    this.name = 'RegistryUnavailableError';
  }
}

export class ProcessNotFoundError extends ClientError {
  constructor(registry: string, name: string) {
    super(`No process registered as "${name}" in ${registry}`, 'PROCESS_NOT_FOUND', {
      metadata: { registry, name },
    });
    this.name = 'ProcessNotFoundError';
  }
}

/**
 * Wrap an unknown error into a ClientError.
 *
 * @param err - Unknown error value
 * @param code - Error code
 * @param metadata - Additional metadata
 */
export function wrapError(
  err: unknown,
  code: string,
  metadata?: Record<string, unknown>
): ClientError {
  if (err instanceof ClientError) {
    return err;
  }
  const message = extractErrorMessage(err);
  const cause = err instanceof Error ? err : undefined;
  const retryable = isRetryableError(err);

  return new ClientError(message, code, { cause, metadata, retryable });
}
