/**
 * Error taxonomy for proxied connections.
 *
 * Three kinds, no retries: configuration rejected at construction time, a
 * request shape the configuration cannot serve, and any failure while a
 * connection is being established.
 */

/**
 * Thrown when a proxy descriptor or factory option is malformed.
 * Raised before any I/O is attempted.
 */
export class InvalidConfigurationError extends Error {
  readonly code = 'INVALID_CONFIGURATION';

  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'InvalidConfigurationError';
  }
}

/**
 * Thrown when an unconnected socket is requested from a factory that wraps
 * connections in TLS. Permanent for a given configuration.
 */
export class UnsupportedConfigurationError extends Error {
  readonly code = 'UNSUPPORTED_CONFIGURATION';

  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedConfigurationError';
  }
}

export interface ConnectionErrorDetails {
  /** Proxy the attempt went through, as `kind://host:port` */
  proxy?: string;
  /** Target of the attempt, as `host:port` */
  target?: string;
  cause?: unknown;
}

/**
 * Any bind, connect, proxy handshake, timeout or TLS failure during connect.
 * The underlying failure is kept as `cause`.
 */
export class ConnectionError extends Error {
  readonly code: string = 'CONNECTION_ERROR';
  readonly proxy?: string;
  readonly target?: string;

  constructor(message: string, details: ConnectionErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'ConnectionError';
    this.proxy = details.proxy;
    this.target = details.target;
  }
}

/**
 * The configured connect timeout expired before the tunnel was established.
 */
export class ConnectionTimeoutError extends ConnectionError {
  override readonly code: string = 'CONNECT_TIMEOUT';

  constructor(readonly timeoutMs: number, details: ConnectionErrorDetails = {}) {
    super(
      details.target && details.proxy
        ? `Connection to ${details.target} via ${details.proxy} timed out after ${timeoutMs}ms`
        : `Connection timed out after ${timeoutMs}ms`,
      details,
    );
    this.name = 'ConnectionTimeoutError';
  }
}

export function isConnectionError(err: unknown): err is ConnectionError {
  return err instanceof ConnectionError;
}

/**
 * Extract a readable message from an unknown thrown value
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === 'string' ? err : 'Unknown error';
}
