/**
 * Proxied connection factory
 *
 * Turns a target (plus an optional local bind) into a connected stream routed
 * through an HTTP CONNECT or SOCKS proxy, optionally wrapped in TLS for the
 * original target. The factory holds only immutable configuration, so one
 * instance can serve any number of concurrent connects.
 */

import type * as net from 'node:net';
import { reverse } from 'node:dns/promises';
import {
  ConnectionError,
  InvalidConfigurationError,
  ProxySocket,
  UnsupportedConfigurationError,
  createProxyDescriptor,
  errorMessage,
  formatProxy,
  isValidPort,
  logger,
  type ProxyDescriptor,
  type ProxyKind,
} from '@proxysock/tunnel';
import { describeTarget, isAddressTarget, isNumericAddress, resolveTlsHostname, tunnelHost } from './address.js';
import type {
  ConnectRequest,
  ProbeResult,
  ProxiedSocketFactoryOptions,
  ReverseLookup,
  TlsWrapper,
} from './types.js';

/**
 * Normalize a connect timeout: anything that is not a positive finite number
 * means no timeout (0).
 */
export function normalizeTimeout(timeoutMs: number | undefined): number {
  return typeof timeoutMs === 'number' && Number.isFinite(timeoutMs) && timeoutMs > 0 ? timeoutMs : 0;
}

/**
 * Run `use` with exclusive ownership of `proxySocket`. Any failure closes the
 * socket before the error propagates; a failure while closing is logged and
 * dropped so the original error is the one the caller sees.
 */
async function withOwnedSocket<T>(proxySocket: ProxySocket, use: (owned: ProxySocket) => Promise<T>): Promise<T> {
  try {
    return await use(proxySocket);
  } catch (err) {
    try {
      proxySocket.close();
    } catch (closeErr) {
      logger.debug(`[Proxy] Ignoring failure while closing raw socket: ${errorMessage(closeErr)}`);
    }
    throw err;
  }
}

/**
 * Record the first error a socket emits while no other listener is attached.
 */
function guardSocket(socket: net.Socket): { error(): Error | null; release(): void } {
  let first: Error | null = null;
  const onError = (err: Error) => {
    if (!first) first = err;
  };
  socket.on('error', onError);
  return {
    error: () => first,
    release: () => {
      socket.removeListener('error', onError);
    },
  };
}

export class ProxiedSocketFactory {
  readonly proxy: ProxyDescriptor;
  readonly connectTimeoutMs: number;
  readonly tls: TlsWrapper | undefined;
  private readonly reverseLookup: ReverseLookup;

  /**
   * Validates and stores the configuration; performs no I/O.
   * @throws {InvalidConfigurationError} if the proxy descriptor or a collaborator is malformed
   */
  constructor(options: ProxiedSocketFactoryOptions) {
    this.proxy = createProxyDescriptor(options.proxy);
    this.connectTimeoutMs = normalizeTimeout(options.connectTimeoutMs);

    if (options.tls !== undefined && typeof options.tls?.wrap !== 'function') {
      throw new InvalidConfigurationError('TLS wrapper must provide a wrap() function');
    }
    this.tls = options.tls;

    if (options.reverseLookup !== undefined && typeof options.reverseLookup !== 'function') {
      throw new InvalidConfigurationError('reverseLookup must be a function');
    }
    this.reverseLookup = options.reverseLookup ?? reverse;
  }

  /**
   * Build a factory from an explicit proxy host, port and kind.
   */
  static forProxy(
    host: string,
    port: number,
    kind: ProxyKind,
    connectTimeoutMs?: number,
    tls?: TlsWrapper,
  ): ProxiedSocketFactory {
    return new ProxiedSocketFactory({ proxy: { kind, host, port }, connectTimeoutMs, tls });
  }

  /**
   * Create a raw socket for the configured proxy, not yet connected.
   * @throws {UnsupportedConfigurationError} when a TLS wrapper is configured,
   *   since TLS needs an established connection and a known target
   */
  createSocket(): ProxySocket {
    if (this.tls) {
      throw new UnsupportedConfigurationError(
        'Unable to create an unconnected socket for communication through a proxy when a TLS wrapper has been configured',
      );
    }
    return new ProxySocket(this.proxy);
  }

  /**
   * Connect to a target through the proxy.
   *
   * With a TLS wrapper configured, the handshake is identified by the original
   * target's host and port, never the proxy's. For `{ address }` targets the
   * hostname comes from a reverse DNS lookup of the address, which adds a DNS
   * query to the connect.
   *
   * @throws {ConnectionError} on bind, connect, timeout, proxy refusal or TLS failure;
   *   no socket is left open when it does
   */
  async connect(request: ConnectRequest): Promise<net.Socket> {
    const { target, local } = request;
    const details = { proxy: formatProxy(this.proxy), target: describeTarget(target) };

    if (isAddressTarget(target) && !isNumericAddress(target.address)) {
      throw new ConnectionError(`Not a numeric address: ${target.address}`, details);
    }
    if (!isValidPort(target.port)) {
      throw new ConnectionError(`Invalid target port: ${target.port}`, details);
    }

    return withOwnedSocket(new ProxySocket(this.proxy), async (proxySocket) => {
      if (local) {
        proxySocket.bind(local);
      }
      const raw = await proxySocket.connect({ host: tunnelHost(target), port: target.port }, this.connectTimeoutMs);

      const tlsWrapper = this.tls;
      if (!tlsWrapper) {
        return raw;
      }

      // The tunnel can drop while the TLS hostname is being resolved
      const guard = guardSocket(raw);
      try {
        const host = await resolveTlsHostname(target, this.reverseLookup);
        const tunnelError = guard.error();
        if (tunnelError || raw.destroyed) {
          throw new ConnectionError(
            `Tunnel to ${details.target} via ${details.proxy} closed before TLS negotiation` +
              (tunnelError ? `: ${tunnelError.message}` : ''),
            { ...details, ...(tunnelError ? { cause: tunnelError } : {}) },
          );
        }
        logger.debug(`[Proxy] Starting TLS with ${host}:${target.port} over ${details.proxy}`);
        return await tlsWrapper.wrap(raw, { host, port: target.port, autoClose: true });
      } catch (err) {
        if (err instanceof ConnectionError) throw err;
        throw new ConnectionError(
          `TLS negotiation with ${details.target} via ${details.proxy} failed: ${errorMessage(err)}`,
          { ...details, cause: err },
        );
      } finally {
        guard.release();
      }
    });
  }

  /**
   * Check that a target is reachable through the proxy: connect, then close
   * straight away. Connection failures are reported, not thrown.
   */
  async probe(request: ConnectRequest): Promise<ProbeResult> {
    const startTime = Date.now();
    try {
      const socket = await this.connect(request);
      socket.destroy();
      return { success: true, latencyMs: Date.now() - startTime };
    } catch (err) {
      if (!(err instanceof ConnectionError)) throw err;
      return { success: false, error: err.message };
    }
  }
}
