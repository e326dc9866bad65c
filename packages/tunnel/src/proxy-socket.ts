/**
 * Proxy-aware raw socket.
 *
 * A ProxySocket starts out associated with a proxy but connected to nothing.
 * `connect()` opens the TCP connection to the proxy (from the bound local
 * endpoint, if any) and negotiates a tunnel to the target, either with
 * SocksClient or with an HTTP CONNECT request.
 */

import * as net from 'node:net';
import {
  ConnectionError,
  ConnectionTimeoutError,
  errorMessage,
  type ConnectionErrorDetails,
} from './errors.js';
import { negotiateHttpConnect } from './proxy/http.js';
import { negotiateSocks } from './proxy/socks.js';
import { formatHostPort, formatProxy, type ProxyDescriptor, type TunnelTarget } from './proxy/types.js';
import { logger } from './logger.js';

export type ProxySocketState = 'idle' | 'connecting' | 'connected' | 'closed';

/**
 * Local endpoint to bind before connecting. Port 0 lets the OS pick one.
 */
export interface LocalEndpoint {
  address: string;
  port: number;
}

export function isValidPort(port: number, allowZero: boolean = false): boolean {
  return Number.isInteger(port) && port >= (allowZero ? 0 : 1) && port <= 65535;
}

export class ProxySocket {
  private _state: ProxySocketState = 'idle';
  private _socket: net.Socket | null = null;
  private _local: LocalEndpoint | null = null;
  private _target: TunnelTarget | null = null;

  constructor(readonly proxy: ProxyDescriptor) {}

  get state(): ProxySocketState {
    return this._state;
  }

  get connected(): boolean {
    return this._state === 'connected';
  }

  /** The underlying socket, once a connection attempt has started */
  get socket(): net.Socket | null {
    return this._socket;
  }

  /**
   * The local endpoint: the bound one before connecting, the actual one after.
   */
  get localEndpoint(): LocalEndpoint | null {
    const socket = this._socket;
    if (this._state === 'connected' && socket?.localAddress !== undefined && socket.localPort !== undefined) {
      return { address: socket.localAddress, port: socket.localPort };
    }
    return this._local ? { ...this._local } : null;
  }

  get target(): TunnelTarget | null {
    return this._target ? { ...this._target } : null;
  }

  /**
   * Bind to a local endpoint. The OS-level bind happens when the connection
   * to the proxy is opened, so an address that cannot be bound fails `connect()`.
   */
  bind(local: LocalEndpoint): void {
    const details = this.details();
    if (this._state !== 'idle') {
      throw new ConnectionError(`Cannot bind a socket that is ${this._state}`, details);
    }
    if (this._local) {
      throw new ConnectionError('Socket is already bound', details);
    }
    if (net.isIP(local.address) === 0) {
      throw new ConnectionError(`Invalid local bind address: ${local.address}`, details);
    }
    if (!isValidPort(local.port, true)) {
      throw new ConnectionError(`Invalid local bind port: ${local.port}`, details);
    }
    this._local = { address: local.address, port: local.port };
  }

  /**
   * Connect to `target` through the proxy.
   * A timeout of 0 (or less) applies no timer of our own. On failure the
   * underlying socket is destroyed before the returned promise rejects.
   * The established socket is returned paused.
   */
  async connect(target: TunnelTarget, timeoutMs: number = 0): Promise<net.Socket> {
    if (this._state !== 'idle') {
      throw new ConnectionError(`Cannot connect a socket that is ${this._state}`, this.details(target));
    }
    if (!isValidPort(target.port)) {
      this.close();
      throw new ConnectionError(`Invalid target port: ${target.port}`, this.details(target));
    }

    this._state = 'connecting';
    this._target = { host: target.host, port: target.port };
    const details = this.details();
    const socket = new net.Socket();
    this._socket = socket;

    logger.debug(`[Proxy] Establishing ${this.proxy.kind.toUpperCase()} tunnel to ${details.target} via ${details.proxy}`);

    let timeoutHandle: ReturnType<typeof setTimeout> | null = null;
    try {
      const attempt = this.establish(socket, target, timeoutMs);
      const established = timeoutMs > 0
        ? await Promise.race([
          attempt,
          new Promise<never>((_, reject) => {
            timeoutHandle = setTimeout(() => {
              // Destroy first so nothing stays open once the timeout error is seen
              this.close();
              reject(new ConnectionTimeoutError(timeoutMs, details));
            }, timeoutMs);
          }),
        ])
        : await attempt;

      if (this._state !== 'connecting') {
        throw new ConnectionError('Socket was closed while connecting', details);
      }
      this._state = 'connected';
      logger.debug(`[Proxy] Tunnel established to ${details.target} via ${details.proxy}`);
      return established;
    } catch (err) {
      this.close();
      logger.debug(`[Proxy] Tunnel to ${details.target} via ${details.proxy} failed: ${errorMessage(err)}`);
      if (err instanceof ConnectionError) throw err;
      throw new ConnectionError(
        `Proxy connection failed via ${details.proxy} to ${details.target}: ${errorMessage(err)}`,
        { ...details, cause: err },
      );
    } finally {
      if (timeoutHandle) clearTimeout(timeoutHandle);
    }
  }

  /**
   * Destroy the underlying socket, if any. Safe to call more than once.
   */
  close(): void {
    this._state = 'closed';
    if (this._socket && !this._socket.destroyed) {
      this._socket.destroy();
    }
  }

  private async establish(socket: net.Socket, target: TunnelTarget, timeoutMs: number): Promise<net.Socket> {
    await openConnection(socket, {
      host: this.proxy.host,
      port: this.proxy.port,
      ...(this._local ? { localAddress: this._local.address, localPort: this._local.port } : {}),
    });

    if (this.proxy.kind === 'http') {
      return negotiateHttpConnect(socket, target);
    }
    return negotiateSocks(socket, this.proxy, target, timeoutMs);
  }

  private details(target: TunnelTarget | null = this._target): ConnectionErrorDetails {
    return {
      proxy: formatProxy(this.proxy),
      ...(target ? { target: formatHostPort(target.host, target.port) } : {}),
    };
  }
}

/**
 * Open the TCP connection to the proxy.
 */
function openConnection(socket: net.Socket, options: net.TcpSocketConnectOpts): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const cleanup = () => {
      socket.removeListener('connect', onConnect);
      socket.removeListener('error', onError);
      socket.removeListener('close', onClose);
    };
    const onConnect = () => {
      cleanup();
      resolve();
    };
    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };
    const onClose = () => {
      cleanup();
      reject(new Error('Socket closed before connecting to the proxy'));
    };

    socket.once('connect', onConnect);
    socket.once('error', onError);
    socket.once('close', onClose);
    socket.connect(options);
  });
}
