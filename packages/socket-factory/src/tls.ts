/**
 * Default TLS wrapper built on node:tls
 */

import * as net from 'node:net';
import * as tls from 'node:tls';
import type { TlsWrapOptions, TlsWrapper } from './types.js';

/**
 * Create a TLS wrapper that performs the handshake over an established tunnel.
 *
 * The target host is sent as SNI (unless it is an IP literal) and checked
 * against the server certificate. Extra `tls.ConnectionOptions` such as `ca`,
 * `ALPNProtocols` or `rejectUnauthorized` pass through; `socket`, `host`,
 * `port` and `servername` are always set by the wrapper.
 *
 * ```typescript
 * const factory = new ProxiedSocketFactory({
 *   proxy: parseProxyUrl('socks5://10.0.0.2:1080'),
 *   connectTimeoutMs: 5000,
 *   tls: createTlsWrapper({ ALPNProtocols: ['http/1.1'] }),
 * });
 * ```
 */
export function createTlsWrapper(options: tls.ConnectionOptions = {}): TlsWrapper {
  return {
    wrap(socket: net.Socket, { host, port, autoClose }: TlsWrapOptions): Promise<net.Socket> {
      return new Promise<net.Socket>((resolve, reject) => {
        if (socket.destroyed) {
          reject(new Error(`TLS connection to ${host}:${port} cannot start on a closed socket`));
          return;
        }

        const tlsSocket = tls.connect({
          ...options,
          socket,
          host,
          port,
          servername: net.isIP(host) === 0 ? host : undefined,
        });

        const cleanup = () => {
          tlsSocket.removeListener('secureConnect', onSecure);
          tlsSocket.removeListener('error', onError);
          tlsSocket.removeListener('close', onClose);
        };
        const onSecure = () => {
          cleanup();
          if (autoClose) {
            tlsSocket.once('close', () => socket.destroy());
          }
          resolve(tlsSocket);
        };
        const onError = (err: Error) => {
          cleanup();
          tlsSocket.destroy();
          reject(err);
        };
        const onClose = () => {
          cleanup();
          reject(new Error(`TLS connection to ${host}:${port} closed before the handshake completed`));
        };

        tlsSocket.once('secureConnect', onSecure);
        tlsSocket.once('error', onError);
        tlsSocket.once('close', onClose);
      });
    },
  };
}
