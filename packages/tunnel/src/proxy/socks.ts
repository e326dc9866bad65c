/**
 * SOCKS tunnel negotiation over an already-open connection to the proxy
 */

import type * as net from 'node:net';
import { SocksClient, type SocksClientOptions } from 'socks';
import type { ProxyDescriptor, TunnelTarget } from './types.js';

/**
 * SOCKS proxy type (4 = SOCKS4, 5 = SOCKS5)
 */
type SocksProxyType = 4 | 5;

function socksVersion(proxy: ProxyDescriptor): SocksProxyType {
  return proxy.kind === 'socks4' ? 4 : 5;
}

/**
 * Create a SOCKS connection options object for SocksClient.
 * A timeout of 0 leaves the timeout to SocksClient's own default.
 */
export function createSocksOptions(
  proxy: ProxyDescriptor,
  destination: TunnelTarget,
  timeoutMs: number = 0,
): SocksClientOptions {
  return {
    proxy: {
      host: proxy.host,
      port: proxy.port,
      type: socksVersion(proxy),
    },
    command: 'connect',
    destination: { host: destination.host, port: destination.port },
    ...(timeoutMs > 0 ? { timeout: timeoutMs } : {}),
  };
}

/**
 * Run the SOCKS CONNECT handshake on a socket already connected to the proxy.
 * SocksClient destroys the socket itself when the proxy rejects the request.
 * The established socket is returned paused.
 */
export async function negotiateSocks(
  socket: net.Socket,
  proxy: ProxyDescriptor,
  destination: TunnelTarget,
  timeoutMs: number = 0,
): Promise<net.Socket> {
  const info = await SocksClient.createConnection({
    ...createSocksOptions(proxy, destination, timeoutMs),
    existing_socket: socket,
  });
  return info.socket;
}
