/**
 * @proxysock/tunnel
 *
 * Proxy descriptors and a proxy-aware raw socket that tunnels through
 * HTTP CONNECT or SOCKS4/5 proxies.
 */

export { ProxySocket, isValidPort } from './proxy-socket.js';
export type { LocalEndpoint, ProxySocketState } from './proxy-socket.js';
export * from './proxy/types.js';
export { createSocksOptions } from './proxy/socks.js';
export { HttpConnectRejectedError, buildConnectRequest, parseStatusLine } from './proxy/http.js';
export * from './errors.js';
export * from './logger.js';
