/**
 * @proxysock/socket-factory
 *
 * Connections through HTTP CONNECT or SOCKS proxies, optionally secured with
 * TLS for the original target.
 */

export { ProxiedSocketFactory, normalizeTimeout } from './factory.js';
export { createTlsWrapper } from './tls.js';
export { resolveTlsHostname, isAddressTarget } from './address.js';
export { resolveFactoryConfig, createFactoryFromEnv } from './config.js';
export * from './types.js';
export {
  ConnectionError,
  ConnectionTimeoutError,
  InvalidConfigurationError,
  UnsupportedConfigurationError,
  isConnectionError,
  ProxySocket,
  createProxyDescriptor,
  parseProxyUrl,
} from '@proxysock/tunnel';
export type { LocalEndpoint, ProxyDescriptor, ProxyKind } from '@proxysock/tunnel';
