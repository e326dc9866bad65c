/**
 * Types for the proxied socket factory
 */

import type * as net from 'node:net';
import type { LocalEndpoint, ProxyDescriptor } from '@proxysock/tunnel';

/**
 * Target given by name (or an IP string used as-is for TLS identity)
 */
export interface HostTarget {
  host: string;
  port: number;
}

/**
 * Target given as a pre-resolved numeric address. When TLS is configured the
 * hostname presented for certificate validation comes from a reverse lookup
 * of `address`.
 */
export interface AddressTarget {
  address: string;
  port: number;
}

export type ConnectTarget = HostTarget | AddressTarget;

export interface ConnectRequest {
  target: ConnectTarget;
  /** Local address and port to bind before connecting */
  local?: LocalEndpoint;
}

export interface TlsWrapOptions {
  /** Hostname of the original target, used for SNI and certificate validation */
  host: string;
  /** Port of the original target */
  port: number;
  /** Destroy the raw socket when the TLS socket closes */
  autoClose: boolean;
}

/**
 * Upgrades an established raw tunnel to a TLS-secured stream
 */
export interface TlsWrapper {
  wrap(socket: net.Socket, options: TlsWrapOptions): Promise<net.Socket>;
}

/**
 * Maps a numeric address to host names, like `dns.promises.reverse`
 */
export type ReverseLookup = (address: string) => Promise<string[]>;

export interface ProxiedSocketFactoryOptions {
  /** Pre-built descriptor, or the explicit kind/host/port of the proxy */
  proxy: ProxyDescriptor;
  /** Connect timeout in milliseconds. 0 or less means no timeout. */
  connectTimeoutMs?: number;
  /** When set, every connection is wrapped in TLS for the original target */
  tls?: TlsWrapper;
  reverseLookup?: ReverseLookup;
}

export type ProbeResult =
  | { success: true; latencyMs: number }
  | { success: false; error: string };
