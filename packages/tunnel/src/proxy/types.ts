/**
 * Proxy descriptor types
 */

import { z } from 'zod';
import { InvalidConfigurationError } from '../errors.js';

export const PROXY_KINDS = ['http', 'socks4', 'socks5'] as const;

/**
 * Proxy protocol: an HTTP CONNECT tunnel or a SOCKS4/SOCKS5 proxy
 */
export type ProxyKind = (typeof PROXY_KINDS)[number];

/**
 * Identifies a proxy server's address and protocol kind
 */
export interface ProxyDescriptor {
  readonly kind: ProxyKind;
  readonly host: string;
  readonly port: number;
}

/**
 * Destination of a tunnel, as seen by the proxy
 */
export interface TunnelTarget {
  host: string;
  port: number;
}

const proxyDescriptorSchema = z.object({
  kind: z.enum(PROXY_KINDS),
  host: z.string().trim().min(1).max(255),
  port: z.number().int().min(1).max(65535),
});

const DEFAULT_PORTS: Record<ProxyKind, number> = {
  http: 8080,
  socks4: 1080,
  socks5: 1080,
};

const SCHEME_KINDS: Record<string, ProxyKind> = {
  'http:': 'http',
  'socks:': 'socks5',
  'socks4:': 'socks4',
  'socks4a:': 'socks4',
  'socks5:': 'socks5',
  'socks5h:': 'socks5',
};

/**
 * Validate and freeze a proxy descriptor.
 * @throws {InvalidConfigurationError} if a field is missing or out of range
 */
export function createProxyDescriptor(input: unknown): ProxyDescriptor {
  const parsed = proxyDescriptorSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      'Invalid proxy descriptor',
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      ),
    );
  }
  return Object.freeze({ ...parsed.data });
}

export function validateProxyDescriptor(input: unknown): boolean {
  return proxyDescriptorSchema.safeParse(input).success;
}

/**
 * Port written in the URL, if any. WHATWG URL drops `:80` from http URLs, so
 * that one is read back from the authority.
 */
function explicitPort(url: URL, raw: string): number | undefined {
  if (url.port) return Number(url.port);
  if (url.protocol === 'http:' && /^http:\/\/[^/?#]*:0*80(?:[/?#]|$)/i.test(raw)) return 80;
  return undefined;
}

/**
 * Parse a proxy URL such as `socks5://10.0.0.2:1080` or `http://proxy.internal:3128`.
 * `socks://` and `socks5h://` are aliases for SOCKS5, `socks4a://` for SOCKS4.
 * The port defaults to 8080 (http) or 1080 (socks).
 * Credentials are rejected: proxy authentication is not supported.
 */
export function parseProxyUrl(value: string): ProxyDescriptor {
  const raw = value.trim();
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new InvalidConfigurationError(`Invalid proxy URL: ${value}`);
  }

  const kind = SCHEME_KINDS[url.protocol];
  if (!kind) {
    throw new InvalidConfigurationError(`Unsupported proxy scheme: ${url.protocol.replace(/:$/, '')}`);
  }
  if (url.username || url.password) {
    throw new InvalidConfigurationError('Proxy authentication is not supported');
  }

  const host = url.hostname.replace(/^\[(.*)\]$/, '$1');
  const port = explicitPort(url, raw) ?? DEFAULT_PORTS[kind];
  return createProxyDescriptor({ kind, host, port });
}

/**
 * Render a descriptor as `kind://host:port` for logs and error messages
 */
export function formatProxy(proxy: ProxyDescriptor): string {
  return `${proxy.kind}://${formatHostPort(proxy.host, proxy.port)}`;
}

export function formatHostPort(host: string, port: number): string {
  return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
}
