/**
 * Factory configuration resolution.
 *
 * Priority: programmatic overrides > environment variables > defaults.
 *
 * Environment variables:
 * - `PROXYSOCK_PROXY_URL`: proxy URL, e.g. `socks5://10.0.0.2:1080` or `http://proxy.internal:3128`
 * - `PROXYSOCK_CONNECT_TIMEOUT_MS`: connect timeout in milliseconds (default: 0, no timeout)
 */

import { z } from 'zod';
import { InvalidConfigurationError, parseProxyUrl } from '@proxysock/tunnel';
import { ProxiedSocketFactory } from './factory.js';
import type { ProxiedSocketFactoryOptions } from './types.js';

const envSchema = z.object({
  PROXYSOCK_PROXY_URL: z.string().trim().min(1).optional(),
  PROXYSOCK_CONNECT_TIMEOUT_MS: z
    .string()
    .trim()
    .regex(/^-?\d+$/, 'must be an integer number of milliseconds')
    .transform(Number)
    .optional(),
});

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Resolve factory options from environment variables and overrides.
 * @throws {InvalidConfigurationError} if no proxy is configured or a variable is malformed
 */
export function resolveFactoryConfig(
  overrides: Partial<ProxiedSocketFactoryOptions> = {},
  env: Env = process.env,
): ProxiedSocketFactoryOptions {
  const parsed = envSchema.safeParse({
    PROXYSOCK_PROXY_URL: nonEmpty(env.PROXYSOCK_PROXY_URL),
    PROXYSOCK_CONNECT_TIMEOUT_MS: nonEmpty(env.PROXYSOCK_CONNECT_TIMEOUT_MS),
  });
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      'Invalid environment configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const proxyUrl = parsed.data.PROXYSOCK_PROXY_URL;
  const proxy = overrides.proxy ?? (proxyUrl ? parseProxyUrl(proxyUrl) : undefined);
  if (!proxy) {
    throw new InvalidConfigurationError('No proxy configured: set PROXYSOCK_PROXY_URL or pass a proxy');
  }

  return {
    proxy,
    connectTimeoutMs: overrides.connectTimeoutMs ?? parsed.data.PROXYSOCK_CONNECT_TIMEOUT_MS ?? 0,
    ...(overrides.tls ? { tls: overrides.tls } : {}),
    ...(overrides.reverseLookup ? { reverseLookup: overrides.reverseLookup } : {}),
  };
}

/**
 * Build a factory from the environment. A TLS wrapper can only come from overrides.
 *
 * ```typescript
 * // PROXYSOCK_PROXY_URL=socks5://10.0.0.2:1080
 * const factory = createFactoryFromEnv({ tls: createTlsWrapper() });
 * const socket = await factory.connect({ target: { host: 'api.example.com', port: 443 } });
 * ```
 */
export function createFactoryFromEnv(
  overrides: Partial<ProxiedSocketFactoryOptions> = {},
  env: Env = process.env,
): ProxiedSocketFactory {
  return new ProxiedSocketFactory(resolveFactoryConfig(overrides, env));
}
