import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { InvalidConfigurationError } from '@proxysock/tunnel';
import { createFactoryFromEnv, resolveFactoryConfig } from './config.js';
import { createTlsWrapper } from './tls.js';

describe('resolveFactoryConfig', () => {
  it('should read the proxy and timeout from the environment', () => {
    const config = resolveFactoryConfig({}, {
      PROXYSOCK_PROXY_URL: 'socks5://10.0.0.2:1080',
      PROXYSOCK_CONNECT_TIMEOUT_MS: '5000',
    });
    assert.deepEqual(config, {
      proxy: { kind: 'socks5', host: '10.0.0.2', port: 1080 },
      connectTimeoutMs: 5000,
    });
  });

  it('should default the timeout to 0', () => {
    assert.equal(resolveFactoryConfig({}, { PROXYSOCK_PROXY_URL: 'http://proxy.internal:3128' }).connectTimeoutMs, 0);
    assert.equal(
      resolveFactoryConfig({}, { PROXYSOCK_PROXY_URL: 'http://proxy.internal:3128', PROXYSOCK_CONNECT_TIMEOUT_MS: ' ' })
        .connectTimeoutMs,
      0,
    );
  });

  it('should prefer overrides over the environment', () => {
    const config = resolveFactoryConfig(
      { proxy: { kind: 'http', host: 'override.internal', port: 8080 }, connectTimeoutMs: 100 },
      { PROXYSOCK_PROXY_URL: 'socks5://10.0.0.2:1080', PROXYSOCK_CONNECT_TIMEOUT_MS: '5000' },
    );
    assert.deepEqual(config.proxy, { kind: 'http', host: 'override.internal', port: 8080 });
    assert.equal(config.connectTimeoutMs, 100);
  });

  it('should require a proxy', () => {
    assert.throws(() => resolveFactoryConfig({}, {}), /No proxy configured/);
    assert.throws(() => resolveFactoryConfig({}, { PROXYSOCK_PROXY_URL: '' }), InvalidConfigurationError);
  });

  it('should reject malformed values', () => {
    assert.throws(
      () => resolveFactoryConfig({}, { PROXYSOCK_PROXY_URL: 'socks5://10.0.0.2:1080', PROXYSOCK_CONNECT_TIMEOUT_MS: '5s' }),
      (err: unknown) => {
        assert.ok(err instanceof InvalidConfigurationError);
        assert.deepEqual(err.issues, ['PROXYSOCK_CONNECT_TIMEOUT_MS: must be an integer number of milliseconds']);
        return true;
      },
    );
    assert.throws(() => resolveFactoryConfig({}, { PROXYSOCK_PROXY_URL: 'ftp://10.0.0.2:21' }), InvalidConfigurationError);
  });
});

describe('createFactoryFromEnv', () => {
  it('should normalize a negative timeout and keep the TLS wrapper override', () => {
    const tls = createTlsWrapper();
    const factory = createFactoryFromEnv({ tls }, {
      PROXYSOCK_PROXY_URL: 'socks4://10.0.0.3',
      PROXYSOCK_CONNECT_TIMEOUT_MS: '-5',
    });
    assert.deepEqual(factory.proxy, { kind: 'socks4', host: '10.0.0.3', port: 1080 });
    assert.equal(factory.connectTimeoutMs, 0);
    assert.equal(factory.tls, tls);
  });
});
