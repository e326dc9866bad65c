import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createSocksOptions } from './socks.js';

describe('createSocksOptions', () => {
  it('should map proxy kind and set destination', () => {
    const opts = createSocksOptions(
      { kind: 'socks5', host: '10.0.0.2', port: 1080 },
      { host: 'db.example.test', port: 5432 },
    );
    assert.equal(opts.proxy.host, '10.0.0.2');
    assert.equal(opts.proxy.port, 1080);
    assert.equal(opts.proxy.type, 5);
    assert.equal(opts.command, 'connect');
    assert.deepEqual(opts.destination, { host: 'db.example.test', port: 5432 });
  });

  it('should map socks4 to type 4', () => {
    const opts = createSocksOptions(
      { kind: 'socks4', host: '10.0.0.2', port: 1080 },
      { host: 'db.example.test', port: 5432 },
    );
    assert.equal(opts.proxy.type, 4);
  });

  it('should only pass a positive timeout', () => {
    const proxy = { kind: 'socks5', host: '10.0.0.2', port: 1080 } as const;
    const destination = { host: 'db.example.test', port: 5432 };
    assert.equal(createSocksOptions(proxy, destination, 2500).timeout, 2500);
    assert.equal(createSocksOptions(proxy, destination, 0).timeout, undefined);
    assert.equal('timeout' in createSocksOptions(proxy, destination), false);
  });

  it('should never carry credentials', () => {
    const opts = createSocksOptions(
      { kind: 'socks5', host: '10.0.0.2', port: 1080 },
      { host: 'db.example.test', port: 5432 },
    );
    assert.equal(opts.proxy.userId, undefined);
    assert.equal(opts.proxy.password, undefined);
  });
});
