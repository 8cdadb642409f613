/**
 * Environment configuration tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DEFAULT_CONFIG, loadConfigFromEnv, parseChannelList } from '../../src/config.js';
import { ConfigError } from '../../src/errors.js';

describe('loadConfigFromEnv', () => {
  it('falls back to defaults for an empty environment', () => {
    assert.deepEqual(loadConfigFromEnv({}), { ...DEFAULT_CONFIG, secretKey: undefined });
  });

  it('reads every variable', () => {
    const config = loadConfigFromEnv({
      FLOODNET_PORT: '9000',
      FLOODNET_HOST: '127.0.0.1',
      FLOODNET_PEERS: 'ws://relay-a:7710, wss://relay-b.example',
      FLOODNET_NICK: 'alice',
      FLOODNET_SECRET_KEY: '11'.repeat(32),
      FLOODNET_CHANNELS: 'general,dev=test-secret',
      FLOODNET_SEEN_CAPACITY: '100',
      FLOODNET_LOG_CAPACITY: '50',
      FLOODNET_MAX_PAYLOAD: '2048',
      FLOODNET_RECONNECT_MS: '250'
    });

    assert.equal(config.port, 9000);
    assert.equal(config.host, '127.0.0.1');
    assert.deepEqual(config.peers, ['ws://relay-a:7710', 'wss://relay-b.example']);
    assert.equal(config.nickname, 'alice');
    assert.deepEqual(config.secretKey, new Uint8Array(32).fill(0x11));
    assert.deepEqual(config.channels, [{ name: 'general' }, { name: 'dev', passphrase: 'test-secret' }]);
    assert.equal(config.seenCacheCapacity, 100);
    assert.equal(config.eventLogCapacity, 50);
    assert.equal(config.maxPayloadBytes, 2048);
    assert.equal(config.reconnectDelayMs, 250);
  });

  it('turns the listener off', () => {
    assert.equal(loadConfigFromEnv({ FLOODNET_PORT: 'off' }).port, undefined);
  });

  it('treats blank values as unset', () => {
    assert.equal(loadConfigFromEnv({ FLOODNET_PORT: '  ', FLOODNET_HOST: '' }).port, 7710);
    assert.equal(loadConfigFromEnv({ FLOODNET_HOST: '' }).host, '0.0.0.0');
  });

  it('rejects bad numbers', () => {
    assert.throws(
      () => loadConfigFromEnv({ FLOODNET_PORT: 'abc' }),
      (error: unknown) => error instanceof ConfigError && error.message === 'FLOODNET_PORT: expected an integer, got "abc"'
    );
    assert.throws(
      () => loadConfigFromEnv({ FLOODNET_SEEN_CAPACITY: '0' }),
      { message: 'FLOODNET_SEEN_CAPACITY: must be between 1 and 10000000, got 0' }
    );
    assert.throws(() => loadConfigFromEnv({ FLOODNET_PORT: '70000' }), ConfigError);
    assert.throws(() => loadConfigFromEnv({ FLOODNET_RECONNECT_MS: '-5' }), ConfigError);
  });

  it('rejects peers that are not WebSocket URLs', () => {
    assert.throws(
      () => loadConfigFromEnv({ FLOODNET_PEERS: 'http://relay-a' }),
      { message: 'FLOODNET_PEERS: not a ws:// or wss:// URL: "http://relay-a"' }
    );
  });

  it('rejects a malformed secret key', () => {
    assert.throws(
      () => loadConfigFromEnv({ FLOODNET_SECRET_KEY: 'abcd' }),
      { message: 'FLOODNET_SECRET_KEY: expected 64 hex characters' }
    );
  });
});

describe('parseChannelList', () => {
  it('returns nothing for an unset value', () => {
    assert.deepEqual(parseChannelList(undefined), []);
    assert.deepEqual(parseChannelList(' , '), []);
  });

  it('keeps the passphrase verbatim after the first =', () => {
    assert.deepEqual(parseChannelList('dev=a=b'), [{ name: 'dev', passphrase: 'a=b' }]);
  });

  it('lets a later entry override an earlier one', () => {
    assert.deepEqual(parseChannelList('dev=old,general,dev=new'), [
      { name: 'dev', passphrase: 'new' },
      { name: 'general' }
    ]);
  });

  it('rejects bad names and empty passphrases', () => {
    assert.throws(() => parseChannelList('=secret'), { message: 'FLOODNET_CHANNELS: invalid channel name ""' });
    assert.throws(() => parseChannelList('dev='), { message: 'FLOODNET_CHANNELS: empty passphrase for channel dev' });
    assert.throws(() => parseChannelList('a b', 'CUSTOM'), { message: 'CUSTOM: invalid channel name "a b"' });
  });
});
