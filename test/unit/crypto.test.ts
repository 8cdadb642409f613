/**
 * Crypto unit tests: sealed boxes, channel encryption, helpers
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Crypto } from '../../src/crypto.js';
import { DecryptFailedError } from '../../src/errors.js';
import { encodeText, decodeText } from '../../src/event.js';

describe('Crypto sealed boxes', () => {
  const recipient = Crypto.generateKeyPair();

  it('opens what was sealed to it', () => {
    for (const text of ['', 'hi', 'ünïcødé ✓', 'x'.repeat(10_000)]) {
      const sealed = Crypto.sealTo(recipient.publicKey, encodeText(text));
      const opened = Crypto.openSealed(recipient.secretKey, sealed);

      assert.equal(opened.ok, true);
      if (opened.ok) {
        assert.equal(decodeText(opened.plaintext), text);
      }
    }
  });

  it('adds ephemeral key, nonce and tag overhead', () => {
    const sealed = Crypto.sealTo(recipient.publicKey, encodeText('hello'));
    assert.equal(sealed.length, 32 + 24 + 5 + 16);
  });

  it('uses a fresh ephemeral key per message', () => {
    const a = Crypto.sealTo(recipient.publicKey, encodeText('same'));
    const b = Crypto.sealTo(recipient.publicKey, encodeText('same'));
    assert.notDeepEqual(a, b);
  });

  it('fails to open with any other secret key', () => {
    const stranger = Crypto.generateKeyPair();
    const sealed = Crypto.sealTo(recipient.publicKey, encodeText('for your eyes only'));
    const opened = Crypto.openSealed(stranger.secretKey, sealed);

    assert.equal(opened.ok, false);
    if (!opened.ok) {
      assert.ok(opened.error instanceof DecryptFailedError);
      assert.equal(opened.error.code, 'DECRYPT_FAILED');
    }
  });

  it('fails on tampered bytes', () => {
    const sealed = Crypto.sealTo(recipient.publicKey, encodeText('payload'));
    sealed[sealed.length - 1] ^= 0x01;

    assert.equal(Crypto.openSealed(recipient.secretKey, sealed).ok, false);
  });

  it('fails on truncated input without throwing', () => {
    const opened = Crypto.openSealed(recipient.secretKey, new Uint8Array(10));

    assert.equal(opened.ok, false);
    if (!opened.ok) {
      assert.equal(opened.error.reason, 'sealed box too short (10 bytes)');
    }
  });

  it('rejects a recipient key of the wrong size', () => {
    assert.throws(() => Crypto.sealTo(new Uint8Array(31), encodeText('x')), /expected 32 bytes, got 31/);
  });
});

describe('Crypto channel encryption', () => {
  const key = Crypto.deriveChannelKey('test-secret', 'dev');
  const nonce = Crypto.randomBytes(24);

  it('round-trips under the same key, nonce and channel', () => {
    const ciphertext = Crypto.sealChannel(key, nonce, 'dev', encodeText('ship it'));
    const opened = Crypto.openChannel(key, nonce, 'dev', ciphertext);

    assert.equal(opened.ok, true);
    if (opened.ok) {
      assert.equal(decodeText(opened.plaintext), 'ship it');
    }
  });

  it('fails under another key, nonce or channel name', () => {
    const ciphertext = Crypto.sealChannel(key, nonce, 'dev', encodeText('ship it'));
    const otherKey = Crypto.deriveChannelKey('other-secret', 'dev');

    assert.equal(Crypto.openChannel(otherKey, nonce, 'dev', ciphertext).ok, false);
    assert.equal(Crypto.openChannel(key, Crypto.randomBytes(24), 'dev', ciphertext).ok, false);
    assert.equal(Crypto.openChannel(key, nonce, 'ops', ciphertext).ok, false);
  });

  it('derives distinct 32-byte keys per passphrase and channel', () => {
    assert.equal(key.length, 32);
    assert.deepEqual(Crypto.deriveChannelKey('test-secret', 'dev'), key);
    assert.notDeepEqual(Crypto.deriveChannelKey('test-secret', 'ops'), key);
  });

  it('refuses keys and nonces of the wrong size', () => {
    assert.throws(() => Crypto.sealChannel(new Uint8Array(16), nonce, 'dev', encodeText('x')));
    assert.throws(() => Crypto.sealChannel(key, new Uint8Array(12), 'dev', encodeText('x')));
  });
});

describe('Crypto helpers', () => {
  it('stringifies with sorted keys at every depth', () => {
    const value = { b: 1, a: { d: 2, c: [3, { f: 1, e: 2 }] } };
    assert.equal(Crypto.stableStringify(value), '{"a":{"c":[3,{"e":2,"f":1}],"d":2},"b":1}');
    assert.equal(Crypto.hashObject({ x: 1, y: 2 }), Crypto.hashObject({ y: 2, x: 1 }));
  });

  it('validates hex strings', () => {
    assert.equal(Crypto.isHex('abCD'), true);
    assert.equal(Crypto.isHex('abc'), false);
    assert.equal(Crypto.isHex('zz'), false);
    assert.equal(Crypto.isHex('ab', 1), true);
    assert.equal(Crypto.isHex('abab', 1), false);
    assert.equal(Crypto.isHex(5), false);
  });

  it('round-trips hex', () => {
    assert.equal(Crypto.toHex(new Uint8Array([0, 15, 255])), '000fff');
    assert.deepEqual(Crypto.fromHex('000fff'), new Uint8Array([0, 15, 255]));
  });

  it('compares bytes in constant time', () => {
    assert.equal(Crypto.constantTimeEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2])), true);
    assert.equal(Crypto.constantTimeEqual(new Uint8Array([1, 2]), new Uint8Array([1, 3])), false);
    assert.equal(Crypto.constantTimeEqual(new Uint8Array([1]), new Uint8Array([1, 2])), false);
  });

  it('derives the public key from a secret key', () => {
    const pair = Crypto.generateKeyPair();
    assert.deepEqual(Crypto.getPublicKey(pair.secretKey), pair.publicKey);
  });
});
