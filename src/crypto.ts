/**
 * Cryptographic primitives for the relay node
 *
 * - Sealed boxes for private messages (X25519 + HKDF + XChaCha20-Poly1305)
 * - Authenticated channel encryption under a shared key
 * - SHA-256 hashing and canonical serialization for event ids
 */

import { sha256 } from '@noble/hashes/sha256';
import { hkdf } from '@noble/hashes/hkdf';
import { bytesToHex, hexToBytes, concatBytes } from '@noble/hashes/utils';
import { randomBytes } from 'crypto';
import { x25519 } from '@noble/curves/ed25519';
import { xchacha20poly1305 } from '@noble/ciphers/chacha';
import { managedNonce } from '@noble/ciphers/webcrypto';
import { DecryptFailedError } from './errors.js';

/**
 * Domain separation constants for HKDF key derivation
 */
const KDF_SALT_SEALED_BOX = new TextEncoder().encode('FLOODNET_SEALED_BOX_V1');
const KDF_SALT_CHANNEL_KEY = new TextEncoder().encode('FLOODNET_CHANNEL_KEY_V1');

export const KEY_LENGTH = 32;
export const NONCE_LENGTH = 24;
const TAG_LENGTH = 16;
const SEALED_OVERHEAD = KEY_LENGTH + NONCE_LENGTH + TAG_LENGTH;

export type DecryptOutcome =
  | { readonly ok: true; readonly plaintext: Uint8Array }
  | { readonly ok: false; readonly error: DecryptFailedError };

export interface KeyPair {
  readonly publicKey: Uint8Array;
  readonly secretKey: Uint8Array;
}

export class Crypto {
  /**
   * Generate cryptographically secure random bytes
   */
  static randomBytes(length: number): Uint8Array {
    return new Uint8Array(randomBytes(length));
  }

  /**
   * Hash arbitrary data with SHA-256
   */
  static hash(...inputs: (Uint8Array | string | number)[]): Uint8Array {
    const combined = inputs.map(input => {
      if (typeof input === 'string') {
        return new TextEncoder().encode(input);
      } else if (typeof input === 'number') {
        const buf = new ArrayBuffer(8);
        const view = new DataView(buf);
        view.setBigUint64(0, BigInt(input), false);
        return new Uint8Array(buf);
      }
      return input;
    });

    return sha256(concatBytes(...combined));
  }

  static toHex(bytes: Uint8Array): string {
    return bytesToHex(bytes);
  }

  static fromHex(hex: string): Uint8Array {
    return hexToBytes(hex);
  }

  /**
   * Lowercase or uppercase hex of even length; `byteLength` pins the decoded size
   */
  static isHex(value: unknown, byteLength?: number): value is string {
    if (typeof value !== 'string' || value.length % 2 !== 0) {
      return false;
    }
    if (byteLength !== undefined && value.length !== byteLength * 2) {
      return false;
    }
    return /^[0-9a-fA-F]*$/.test(value);
  }

  static hashString(input: string): string {
    return this.toHex(this.hash(input));
  }

  /**
   * Deterministic JSON stringify with sorted keys
   *
   * JSON.stringify() keeps insertion order, so two encoders building the same
   * object differently would hash differently. Keys are sorted recursively.
   */
  static stableStringify(obj: unknown): string {
    if (obj === null || obj === undefined) {
      return JSON.stringify(obj);
    }

    if (typeof obj !== 'object') {
      return JSON.stringify(obj);
    }

    if (Array.isArray(obj)) {
      const items = obj.map(item => this.stableStringify(item));
      return '[' + items.join(',') + ']';
    }

    const pairs = Object.entries(obj)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, value]) => JSON.stringify(key) + ':' + this.stableStringify(value));

    return '{' + pairs.join(',') + '}';
  }

  /**
   * Hash an object deterministically (hex)
   */
  static hashObject(obj: unknown): string {
    return this.hashString(this.stableStringify(obj));
  }

  /**
   * Constant-time comparison of byte arrays
   */
  static constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
    if (a.length !== b.length) {
      return false;
    }

    let result = 0;
    for (let i = 0; i < a.length; i++) {
      result |= a[i] ^ b[i];
    }

    return result === 0;
  }

  /**
   * HKDF-SHA256 key derivation
   */
  static deriveKey(
    ikm: Uint8Array,
    salt: Uint8Array,
    info: Uint8Array | string,
    length: number = KEY_LENGTH
  ): Uint8Array {
    const infoBytes = typeof info === 'string'
      ? new TextEncoder().encode(info)
      : info;

    return hkdf(sha256, ikm, salt, infoBytes, length);
  }

  /**
   * Generate an X25519 key pair for receiving private messages
   */
  static generateKeyPair(): KeyPair {
    const secretKey = this.randomBytes(KEY_LENGTH);
    return { publicKey: x25519.getPublicKey(secretKey), secretKey };
  }

  static getPublicKey(secretKey: Uint8Array): Uint8Array {
    return x25519.getPublicKey(secretKey);
  }

  /**
   * Derive a 32-byte channel key from an operator-supplied passphrase
   *
   * The channel name is the HKDF info, so one passphrase yields distinct keys
   * for distinct channels.
   */
  static deriveChannelKey(passphrase: string, channel: string): Uint8Array {
    const ikm = new TextEncoder().encode(passphrase);
    return this.deriveKey(ikm, KDF_SALT_CHANNEL_KEY, channel, KEY_LENGTH);
  }

  /**
   * Seal a message to a recipient's X25519 public key
   *
   * Anonymous sender: a fresh ephemeral key pair is used per message and
   * nothing binds the sender's identity.
   *
   * Layout: ephemeralPublic(32) || nonce(24) || ciphertext || tag(16)
   */
  static sealTo(recipientPublicKey: Uint8Array, plaintext: Uint8Array): Uint8Array {
    if (recipientPublicKey.length !== KEY_LENGTH) {
      throw new Error(`Invalid recipient public key: expected ${KEY_LENGTH} bytes, got ${recipientPublicKey.length}`);
    }

    const ephemeral = this.generateKeyPair();
    const sharedSecret = x25519.getSharedSecret(ephemeral.secretKey, recipientPublicKey);

    // Info binds the key to this exchange
    const info = concatBytes(ephemeral.publicKey, recipientPublicKey);
    const key = this.deriveKey(sharedSecret, KDF_SALT_SEALED_BOX, info, KEY_LENGTH);

    const sealed = managedNonce(xchacha20poly1305)(key).encrypt(plaintext);
    return concatBytes(ephemeral.publicKey, sealed);
  }

  /**
   * Open a sealed box with our X25519 secret key
   *
   * Never throws: any failure comes back as a DecryptFailed outcome.
   */
  static openSealed(secretKey: Uint8Array, ciphertext: Uint8Array): DecryptOutcome {
    if (ciphertext.length < SEALED_OVERHEAD) {
      return {
        ok: false,
        error: new DecryptFailedError(`sealed box too short (${ciphertext.length} bytes)`)
      };
    }

    try {
      const ephemeralPublic = ciphertext.subarray(0, KEY_LENGTH);
      const sealed = ciphertext.subarray(KEY_LENGTH);
      const ourPublic = x25519.getPublicKey(secretKey);
      const sharedSecret = x25519.getSharedSecret(secretKey, ephemeralPublic);

      const info = concatBytes(ephemeralPublic, ourPublic);
      const key = this.deriveKey(sharedSecret, KDF_SALT_SEALED_BOX, info, KEY_LENGTH);

      const plaintext = managedNonce(xchacha20poly1305)(key).decrypt(sealed);
      return { ok: true, plaintext };
    } catch (error) {
      return { ok: false, error: new DecryptFailedError('sealed box did not open', { cause: error }) };
    }
  }

  /**
   * Encrypt a channel message under the channel's shared key
   *
   * The nonce is the event's own random component; callers generate one per
   * event. The channel name is authenticated as associated data.
   */
  static sealChannel(
    key: Uint8Array,
    nonce: Uint8Array,
    channel: string,
    plaintext: Uint8Array
  ): Uint8Array {
    if (key.length !== KEY_LENGTH || nonce.length !== NONCE_LENGTH) {
      throw new Error(`Channel encryption needs a ${KEY_LENGTH}-byte key and a ${NONCE_LENGTH}-byte nonce`);
    }
    const aad = new TextEncoder().encode(channel);
    return xchacha20poly1305(key, nonce, aad).encrypt(plaintext);
  }

  static openChannel(
    key: Uint8Array,
    nonce: Uint8Array,
    channel: string,
    ciphertext: Uint8Array
  ): DecryptOutcome {
    if (ciphertext.length < TAG_LENGTH) {
      return {
        ok: false,
        error: new DecryptFailedError(`channel ciphertext too short (${ciphertext.length} bytes)`)
      };
    }

    try {
      const aad = new TextEncoder().encode(channel);
      const plaintext = xchacha20poly1305(key, nonce, aad).decrypt(ciphertext);
      return { ok: true, plaintext };
    } catch (error) {
      return { ok: false, error: new DecryptFailedError(`channel ${channel} payload did not authenticate`, { cause: error }) };
    }
  }
}
