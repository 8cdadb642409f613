/**
 * Node configuration from the environment
 *
 * FLOODNET_PORT            listen port, or "off" to only dial (default: 7710)
 * FLOODNET_HOST            listen address (default: 0.0.0.0)
 * FLOODNET_PEERS           comma-separated ws:// URLs to dial
 * FLOODNET_NICK            nickname announced on join/part
 * FLOODNET_SECRET_KEY      64-char hex X25519 secret; generated when unset
 * FLOODNET_CHANNELS        comma list of `name` or `name=passphrase`
 * FLOODNET_SEEN_CAPACITY   dedup window size
 * FLOODNET_LOG_CAPACITY    catch-up history size
 * FLOODNET_MAX_PAYLOAD     largest accepted payload in bytes
 * FLOODNET_RECONNECT_MS    redial delay for dropped peers
 */

import { Crypto, KEY_LENGTH } from './crypto.js';
import { ConfigError } from './errors.js';
import { DEFAULT_MAX_PAYLOAD_BYTES, isValidChannelName } from './event.js';

export interface ChannelConfig {
  readonly name: string;
  /** Shared-key passphrase; the channel is plaintext without one */
  readonly passphrase?: string;
}

export interface RelayNodeConfig {
  /** undefined means dial-only */
  readonly port?: number;
  readonly host: string;
  readonly peers: readonly string[];
  readonly nickname: string;
  readonly secretKey?: Uint8Array;
  readonly channels: readonly ChannelConfig[];
  readonly seenCacheCapacity: number;
  readonly eventLogCapacity: number;
  readonly maxPayloadBytes: number;
  readonly reconnectDelayMs: number;
}

export const DEFAULT_CONFIG: RelayNodeConfig = {
  port: 7710,
  host: '0.0.0.0',
  peers: [],
  nickname: '',
  channels: [],
  seenCacheCapacity: 8192,
  eventLogCapacity: 500,
  maxPayloadBytes: DEFAULT_MAX_PAYLOAD_BYTES,
  reconnectDelayMs: 5_000
};

type Env = Record<string, string | undefined>;

function readVar(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function parseInteger(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = readVar(env, name);
  if (raw === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(name, `expected an integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < min || value > max) {
    throw new ConfigError(name, `must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

function parseList(raw: string | undefined): string[] {
  return (raw ?? '').split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * Parse `name` / `name=passphrase` entries
 */
export function parseChannelList(raw: string | undefined, variable = 'FLOODNET_CHANNELS'): ChannelConfig[] {
  const channels = new Map<string, ChannelConfig>();

  for (const entry of parseList(raw)) {
    const separator = entry.indexOf('=');
    const name = separator === -1 ? entry : entry.slice(0, separator).trim();
    const passphrase = separator === -1 ? undefined : entry.slice(separator + 1);

    if (!isValidChannelName(name)) {
      throw new ConfigError(variable, `invalid channel name "${name}"`);
    }
    if (passphrase !== undefined && passphrase.length === 0) {
      throw new ConfigError(variable, `empty passphrase for channel ${name}`);
    }

    // Later entries win, like a rejoin
    channels.set(name, passphrase === undefined ? { name } : { name, passphrase });
  }

  return Array.from(channels.values());
}

function parsePeers(raw: string | undefined): string[] {
  const peers = parseList(raw);
  for (const peer of peers) {
    if (!/^wss?:\/\/\S+$/.test(peer)) {
      throw new ConfigError('FLOODNET_PEERS', `not a ws:// or wss:// URL: "${peer}"`);
    }
  }
  return peers;
}

export function loadConfigFromEnv(env: Env = process.env): RelayNodeConfig {
  const rawPort = readVar(env, 'FLOODNET_PORT');
  const port = rawPort === 'off'
    ? undefined
    : parseInteger(env, 'FLOODNET_PORT', DEFAULT_CONFIG.port ?? 7710, 0, 65535);

  const rawSecret = readVar(env, 'FLOODNET_SECRET_KEY');
  if (rawSecret !== undefined && !Crypto.isHex(rawSecret, KEY_LENGTH)) {
    throw new ConfigError('FLOODNET_SECRET_KEY', `expected ${KEY_LENGTH * 2} hex characters`);
  }

  return {
    port,
    host: readVar(env, 'FLOODNET_HOST') ?? DEFAULT_CONFIG.host,
    peers: parsePeers(readVar(env, 'FLOODNET_PEERS')),
    nickname: readVar(env, 'FLOODNET_NICK') ?? DEFAULT_CONFIG.nickname,
    secretKey: rawSecret === undefined ? undefined : Crypto.fromHex(rawSecret),
    channels: parseChannelList(readVar(env, 'FLOODNET_CHANNELS')),
    seenCacheCapacity: parseInteger(env, 'FLOODNET_SEEN_CAPACITY', DEFAULT_CONFIG.seenCacheCapacity, 1, 10_000_000),
    eventLogCapacity: parseInteger(env, 'FLOODNET_LOG_CAPACITY', DEFAULT_CONFIG.eventLogCapacity, 1, 1_000_000),
    maxPayloadBytes: parseInteger(env, 'FLOODNET_MAX_PAYLOAD', DEFAULT_CONFIG.maxPayloadBytes, 1, 16 * 1024 * 1024),
    reconnectDelayMs: parseInteger(env, 'FLOODNET_RECONNECT_MS', DEFAULT_CONFIG.reconnectDelayMs, 100, 3_600_000)
  };
}
