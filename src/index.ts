/**
 * Floodnet - peer-to-peer chat relay node
 *
 * Flood routing with duplicate suppression:
 * - Every accepted event is sent to all connected peers but its origin
 * - A bounded seen-cache keeps the flood loop-free
 * - Payloads stay opaque to nodes that cannot decrypt them
 * - A bounded event log answers catch-up for newly connected peers
 */

export { RelayEngine } from './relay/relay-engine.js';
export type { RelayEngineConfig } from './relay/relay-engine.js';

export { SeenCache } from './relay/seen-cache.js';
export type { SeenCacheConfig } from './relay/seen-cache.js';

export { ChannelRegistry } from './relay/channel-registry.js';

export { EventLog } from './relay/event-log.js';
export type { EventLogConfig, EventLogSnapshot, LogEntry } from './relay/event-log.js';

export { PeerGuard } from './relay/peer-guard.js';
export type { PeerGuardConfig } from './relay/peer-guard.js';

export {
  createEvent,
  computeEventId,
  encodeEvent,
  decodeEvent,
  encodeText,
  decodeText,
  isValidChannelName,
  isValidPublicKeyHex,
  DEFAULT_MAX_PAYLOAD_BYTES,
  WIRE_VERSION
} from './event.js';
export type { EventDraft, DecodeOptions } from './event.js';

export { Crypto, KEY_LENGTH, NONCE_LENGTH } from './crypto.js';
export type { DecryptOutcome, KeyPair } from './crypto.js';

export {
  RelayError,
  MalformedEventError,
  DecryptFailedError,
  PeerSendFailedError,
  ConfigError
} from './errors.js';
export type { RelayErrorCode } from './errors.js';

export { loadConfigFromEnv, parseChannelList, DEFAULT_CONFIG } from './config.js';
export type { RelayNodeConfig, ChannelConfig } from './config.js';

export { WsTransport } from './network/ws-transport.js';
export type { WsTransportConfig, FrameHandler, ConnectionHandler } from './network/ws-transport.js';

export { RelayNode } from './relay-node.js';
export type { RelayNodeOptions } from './relay-node.js';

export { EVENT_KINDS } from './relay-types.js';
export type {
  EventKind,
  ChannelEventKind,
  ChannelEvent,
  PrivateEvent,
  RelayEvent,
  PeerHandle,
  RelayTransport,
  LocalDelivery,
  LocalDeliveryHandler,
  RelayOutcome,
  CatchUpResult,
  RelayStats
} from './relay-types.js';
