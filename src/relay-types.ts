/**
 * Core types for the Floodnet relay
 */

/**
 * Closed set of event kinds. The relay's routing switch is exhaustive over
 * this union; adding a kind without handling it fails to compile.
 */
export type EventKind = 'channel-message' | 'private-message' | 'join' | 'part';

export const EVENT_KINDS: readonly EventKind[] = ['channel-message', 'private-message', 'join', 'part'];

export type ChannelEventKind = Exclude<EventKind, 'private-message'>;

interface EventFields {
  /** SHA-256 (hex) of the canonical {kind, target, timestamp, nonce, payload} */
  readonly id: string;
  /** Originator's wall clock in ms; display ordering only */
  readonly timestamp: number;
  /** 24 random bytes (hex); per-event nonce for channel encryption */
  readonly nonce: string;
  /** Plaintext or ciphertext, opaque to relays */
  readonly payload: Uint8Array;
}

export interface ChannelEvent extends EventFields {
  readonly kind: ChannelEventKind;
  /** Channel name */
  readonly target: string;
}

export interface PrivateEvent extends EventFields {
  readonly kind: 'private-message';
  /** Recipient X25519 public key (hex) */
  readonly target: string;
}

/**
 * The unit of relay. Immutable once constructed.
 */
export type RelayEvent = ChannelEvent | PrivateEvent;

/**
 * A connected peer as seen by the transport layer
 */
export interface PeerHandle {
  readonly id: string;
}

/**
 * Outbound primitives supplied by the transport layer
 */
export interface RelayTransport {
  send(peer: PeerHandle, frame: Uint8Array): Promise<void>;
  /** Queried at every fan-out, never cached by the relay */
  listConnectedPeers(): Iterable<PeerHandle>;
}

/**
 * Decrypted content handed to the local subscriber (UI, IRC bridge)
 */
export interface LocalDelivery {
  readonly kind: EventKind;
  readonly target: string;
  readonly plaintext: Uint8Array;
  readonly eventId: string;
  readonly timestamp: number;
}

export type LocalDeliveryHandler = (delivery: LocalDelivery) => void | Promise<void>;

export type RelayOutcome =
  | { readonly status: 'closed' }
  | { readonly status: 'rate-limited'; readonly peerId: string }
  | { readonly status: 'malformed'; readonly reason: string }
  | { readonly status: 'duplicate'; readonly eventId: string }
  | {
      readonly status: 'relayed';
      readonly eventId: string;
      readonly delivered: boolean;
      readonly decryptFailed: boolean;
      readonly forwardedTo: number;
      readonly failedPeers: readonly string[];
      readonly sequence: number;
    };

export interface CatchUpResult {
  readonly sent: number;
  readonly failed: number;
  readonly gap: boolean;
  readonly nextCursor: number;
}

export interface RelayStats {
  received: number;
  duplicates: number;
  malformed: number;
  delivered: number;
  decryptFailures: number;
  forwarded: number;
  sendFailures: number;
  rateLimited: number;
  published: number;
}
