/**
 * RelayEngine: flood relay with duplicate suppression
 *
 * For every inbound frame:
 *
 *   Received → PeerGuard → Decoded → Seen? ─yes→ dropped
 *                                     │no
 *                       Addressed to us? ─yes→ decrypt → deliver locally
 *                                     │
 *            rebroadcast to every connected peer except the origin
 *                                     │
 *                                   logged
 *
 * Relay never depends on decryption: a node forwards traffic for channels it
 * has not joined and private messages it cannot open, and payloads stay
 * opaque to it. Loop freedom comes from the seen-cache alone; there are no
 * routing tables.
 *
 * Everything up to and including the log append runs synchronously, before
 * the first await, so the dedup check-and-insert, registry reads and log
 * order are never interleaved between peers. Only the sends are asynchronous,
 * and each send fails on its own.
 */

import { Crypto, NONCE_LENGTH } from '../crypto.js';
import type { DecryptOutcome, KeyPair } from '../crypto.js';
import { MalformedEventError, PeerSendFailedError } from '../errors.js';
import {
  DEFAULT_MAX_PAYLOAD_BYTES,
  createEvent,
  decodeEvent,
  encodeEvent,
  encodeText,
  isValidPublicKeyHex
} from '../event.js';
import type {
  CatchUpResult,
  LocalDeliveryHandler,
  PeerHandle,
  RelayEvent,
  RelayOutcome,
  RelayStats,
  RelayTransport
} from '../relay-types.js';
import { ChannelRegistry } from './channel-registry.js';
import { EventLog } from './event-log.js';
import type { EventLogSnapshot } from './event-log.js';
import { DEFAULT_MAX_FRAMES_PER_WINDOW, PeerGuard } from './peer-guard.js';
import type { PeerGuardConfig } from './peer-guard.js';
import { SeenCache } from './seen-cache.js';

export interface RelayEngineConfig {
  readonly transport: RelayTransport;

  /**
   * X25519 key pair; private messages addressed to the public half are
   * opened with the secret half. A fresh pair is generated when omitted.
   */
  readonly identity?: KeyPair;

  /**
   * Consumer of decrypted content. Errors it throws or rejects with are
   * logged and never affect relaying.
   */
  readonly deliverLocal?: LocalDeliveryHandler;

  /** Announced as the payload of our join/part events (default: '') */
  readonly nickname?: string;

  /** Dedup window size (default: 8192) */
  readonly seenCacheCapacity?: number;

  /** Catch-up history size (default: 500) */
  readonly eventLogCapacity?: number;

  /** Frames with larger payloads are malformed (default: 65536) */
  readonly maxPayloadBytes?: number;

  /**
   * Inbound flood limits. The frame allowance defaults to four times the
   * event log capacity (at least 500), so catch-up replays are not banned.
   */
  readonly peerGuard?: PeerGuardConfig;

  /** How often idle peer records are swept (default: 60000) */
  readonly maintenanceIntervalMs?: number;
}

type ReadResult =
  | { readonly addressed: false }
  | { readonly addressed: true; readonly outcome: DecryptOutcome };

interface FanOutReport {
  readonly forwardedTo: number;
  readonly failedPeers: readonly string[];
}

/** Catch-up replays tolerated per rate-limit window */
const CATCH_UP_HEADROOM = 4;

function assertNever(value: never): never {
  throw new Error(`Unhandled event kind: ${JSON.stringify(value)}`);
}

export class RelayEngine {
  readonly channels = new ChannelRegistry();
  readonly publicKeyHex: string;

  private readonly transport: RelayTransport;
  private readonly secretKey: Uint8Array;
  private readonly deliverLocal?: LocalDeliveryHandler;
  private readonly nickname: string;
  private readonly maxPayloadBytes: number;
  private readonly seen: SeenCache;
  private readonly log: EventLog;
  private readonly peerGuard: PeerGuard;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly maintenanceTimer: NodeJS.Timeout;
  private closed = false;

  private readonly stats: RelayStats = {
    received: 0,
    duplicates: 0,
    malformed: 0,
    delivered: 0,
    decryptFailures: 0,
    forwarded: 0,
    sendFailures: 0,
    rateLimited: 0,
    published: 0
  };

  constructor(config: RelayEngineConfig) {
    const identity = config.identity ?? Crypto.generateKeyPair();
    this.transport = config.transport;
    this.secretKey = identity.secretKey;
    this.publicKeyHex = Crypto.toHex(identity.publicKey);
    this.deliverLocal = config.deliverLocal;
    this.nickname = config.nickname ?? '';
    this.maxPayloadBytes = config.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES;
    this.seen = new SeenCache({ capacity: config.seenCacheCapacity });
    this.log = new EventLog({ capacity: config.eventLogCapacity });
    // A connecting peer may replay its whole log at once, plus any reconnects
    // within the window; the default frame allowance has to cover that
    this.peerGuard = new PeerGuard({
      ...config.peerGuard,
      maxFramesPerWindow: config.peerGuard?.maxFramesPerWindow
        ?? Math.max(DEFAULT_MAX_FRAMES_PER_WINDOW, this.log.capacity * CATCH_UP_HEADROOM)
    });

    this.maintenanceTimer = setInterval(() => {
      this.peerGuard.cleanup();
    }, config.maintenanceIntervalMs ?? 60_000);
    this.maintenanceTimer.unref();
  }

  /**
   * Process one frame received from a connected peer
   *
   * Never rejects for anything the peer sent: malformed frames, duplicates,
   * undecryptable payloads and failed sends all resolve to an outcome.
   */
  async onEvent(peer: PeerHandle, frame: Uint8Array): Promise<RelayOutcome> {
    if (this.closed) {
      return { status: 'closed' };
    }

    if (!this.peerGuard.checkLimit(peer.id)) {
      this.stats.rateLimited++;
      return { status: 'rate-limited', peerId: peer.id };
    }

    this.stats.received++;

    let event: RelayEvent;
    try {
      event = decodeEvent(frame, { maxPayloadBytes: this.maxPayloadBytes });
    } catch (error) {
      if (!(error instanceof MalformedEventError)) {
        throw error;
      }
      this.stats.malformed++;
      this.peerGuard.recordViolation(peer.id);
      console.warn(`[RelayEngine] Dropped malformed frame from ${peer.id}: ${error.reason}`);
      return { status: 'malformed', reason: error.reason };
    }

    return this.accept(event, frame, peer);
  }

  /**
   * Inject a locally created event
   *
   * Recorded as seen so echoes from peers are dropped, sent to every
   * connected peer and logged. Not delivered locally.
   */
  async publish(event: RelayEvent): Promise<RelayOutcome> {
    if (this.closed) {
      return { status: 'closed' };
    }
    return this.accept(event, encodeEvent(event));
  }

  /**
   * Send a message to a joined channel, encrypted when the channel has a key
   */
  async sendChannelMessage(channel: string, text: string): Promise<RelayOutcome> {
    if (!this.channels.isJoined(channel)) {
      throw new Error(`Not joined to channel ${channel}`);
    }

    const nonce = Crypto.randomBytes(NONCE_LENGTH);
    const key = this.channels.keyFor(channel);
    const plaintext = encodeText(text);
    const payload = key ? Crypto.sealChannel(key, nonce, channel, plaintext) : plaintext;

    return this.publish(createEvent({ kind: 'channel-message', target: channel, payload, nonce }));
  }

  /**
   * Seal a message to a recipient's public key and publish it
   */
  async sendPrivateMessage(recipientPublicKeyHex: string, text: string): Promise<RelayOutcome> {
    if (!isValidPublicKeyHex(recipientPublicKeyHex)) {
      throw new Error('Recipient must be a 64-char lowercase hex public key');
    }

    const payload = Crypto.sealTo(Crypto.fromHex(recipientPublicKeyHex), encodeText(text));
    return this.publish(createEvent({ kind: 'private-message', target: recipientPublicKeyHex, payload }));
  }

  /**
   * Join (or rejoin with a new key) and announce it
   */
  async joinChannel(channel: string, sharedKey?: Uint8Array): Promise<RelayOutcome> {
    this.channels.join(channel, sharedKey);
    console.log(`[RelayEngine] Joined ${channel}${sharedKey ? ' (encrypted)' : ''}`);
    return this.publish(createEvent({ kind: 'join', target: channel, payload: encodeText(this.nickname) }));
  }

  /**
   * Leave and announce it. Parting an unjoined channel publishes nothing.
   */
  async partChannel(channel: string): Promise<RelayOutcome | null> {
    if (!this.channels.part(channel)) {
      return null;
    }
    console.log(`[RelayEngine] Parted ${channel}`);
    return this.publish(createEvent({ kind: 'part', target: channel, payload: encodeText(this.nickname) }));
  }

  /**
   * Read-only view of retained history after `cursor`
   */
  snapshotSince(cursor = 0): EventLogSnapshot {
    return this.log.snapshotSince(cursor);
  }

  /**
   * Replay retained history to one peer, oldest first
   *
   * Stops at the first failed send; `nextCursor` is then the last sequence
   * the peer received, so the caller can resume from there.
   */
  async serveCatchUp(peer: PeerHandle, cursor = 0): Promise<CatchUpResult> {
    const snapshot = this.log.snapshotSince(cursor);
    if (this.closed) {
      return { sent: 0, failed: 0, gap: snapshot.gap, nextCursor: cursor };
    }

    if (snapshot.gap) {
      console.warn(`[RelayEngine] Catch-up for ${peer.id} from ${cursor} has a gap; oldest retained is ${this.log.oldestSequence}`);
    }

    let sent = 0;
    let lastSent = cursor;
    for (const entry of snapshot.entries) {
      try {
        await this.sendTo(peer, encodeEvent(entry.event));
      } catch (error) {
        this.stats.sendFailures++;
        console.warn(`[RelayEngine] Catch-up to ${peer.id} stopped after ${sent} events:`, error);
        return { sent, failed: 1, gap: snapshot.gap, nextCursor: lastSent };
      }
      sent++;
      lastSent = entry.sequence;
    }

    if (sent > 0) {
      console.log(`[RelayEngine] Served ${sent} catch-up events to ${peer.id}`);
    }
    return { sent, failed: 0, gap: snapshot.gap, nextCursor: snapshot.nextCursor };
  }

  isPeerBanned(peerId: string): boolean {
    return this.peerGuard.isPeerBanned(peerId);
  }

  unbanPeer(peerId: string): void {
    this.peerGuard.unbanPeer(peerId);
  }

  getStats() {
    const guard = this.peerGuard.getStats();
    return {
      ...this.stats,
      seenCacheSize: this.seen.size,
      seenCacheEvictions: this.seen.evictions,
      eventLogSize: this.log.size,
      eventLogHead: this.log.headSequence,
      joinedChannels: this.channels.size,
      trackedPeers: guard.trackedPeers,
      bannedPeers: guard.bannedPeers,
      inFlight: this.inFlight.size
    };
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Stop accepting events and wait for in-flight sends and deliveries
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    clearInterval(this.maintenanceTimer);
    await Promise.allSettled(Array.from(this.inFlight));
  }

  private async accept(event: RelayEvent, frame: Uint8Array, origin?: PeerHandle): Promise<RelayOutcome> {
    if (this.seen.containsAndRecord(event.id)) {
      this.stats.duplicates++;
      return { status: 'duplicate', eventId: event.id };
    }

    let delivered = false;
    let decryptFailed = false;

    if (origin) {
      const read = this.readLocally(event);
      if (read.addressed) {
        if (read.outcome.ok) {
          this.dispatchDelivery(event, read.outcome.plaintext);
          delivered = true;
        } else {
          decryptFailed = true;
          this.stats.decryptFailures++;
          console.warn(
            `[RelayEngine] Cannot read ${event.kind} ${event.id.slice(0, 8)} for ${event.target.slice(0, 16)}: ` +
            `${read.outcome.error.reason}; relaying without delivery`
          );
        }
      }
    } else {
      this.stats.published++;
    }

    const fanOut = this.fanOut(frame, origin);
    const sequence = this.log.append(event);

    const report = await fanOut;
    console.log(
      `[RelayEngine] ${origin ? 'Relayed' : 'Published'} ${event.kind} ${event.id.slice(0, 8)} ` +
      `from ${origin?.id ?? 'local'} to ${report.forwardedTo} peer(s)`
    );

    return {
      status: 'relayed',
      eventId: event.id,
      delivered,
      decryptFailed,
      forwardedTo: report.forwardedTo,
      failedPeers: report.failedPeers,
      sequence
    };
  }

  /**
   * Decide whether an event is for us and, if so, recover its plaintext
   */
  private readLocally(event: RelayEvent): ReadResult {
    switch (event.kind) {
      case 'private-message':
        if (event.target !== this.publicKeyHex) {
          return { addressed: false };
        }
        return { addressed: true, outcome: Crypto.openSealed(this.secretKey, event.payload) };

      case 'channel-message': {
        if (!this.channels.isJoined(event.target)) {
          return { addressed: false };
        }
        const key = this.channels.keyFor(event.target);
        if (!key) {
          return { addressed: true, outcome: { ok: true, plaintext: event.payload } };
        }
        const nonce = Crypto.fromHex(event.nonce);
        return { addressed: true, outcome: Crypto.openChannel(key, nonce, event.target, event.payload) };
      }

      case 'join':
      case 'part':
        if (!this.channels.isJoined(event.target)) {
          return { addressed: false };
        }
        return { addressed: true, outcome: { ok: true, plaintext: event.payload } };

      default:
        return assertNever(event);
    }
  }

  private dispatchDelivery(event: RelayEvent, plaintext: Uint8Array): void {
    this.stats.delivered++;
    if (!this.deliverLocal) {
      return;
    }

    const delivery = {
      kind: event.kind,
      target: event.target,
      plaintext,
      eventId: event.id,
      timestamp: event.timestamp
    };

    let result: void | Promise<void>;
    try {
      result = this.deliverLocal(delivery);
    } catch (error) {
      console.warn(`[RelayEngine] Local delivery of ${event.id.slice(0, 8)} threw:`, error);
      return;
    }

    if (result instanceof Promise) {
      this.track(result.catch((error: unknown) => {
        console.warn(`[RelayEngine] Local delivery of ${event.id.slice(0, 8)} failed:`, error);
      }));
    }
  }

  /**
   * Send to every connected peer except the origin, each send independent
   */
  private fanOut(frame: Uint8Array, origin?: PeerHandle): Promise<FanOutReport> {
    const targets = Array.from(this.transport.listConnectedPeers())
      .filter(peer => peer.id !== origin?.id);

    const settled = Promise.allSettled(targets.map(peer => this.sendTo(peer, frame)));

    const report = settled.then(results => {
      const failedPeers: string[] = [];
      results.forEach((result, index) => {
        if (result.status === 'rejected') {
          failedPeers.push(targets[index].id);
          console.warn(`[RelayEngine] ${String(result.reason)}`);
        }
      });
      this.stats.forwarded += targets.length - failedPeers.length;
      this.stats.sendFailures += failedPeers.length;
      return { forwardedTo: targets.length - failedPeers.length, failedPeers };
    });

    this.track(report.then(() => undefined));
    return report;
  }

  private async sendTo(peer: PeerHandle, frame: Uint8Array): Promise<void> {
    try {
      await this.transport.send(peer, frame);
    } catch (error) {
      if (error instanceof PeerSendFailedError) {
        throw error;
      }
      throw new PeerSendFailedError(peer.id, { cause: error });
    }
  }

  private track(promise: Promise<void>): void {
    this.inFlight.add(promise);
    void promise.then(() => {
      this.inFlight.delete(promise);
    });
  }
}
