/**
 * RelayNode - Wires a RelayEngine to the WebSocket transport
 *
 * New connections get the retained history (cursor 0); whatever the peer
 * already has is discarded by its own seen-cache.
 */

import { Crypto } from './crypto.js';
import type { RelayNodeConfig } from './config.js';
import { RelayEngine } from './relay/relay-engine.js';
import type { LocalDeliveryHandler, PeerHandle } from './relay-types.js';
import { WsTransport } from './network/ws-transport.js';

export interface RelayNodeOptions {
  readonly config: RelayNodeConfig;
  readonly deliverLocal?: LocalDeliveryHandler;
}

export class RelayNode {
  readonly engine: RelayEngine;
  readonly transport: WsTransport;
  private readonly config: RelayNodeConfig;
  private started = false;

  constructor(options: RelayNodeOptions) {
    const { config } = options;
    this.config = config;

    this.transport = new WsTransport({
      port: config.port,
      host: config.host,
      peers: config.peers,
      reconnectDelayMs: config.reconnectDelayMs,
      // Hex doubles the payload; leave room for the JSON envelope
      maxFrameBytes: config.maxPayloadBytes * 2 + 4096
    });

    const secretKey = config.secretKey ?? Crypto.generateKeyPair().secretKey;
    this.engine = new RelayEngine({
      transport: this.transport,
      identity: { secretKey, publicKey: Crypto.getPublicKey(secretKey) },
      deliverLocal: options.deliverLocal,
      nickname: config.nickname,
      seenCacheCapacity: config.seenCacheCapacity,
      eventLogCapacity: config.eventLogCapacity,
      maxPayloadBytes: config.maxPayloadBytes
    });
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;

    for (const channel of this.config.channels) {
      const key = channel.passphrase === undefined
        ? undefined
        : Crypto.deriveChannelKey(channel.passphrase, channel.name);
      await this.engine.joinChannel(channel.name, key);
    }

    this.transport.setFrameHandler((peer: PeerHandle, frame: Uint8Array) => this.engine.onEvent(peer, frame));
    this.transport.setConnectionHandler((peer: PeerHandle) => this.engine.serveCatchUp(peer, 0));

    await this.transport.start();
    console.log(`[RelayNode] Started with public key ${this.engine.publicKeyHex}`);
  }

  async stop(): Promise<void> {
    await this.engine.close();
    await this.transport.stop();
    console.log('[RelayNode] Stopped');
  }
}
