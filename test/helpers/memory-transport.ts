/**
 * In-process transports for relay tests
 *
 * MemoryTransport records every outbound frame. MeshTransport links engines
 * directly: a send is the remote engine's onEvent, awaited, so a publish
 * resolves once the whole flood has settled.
 */

import { decodeEvent } from '../../src/event.js';
import type { RelayEngine } from '../../src/relay/relay-engine.js';
import type { PeerHandle, RelayEvent, RelayTransport } from '../../src/relay-types.js';

export interface SentFrame {
  readonly peerId: string;
  readonly frame: Uint8Array;
}

export class MemoryTransport implements RelayTransport {
  readonly sent: SentFrame[] = [];
  private readonly connected = new Map<string, PeerHandle>();
  private readonly failing = new Set<string>();

  constructor(peerIds: readonly string[] = []) {
    for (const id of peerIds) {
      this.connect(id);
    }
  }

  connect(id: string): PeerHandle {
    const peer = { id };
    this.connected.set(id, peer);
    return peer;
  }

  disconnect(id: string): void {
    this.connected.delete(id);
  }

  failSendsTo(id: string): void {
    this.failing.add(id);
  }

  listConnectedPeers(): PeerHandle[] {
    return Array.from(this.connected.values());
  }

  async send(peer: PeerHandle, frame: Uint8Array): Promise<void> {
    if (this.failing.has(peer.id)) {
      throw new Error(`link to ${peer.id} is down`);
    }
    this.sent.push({ peerId: peer.id, frame });
  }

  framesTo(peerId: string): Uint8Array[] {
    return this.sent.filter(entry => entry.peerId === peerId).map(entry => entry.frame);
  }

  eventsTo(peerId: string): RelayEvent[] {
    return this.framesTo(peerId).map(frame => decodeEvent(frame));
  }

  clear(): void {
    this.sent.length = 0;
  }
}

export class MeshTransport implements RelayTransport {
  engine?: RelayEngine;
  private readonly links = new Map<string, MeshTransport>();

  constructor(readonly name: string) {}

  static link(a: MeshTransport, b: MeshTransport): void {
    a.links.set(b.name, b);
    b.links.set(a.name, a);
  }

  listConnectedPeers(): PeerHandle[] {
    return Array.from(this.links.keys()).map(id => ({ id }));
  }

  async send(peer: PeerHandle, frame: Uint8Array): Promise<void> {
    const remote = this.links.get(peer.id);
    if (!remote?.engine) {
      throw new Error(`no link from ${this.name} to ${peer.id}`);
    }
    await remote.engine.onEvent({ id: this.name }, frame);
  }
}
