/**
 * WebSocket transport for the relay
 *
 * Accepts inbound peers on a WebSocketServer and dials configured peer URLs,
 * redialing them after a fixed delay when they drop. Each binary message is
 * one event frame. Peer discovery and NAT traversal are out of scope: the
 * peer list is static.
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { RawData } from 'ws';
import { PeerSendFailedError } from '../errors.js';
import type { PeerHandle, RelayTransport } from '../relay-types.js';

export interface WsTransportConfig {
  /** Listen port; omit to run dial-only */
  readonly port?: number;
  readonly host?: string;
  /** ws:// URLs to dial and keep connected */
  readonly peers?: readonly string[];
  /** Delay before redialing a dropped or refused peer (default: 5000) */
  readonly reconnectDelayMs?: number;
  /** Largest accepted WebSocket message (default: 256 KiB) */
  readonly maxFrameBytes?: number;
}

export type FrameHandler = (peer: PeerHandle, frame: Uint8Array) => unknown;
export type ConnectionHandler = (peer: PeerHandle) => unknown;

function toBytes(data: RawData): Uint8Array {
  if (Array.isArray(data)) {
    return new Uint8Array(Buffer.concat(data));
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

export class WsTransport implements RelayTransport {
  private readonly config: WsTransportConfig;
  private readonly reconnectDelayMs: number;
  private readonly maxFrameBytes: number;
  private readonly sockets = new Map<string, WebSocket>();
  private readonly redialTimers = new Set<NodeJS.Timeout>();
  private wss?: WebSocketServer;
  private inboundCount = 0;
  private stopped = false;
  private frameHandler?: FrameHandler;
  private connectionHandler?: ConnectionHandler;

  constructor(config: WsTransportConfig = {}) {
    this.config = config;
    this.reconnectDelayMs = config.reconnectDelayMs ?? 5_000;
    this.maxFrameBytes = config.maxFrameBytes ?? 256 * 1024;
  }

  /**
   * Register the consumer of inbound frames (RelayEngine.onEvent)
   */
  setFrameHandler(handler: FrameHandler): void {
    this.frameHandler = handler;
  }

  /**
   * Register the callback for newly connected peers (catch-up)
   */
  setConnectionHandler(handler: ConnectionHandler): void {
    this.connectionHandler = handler;
  }

  async start(): Promise<void> {
    if (this.config.port !== undefined) {
      await this.listen(this.config.port, this.config.host ?? '0.0.0.0');
    }
    for (const url of this.config.peers ?? []) {
      this.dial(url);
    }
  }

  /**
   * Bound port, once listening
   */
  get port(): number | undefined {
    const address = this.wss?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return undefined;
  }

  private listen(port: number, host: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({ port, host, maxPayload: this.maxFrameBytes });
      this.wss = wss;

      wss.once('listening', () => {
        wss.off('error', reject);
        wss.on('error', (error: Error) => {
          console.error('[WsTransport] Server error:', error);
        });
        console.log(`[WsTransport] Listening on ${host}:${this.port ?? port}`);
        resolve();
      });
      wss.once('error', reject);

      wss.on('connection', (ws: WebSocket) => {
        this.inboundCount++;
        this.attach({ id: `in-${this.inboundCount}` }, ws);
      });
    });
  }

  /**
   * Dial a peer URL and keep redialing it until stop()
   */
  dial(url: string): void {
    if (this.stopped) {
      return;
    }

    const peer: PeerHandle = { id: `out-${url}` };
    const ws = new WebSocket(url, { maxPayload: this.maxFrameBytes });

    ws.on('open', () => {
      this.attach(peer, ws);
    });
    ws.on('error', (error: Error) => {
      console.warn(`[WsTransport] Connection to ${url} failed: ${error.message}`);
    });
    ws.on('close', () => {
      this.scheduleRedial(url);
    });
  }

  private scheduleRedial(url: string): void {
    if (this.stopped) {
      return;
    }
    const timer = setTimeout(() => {
      this.redialTimers.delete(timer);
      this.dial(url);
    }, this.reconnectDelayMs);
    this.redialTimers.add(timer);
  }

  private attach(peer: PeerHandle, ws: WebSocket): void {
    this.sockets.set(peer.id, ws);
    console.log(`[WsTransport] Peer ${peer.id} connected (total: ${this.sockets.size})`);

    ws.on('message', (data: RawData) => {
      if (!this.frameHandler) {
        return;
      }
      Promise.resolve(this.frameHandler(peer, toBytes(data))).catch((error: unknown) => {
        console.warn(`[WsTransport] Frame handler failed for ${peer.id}:`, error);
      });
    });

    // Oversized frames and protocol errors land here; ws has already started
    // the close handshake with the matching status code, and only this socket
    // is dropped
    ws.on('error', (error: Error) => {
      console.warn(`[WsTransport] Peer ${peer.id} socket error: ${error.message}`);
      ws.close();
    });

    ws.on('close', () => {
      if (this.sockets.get(peer.id) === ws) {
        this.sockets.delete(peer.id);
        console.log(`[WsTransport] Peer ${peer.id} disconnected`);
      }
    });

    if (this.connectionHandler) {
      Promise.resolve(this.connectionHandler(peer)).catch((error: unknown) => {
        console.warn(`[WsTransport] Connection handler failed for ${peer.id}:`, error);
      });
    }
  }

  listConnectedPeers(): PeerHandle[] {
    const peers: PeerHandle[] = [];
    for (const [id, ws] of this.sockets) {
      if (ws.readyState === WebSocket.OPEN) {
        peers.push({ id });
      }
    }
    return peers;
  }

  send(peer: PeerHandle, frame: Uint8Array): Promise<void> {
    const ws = this.sockets.get(peer.id);
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new PeerSendFailedError(peer.id, { cause: new Error('socket not open') }));
    }

    return new Promise((resolve, reject) => {
      ws.send(frame, { binary: true }, (error?: Error) => {
        if (error) {
          reject(new PeerSendFailedError(peer.id, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  async stop(): Promise<void> {
    this.stopped = true;
    for (const timer of this.redialTimers) {
      clearTimeout(timer);
    }
    this.redialTimers.clear();

    for (const ws of this.sockets.values()) {
      ws.close();
    }
    this.sockets.clear();

    const wss = this.wss;
    if (wss) {
      await new Promise<void>((resolve, reject) => {
        wss.close(error => (error ? reject(error) : resolve()));
      });
      this.wss = undefined;
    }
  }
}
