/**
 * PeerGuard - Per-peer flood limits for inbound frames
 *
 * Fixed-window frame counting plus a protocol-violation tally. A peer that
 * exceeds either is banned for a while; frames from a banned peer are
 * dropped before decoding.
 */

export const DEFAULT_MAX_FRAMES_PER_WINDOW = 500;

export interface PeerGuardConfig {
  /** Maximum frames per peer per window (default: 500) */
  readonly maxFramesPerWindow?: number;
  /** Window length in milliseconds (default: 10000) */
  readonly windowMs?: number;
  /** Malformed frames tolerated before a ban (default: 20) */
  readonly maxViolations?: number;
  /** Ban duration in milliseconds (default: 60000) */
  readonly banDurationMs?: number;
  /** Clock, for tests */
  readonly now?: () => number;
}

interface PeerRecord {
  frameCount: number;
  windowStart: number;
  violations: number;
  bannedUntil?: number;
}

export class PeerGuard {
  private readonly maxFrames: number;
  private readonly windowMs: number;
  private readonly maxViolations: number;
  private readonly banDurationMs: number;
  private readonly now: () => number;
  private readonly records = new Map<string, PeerRecord>();

  constructor(config: PeerGuardConfig = {}) {
    this.maxFrames = config.maxFramesPerWindow ?? DEFAULT_MAX_FRAMES_PER_WINDOW;
    this.windowMs = config.windowMs ?? 10_000;
    this.maxViolations = config.maxViolations ?? 20;
    this.banDurationMs = config.banDurationMs ?? 60_000;
    this.now = config.now ?? Date.now;
  }

  private recordFor(peerId: string, now: number): PeerRecord {
    let record = this.records.get(peerId);
    if (!record) {
      record = { frameCount: 0, windowStart: now, violations: 0 };
      this.records.set(peerId, record);
    }
    return record;
  }

  private ban(peerId: string, record: PeerRecord, now: number, why: string): void {
    record.bannedUntil = now + this.banDurationMs;
    console.warn(`[PeerGuard] ⛔ Banned peer ${peerId} for ${this.banDurationMs}ms (${why})`);
  }

  /**
   * Count one inbound frame
   *
   * @returns true if the frame may be processed, false if the peer is banned
   *   or has just exceeded its window
   */
  checkLimit(peerId: string): boolean {
    const now = this.now();
    const record = this.recordFor(peerId, now);

    if (record.bannedUntil !== undefined) {
      if (now < record.bannedUntil) {
        return false;
      }
      record.bannedUntil = undefined;
      record.frameCount = 0;
      record.violations = 0;
      record.windowStart = now;
    }

    if (now - record.windowStart >= this.windowMs) {
      record.frameCount = 0;
      record.windowStart = now;
    }

    record.frameCount++;

    if (record.frameCount > this.maxFrames) {
      this.ban(peerId, record, now, `${record.frameCount}/${this.maxFrames} frames in ${this.windowMs}ms`);
      return false;
    }

    return true;
  }

  /**
   * Count a malformed frame against the peer
   *
   * @returns true if this violation triggered a ban
   */
  recordViolation(peerId: string): boolean {
    const now = this.now();
    const record = this.recordFor(peerId, now);
    record.violations++;

    if (record.violations >= this.maxViolations && record.bannedUntil === undefined) {
      this.ban(peerId, record, now, `${record.violations} malformed frames`);
      return true;
    }
    return false;
  }

  isPeerBanned(peerId: string): boolean {
    const bannedUntil = this.records.get(peerId)?.bannedUntil;
    return bannedUntil !== undefined && this.now() < bannedUntil;
  }

  /**
   * Lift a ban and reset the peer's counters
   */
  unbanPeer(peerId: string): void {
    const record = this.records.get(peerId);
    if (record) {
      record.bannedUntil = undefined;
      record.frameCount = 0;
      record.violations = 0;
      record.windowStart = this.now();
    }
  }

  /**
   * Drop records for peers that are idle and not banned
   *
   * @returns number of records removed
   */
  cleanup(): number {
    const now = this.now();
    const cutoff = now - this.windowMs * 2;
    let removed = 0;

    for (const [peerId, record] of this.records.entries()) {
      const idle = record.windowStart < cutoff;
      const banned = record.bannedUntil !== undefined && now < record.bannedUntil;
      if (idle && !banned) {
        this.records.delete(peerId);
        removed++;
      }
    }

    return removed;
  }

  getStats(): { trackedPeers: number; bannedPeers: number } {
    const now = this.now();
    let bannedPeers = 0;

    for (const record of this.records.values()) {
      if (record.bannedUntil !== undefined && now < record.bannedUntil) {
        bannedPeers++;
      }
    }

    return { trackedPeers: this.records.size, bannedPeers };
  }
}
