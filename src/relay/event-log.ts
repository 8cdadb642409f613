/**
 * EventLog - Bounded history of accepted events for catch-up
 *
 * A ring buffer of the last N events. Every append gets the next sequence
 * number (1, 2, 3, ...), and sequence numbers are the catch-up cursors handed
 * to peers. Overwritten events are gone: a snapshot reports the gap and never
 * reconstructs them.
 */

import type { RelayEvent } from '../relay-types.js';

export interface EventLogConfig {
  /** Number of events retained (default: 500) */
  readonly capacity?: number;
}

export interface LogEntry {
  readonly sequence: number;
  readonly event: RelayEvent;
}

export interface EventLogSnapshot {
  /** Retained entries with sequence > cursor, oldest first */
  readonly entries: readonly LogEntry[];
  /** Cursor to pass next time (the head sequence) */
  readonly nextCursor: number;
  /** True when events after the cursor were overwritten before this snapshot */
  readonly gap: boolean;
}

export class EventLog {
  readonly capacity: number;
  private readonly slots: (LogEntry | undefined)[];
  private head = 0;

  constructor(config: EventLogConfig = {}) {
    const capacity = config.capacity ?? 500;
    if (!Number.isSafeInteger(capacity) || capacity < 1) {
      throw new RangeError(`EventLog capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.slots = new Array<LogEntry | undefined>(capacity).fill(undefined);
  }

  /**
   * Append an accepted event, overwriting the oldest when full
   *
   * @returns the event's sequence number
   */
  append(event: RelayEvent): number {
    this.head++;
    this.slots[(this.head - 1) % this.capacity] = { sequence: this.head, event };
    return this.head;
  }

  /**
   * Sequence of the most recent append (0 when empty)
   */
  get headSequence(): number {
    return this.head;
  }

  /**
   * Sequence of the oldest retained event (0 when empty)
   */
  get oldestSequence(): number {
    if (this.head === 0) {
      return 0;
    }
    return Math.max(1, this.head - this.capacity + 1);
  }

  get size(): number {
    return Math.min(this.head, this.capacity);
  }

  /**
   * All retained events after `cursor`, in append order
   */
  snapshotSince(cursor = 0): EventLogSnapshot {
    if (!Number.isSafeInteger(cursor) || cursor < 0) {
      throw new RangeError(`Cursor must be a non-negative integer, got ${cursor}`);
    }

    if (cursor >= this.head) {
      return { entries: [], nextCursor: this.head, gap: false };
    }

    const oldest = this.oldestSequence;
    const start = Math.max(cursor + 1, oldest);
    const entries: LogEntry[] = [];

    for (let sequence = start; sequence <= this.head; sequence++) {
      const entry = this.slots[(sequence - 1) % this.capacity];
      if (entry) {
        entries.push(entry);
      }
    }

    return {
      entries,
      nextCursor: this.head,
      gap: cursor + 1 < oldest
    };
  }
}
