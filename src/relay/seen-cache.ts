/**
 * SeenCache - Flood-suppression window of recently processed event ids
 *
 * Strict FIFO: once full, each insertion evicts the single oldest id. A hit
 * never refreshes an entry, so this is not an LRU. An id evicted under
 * sustained volume is treated as new if it arrives again; that costs one
 * extra rebroadcast wave and is the accepted price for bounded memory.
 */

export interface SeenCacheConfig {
  /** Maximum number of ids remembered (default: 8192) */
  readonly capacity?: number;
}

export class SeenCache {
  readonly capacity: number;
  // Set iteration order is insertion order, which is the eviction order
  private readonly ids = new Set<string>();
  private evicted = 0;

  constructor(config: SeenCacheConfig = {}) {
    const capacity = config.capacity ?? 8192;
    if (!Number.isSafeInteger(capacity) || capacity < 1) {
      throw new RangeError(`SeenCache capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /**
   * Check membership and record the id if absent, in one synchronous step
   *
   * @returns true when the id was already present (duplicate), false when it
   *   has just been recorded
   */
  containsAndRecord(id: string): boolean {
    if (this.ids.has(id)) {
      return true;
    }

    this.ids.add(id);

    if (this.ids.size > this.capacity) {
      const oldest = this.ids.values().next();
      if (!oldest.done) {
        this.ids.delete(oldest.value);
        this.evicted++;
      }
    }

    return false;
  }

  /**
   * Read-only probe; does not record
   */
  has(id: string): boolean {
    return this.ids.has(id);
  }

  get size(): number {
    return this.ids.size;
  }

  get evictions(): number {
    return this.evicted;
  }
}
