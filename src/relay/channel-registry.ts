/**
 * ChannelRegistry - Channels this node has joined and their shared keys
 */

import { KEY_LENGTH } from '../crypto.js';
import { isValidChannelName } from '../event.js';

export class ChannelRegistry {
  private readonly joined = new Map<string, Uint8Array | undefined>();

  /**
   * Join a channel, optionally with a shared symmetric key
   *
   * Joining again replaces the key, which is how a channel key is rotated.
   * Joining without a key clears any previous one.
   */
  join(channel: string, sharedKey?: Uint8Array): void {
    if (!isValidChannelName(channel)) {
      throw new Error(`Invalid channel name: ${JSON.stringify(channel)}`);
    }
    if (sharedKey && sharedKey.length !== KEY_LENGTH) {
      throw new Error(`Channel key for ${channel} must be ${KEY_LENGTH} bytes, got ${sharedKey.length}`);
    }

    this.joined.set(channel, sharedKey ? new Uint8Array(sharedKey) : undefined);
  }

  /**
   * Leave a channel. Parting a channel we never joined is a no-op.
   *
   * @returns whether the channel was joined
   */
  part(channel: string): boolean {
    return this.joined.delete(channel);
  }

  isJoined(channel: string): boolean {
    return this.joined.has(channel);
  }

  keyFor(channel: string): Uint8Array | undefined {
    return this.joined.get(channel);
  }

  channels(): string[] {
    return Array.from(this.joined.keys());
  }

  get size(): number {
    return this.joined.size;
  }
}
