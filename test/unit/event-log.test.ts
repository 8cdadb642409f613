/**
 * EventLog unit tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { EventLog } from '../../src/relay/event-log.js';
import { createEvent, encodeText } from '../../src/event.js';
import type { RelayEvent } from '../../src/relay-types.js';

function makeEvents(count: number): RelayEvent[] {
  return Array.from({ length: count }, (_, i) =>
    createEvent({ kind: 'channel-message', target: 'dev', payload: encodeText(`message ${i + 1}`) })
  );
}

describe('EventLog', () => {
  it('returns nothing for an empty log', () => {
    const log = new EventLog({ capacity: 3 });

    assert.deepEqual(log.snapshotSince(), { entries: [], nextCursor: 0, gap: false });
    assert.equal(log.headSequence, 0);
    assert.equal(log.oldestSequence, 0);
  });

  it('numbers appends and replays them in append order', () => {
    const log = new EventLog({ capacity: 5 });
    const events = makeEvents(3);

    assert.deepEqual(events.map(event => log.append(event)), [1, 2, 3]);

    const snapshot = log.snapshotSince(0);
    assert.deepEqual(snapshot.entries.map(entry => entry.event.id), events.map(event => event.id));
    assert.deepEqual(snapshot.entries.map(entry => entry.sequence), [1, 2, 3]);
    assert.equal(snapshot.nextCursor, 3);
    assert.equal(snapshot.gap, false);
  });

  it('returns only events after the cursor', () => {
    const log = new EventLog({ capacity: 5 });
    const events = makeEvents(3);
    events.forEach(event => log.append(event));

    const snapshot = log.snapshotSince(2);
    assert.deepEqual(snapshot.entries.map(entry => entry.event.id), [events[2].id]);
    assert.equal(snapshot.gap, false);
  });

  it('returns nothing for a cursor at or past the head', () => {
    const log = new EventLog({ capacity: 5 });
    makeEvents(3).forEach(event => log.append(event));

    assert.deepEqual(log.snapshotSince(3), { entries: [], nextCursor: 3, gap: false });
    assert.deepEqual(log.snapshotSince(10), { entries: [], nextCursor: 3, gap: false });
  });

  it('overwrites the oldest events and reports the gap', () => {
    const log = new EventLog({ capacity: 3 });
    const events = makeEvents(5);
    events.forEach(event => log.append(event));

    assert.equal(log.size, 3);
    assert.equal(log.oldestSequence, 3);

    const full = log.snapshotSince(0);
    assert.deepEqual(full.entries.map(entry => entry.sequence), [3, 4, 5]);
    assert.deepEqual(full.entries.map(entry => entry.event.id), [events[2].id, events[3].id, events[4].id]);
    assert.equal(full.gap, true);

    assert.equal(log.snapshotSince(1).gap, true);
    assert.equal(log.snapshotSince(2).gap, false);
    assert.deepEqual(log.snapshotSince(4).entries.map(entry => entry.sequence), [5]);
  });

  it('never holds more than its capacity', () => {
    const log = new EventLog({ capacity: 4 });
    makeEvents(50).forEach(event => log.append(event));

    assert.equal(log.size, 4);
    assert.equal(log.snapshotSince(0).entries.length, 4);
    assert.equal(log.headSequence, 50);
  });

  it('rejects invalid cursors and capacities', () => {
    const log = new EventLog();
    assert.equal(log.capacity, 500);
    assert.throws(() => log.snapshotSince(-1), RangeError);
    assert.throws(() => log.snapshotSince(1.5), RangeError);
    assert.throws(() => new EventLog({ capacity: 0 }), RangeError);
  });
});
