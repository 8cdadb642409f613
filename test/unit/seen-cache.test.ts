/**
 * SeenCache unit tests
 *
 * Strict FIFO eviction, no refresh on hit.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SeenCache } from '../../src/relay/seen-cache.js';

describe('SeenCache', () => {
  it('records a new id and reports it as a duplicate afterwards', () => {
    const cache = new SeenCache({ capacity: 4 });

    assert.equal(cache.containsAndRecord('a'), false);
    assert.equal(cache.containsAndRecord('a'), true);
    assert.equal(cache.size, 1);
  });

  it('treats an evicted id as new again', () => {
    const cache = new SeenCache({ capacity: 2 });

    cache.containsAndRecord('a');
    cache.containsAndRecord('b');
    cache.containsAndRecord('c');

    assert.equal(cache.containsAndRecord('a'), false);
    // re-inserting a pushed out b
    assert.equal(cache.has('b'), false);
    assert.equal(cache.has('c'), true);
    assert.equal(cache.evictions, 2);
  });

  it('does not refresh an entry on a hit', () => {
    const cache = new SeenCache({ capacity: 2 });

    cache.containsAndRecord('a');
    cache.containsAndRecord('b');
    assert.equal(cache.containsAndRecord('a'), true);
    cache.containsAndRecord('c');

    assert.equal(cache.has('a'), false);
    assert.equal(cache.has('b'), true);
    assert.equal(cache.has('c'), true);
  });

  it('never grows past its capacity', () => {
    const cache = new SeenCache({ capacity: 10 });
    for (let i = 0; i < 100; i++) {
      cache.containsAndRecord(`id-${i}`);
    }

    assert.equal(cache.size, 10);
    assert.equal(cache.evictions, 90);
    assert.equal(cache.has('id-89'), false);
    assert.equal(cache.has('id-90'), true);
  });

  it('defaults to 8192 entries', () => {
    assert.equal(new SeenCache().capacity, 8192);
  });

  it('rejects a capacity that is not a positive integer', () => {
    assert.throws(() => new SeenCache({ capacity: 0 }), RangeError);
    assert.throws(() => new SeenCache({ capacity: 1.5 }), RangeError);
  });
});
