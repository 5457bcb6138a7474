/**
 * handoff — BoundedChannel, single thread
 *
 * Every test here keeps the channel out of its blocking states: inserts never
 * exceed capacity and removes never outnumber inserts, so Atomics.wait is
 * never reached on the test thread. Cross-thread blocking is covered in
 * backpressure.test.ts.
 */

import { describe, it, expect } from 'vitest';
import {
  BoundedChannel,
  ChannelFault,
  END_OF_STREAM,
  HEADER_SIZE,
  computeChannelBytes,
  item,
} from '../src/index';
import { CTRL_VERSION, SLOT_OFFSET_TAG, slotOffset } from '../src/constants';

// ─── Construction ─────────────────────────────────────────────────────────────

describe('BoundedChannel.create', () => {
  it('allocates header plus one 16-byte slot per unit of capacity', () => {
    const ch = BoundedChannel.create(5);
    expect(ch.capacity).toBe(5);
    expect(ch.length).toBe(0);
    expect(ch.sab.byteLength).toBe(HEADER_SIZE + 5 * 16);
    expect(computeChannelBytes(5)).toBe(144);
  });

  it('rejects a capacity below one or a fractional capacity', () => {
    expect(() => BoundedChannel.create(0)).toThrow(RangeError);
    expect(() => BoundedChannel.create(-3)).toThrow(RangeError);
    expect(() => BoundedChannel.create(1.5)).toThrow(RangeError);
  });
});

// ─── FIFO ─────────────────────────────────────────────────────────────────────

describe('BoundedChannel insert/remove', () => {
  it('returns elements in insertion order, end-of-stream last', () => {
    const ch = BoundedChannel.create(3);
    ch.insert(item(0, 1.5));
    ch.insert(item(1, 42));
    ch.insert(END_OF_STREAM);

    expect(ch.remove()).toEqual({ kind: 'item', index: 0, value: 1.5 });
    expect(ch.remove()).toEqual({ kind: 'item', index: 1, value: 42 });
    expect(ch.remove()).toBe(END_OF_STREAM);
    expect(ch.length).toBe(0);
  });

  it('keeps an item at index 0 with value 0 distinct from end-of-stream', () => {
    const ch = BoundedChannel.create(2);
    ch.insert(item(0, 0));
    ch.insert(END_OF_STREAM);

    const first = ch.remove();
    expect(first.kind).toBe('item');
    expect(first).toEqual(item(0, 0));
    expect(ch.remove().kind).toBe('end');
  });

  it('wraps around the ring without reordering', () => {
    const ch       = BoundedChannel.create(2);
    const received: number[] = [];

    for (let i = 0; i < 10; i += 2) {
      ch.insert(item(i, i * 10));
      ch.insert(item(i + 1, (i + 1) * 10));
      for (let k = 0; k < 2; k++) {
        const el = ch.remove();
        if (el.kind === 'item') received.push(el.value);
      }
    }

    expect(received).toEqual([0, 10, 20, 30, 40, 50, 60, 70, 80, 90]);
    expect(ch.peakLength).toBe(2);
  });

  it('tracks inserted, removed, sentinel and peak counters', () => {
    const ch = BoundedChannel.create(4);
    ch.insert(item(0, 3));
    ch.insert(item(1, 4));
    ch.remove();
    ch.insert(item(2, 5));
    ch.insert(END_OF_STREAM);

    expect(ch.stats()).toEqual({
      capacity:   4,
      peakLength: 3,
      inserted:   3,
      removed:    1,
      sentinels:  1,
    });
  });

  it('rejects any insert after end-of-stream', () => {
    const ch = BoundedChannel.create(3);
    ch.insert(END_OF_STREAM);
    expect(() => ch.insert(item(0, 1))).toThrow(ChannelFault);
    expect(() => ch.insert(END_OF_STREAM)).toThrow('Cannot insert after end-of-stream.');
    expect(ch.sentinelCount).toBe(1);
    expect(ch.length).toBe(1);
  });

  it('rejects a negative or fractional item index before touching the ring', () => {
    const ch = BoundedChannel.create(2);
    expect(() => ch.insert(item(-1, 1))).toThrow(RangeError);
    expect(() => ch.insert(item(0.5, 1))).toThrow(RangeError);
    expect(ch.length).toBe(0);
  });

  it('releases the lock after a throw so the channel stays usable', () => {
    const ch = BoundedChannel.create(2);
    ch.insert(END_OF_STREAM);
    expect(() => ch.insert(item(0, 1))).toThrow(ChannelFault);
    expect(ch.remove()).toBe(END_OF_STREAM);
  });
});

// ─── attach ───────────────────────────────────────────────────────────────────

describe('BoundedChannel.attach', () => {
  it('opens a second endpoint onto the same shared state', () => {
    const producerSide = BoundedChannel.create(2);
    const consumerSide = BoundedChannel.attach(producerSide.sab);

    producerSide.insert(item(0, 8));
    expect(consumerSide.capacity).toBe(2);
    expect(consumerSide.length).toBe(1);
    expect(consumerSide.remove()).toEqual(item(0, 8));
    expect(producerSide.removedCount).toBe(1);
  });

  it('rejects a buffer smaller than the header', () => {
    expect(() => BoundedChannel.attach(new SharedArrayBuffer(10))).toThrow(/too small/);
  });

  it('rejects a buffer without the channel magic', () => {
    expect(() => BoundedChannel.attach(new SharedArrayBuffer(128))).toThrow(
      'Not a channel buffer: magic 0x00000000, expected 0x46444e48.',
    );
  });

  it('rejects a buffer written by another layout version', () => {
    const ch = BoundedChannel.create(1);
    Atomics.store(new Int32Array(ch.sab), CTRL_VERSION, 99);
    expect(() => BoundedChannel.attach(ch.sab)).toThrow(
      'Channel version mismatch: buffer is v99, this build reads v1.',
    );
  });

  it('rejects a buffer truncated below its declared capacity', () => {
    const ch        = BoundedChannel.create(4);
    const truncated = new SharedArrayBuffer(computeChannelBytes(2));
    new Uint8Array(truncated).set(new Uint8Array(ch.sab, 0, HEADER_SIZE));
    expect(() => BoundedChannel.attach(truncated)).toThrow(
      `SharedArrayBuffer too small for a 4-slot channel: need 128 bytes, got 96.`,
    );
  });
});

// ─── Faults ───────────────────────────────────────────────────────────────────

describe('BoundedChannel faults', () => {
  it('reports an unknown slot tag as a ChannelFault', () => {
    const ch = BoundedChannel.create(2);
    ch.insert(item(0, 1));
    new DataView(ch.sab).setUint32(slotOffset(0) + SLOT_OFFSET_TAG, 7, true);

    expect(() => ch.remove()).toThrow('Unknown tag 7 in slot 0.');
    expect(ch.length).toBe(1);
  });

  it('raises an injected insert fault on the planned call only', () => {
    const ch = BoundedChannel.create(4, { faultOnInsert: 2 });
    ch.insert(item(0, 1));
    expect(() => ch.insert(item(1, 2))).toThrow('Injected fault on insert #2.');
    ch.insert(item(1, 2));
    expect(ch.insertedCount).toBe(2);
  });

  it('raises an injected remove fault without consuming an element', () => {
    const producerSide = BoundedChannel.create(2);
    const consumerSide = BoundedChannel.attach(producerSide.sab, { faultOnRemove: 1 });
    producerSide.insert(item(0, 5));

    expect(() => consumerSide.remove()).toThrow(ChannelFault);
    expect(consumerSide.length).toBe(1);
    expect(consumerSide.remove()).toEqual(item(0, 5));
  });

  it('keeps injected faults local to the endpoint that was given them', () => {
    const faulty = BoundedChannel.create(3, { faultOnInsert: 1 });
    const clean  = BoundedChannel.attach(faulty.sab);
    clean.insert(item(0, 1));
    expect(() => faulty.insert(item(1, 2))).toThrow(ChannelFault);
    expect(clean.insertedCount).toBe(1);
  });
});
