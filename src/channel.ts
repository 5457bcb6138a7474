/**
 * handoff — BoundedChannel
 *
 * Fixed-capacity FIFO shared between exactly one inserting thread and exactly
 * one removing thread through a SharedArrayBuffer.
 *
 * ── Where this runs ──────────────────────────────────────────────────────────
 *
 * insert() and remove() park the calling thread with Atomics.wait. Call them
 * from Node.js worker_threads (the Node.js main thread also allows
 * Atomics.wait, which the tests rely on for non-blocking cases). Atomics.wait
 * throws on the browser main thread.
 *
 * ── Synchronization ──────────────────────────────────────────────────────────
 *
 * One mutex word plus two condition words:
 *
 *   CTRL_LOCK       three-state futex mutex (unlocked / locked / contended).
 *   CTRL_NOT_FULL   sequence bumped by remove(); insert() parks on it while
 *                   length === capacity.
 *   CTRL_NOT_EMPTY  sequence bumped by insert(); remove() parks on it while
 *                   length === 0.
 *
 * A waiter samples the condition sequence while holding the lock, releases
 * the lock, then parks on the sampled value. A signal that lands between the
 * release and the park changes the sequence, so Atomics.wait returns
 * 'not-equal' immediately and no wakeup is lost. Waiters always re-check
 * their predicate after re-acquiring the lock.
 *
 * There is no timeout on either blocking call. If the other side dies, the
 * caller stays parked.
 */

import {
  CHANNEL_MAGIC,
  CHANNEL_VERSION,
  HEADER_SIZE,
  CTRL_ARRAY_LEN,
  CTRL_MAGIC,
  CTRL_VERSION,
  CTRL_CAPACITY,
  CTRL_LOCK,
  CTRL_LENGTH,
  CTRL_HEAD,
  CTRL_TAIL,
  CTRL_NOT_FULL,
  CTRL_NOT_EMPTY,
  CTRL_PEAK,
  CTRL_INSERTED,
  CTRL_REMOVED,
  CTRL_SENTINELS,
  LOCK_UNLOCKED,
  LOCK_LOCKED,
  LOCK_CONTENDED,
  SLOT_OFFSET_TAG,
  SLOT_OFFSET_INDEX,
  SLOT_OFFSET_VALUE,
  TAG_ITEM,
  TAG_END,
  MAX_ITEMS,
  slotOffset,
  computeChannelBytes,
} from './constants';
import {
  END_OF_STREAM,
  item,
  type ChannelElement,
  type ChannelStats,
} from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

/**
 * An unexpected condition inside the channel or destination buffer: a corrupt
 * header, an unknown slot tag, an insert after end-of-stream, or a fault
 * injected through ChannelOptions. Fatal to whichever side touches it.
 */
export class ChannelFault extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChannelFault';
  }
}

// ─── Options ──────────────────────────────────────────────────────────────────

/**
 * Per-endpoint options. Each thread attaches its own endpoint, so a fault
 * planned for the producer's endpoint never fires in the consumer.
 */
export interface ChannelOptions {
  /** 1-based insert() call on which this endpoint raises a ChannelFault. */
  readonly faultOnInsert?: number;
  /** 1-based remove() call on which this endpoint raises a ChannelFault. */
  readonly faultOnRemove?: number;
}

// ─── BoundedChannel ───────────────────────────────────────────────────────────

export class BoundedChannel {
  /** The underlying SAB. Pass to a Worker through workerData; it is shared, not copied. */
  readonly sab:      SharedArrayBuffer;
  readonly capacity: number;

  private readonly ctrl:    Int32Array;
  private readonly data:    DataView;
  private readonly options: ChannelOptions;

  private insertCalls = 0;
  private removeCalls = 0;

  private constructor(sab: SharedArrayBuffer, capacity: number, options: ChannelOptions) {
    this.sab      = sab;
    this.capacity = capacity;
    this.ctrl     = new Int32Array(sab, 0, CTRL_ARRAY_LEN);
    this.data     = new DataView(sab);
    this.options  = options;
  }

  /**
   * Allocate and initialize a channel buffer with `capacity` slots.
   *
   * Every control word is written with Atomics.store, so a Worker that
   * receives the SAB after create() returns sees the initialized header.
   *
   * @throws RangeError if capacity is not an integer in [1, MAX_ITEMS].
   */
  static create(capacity: number, options: ChannelOptions = {}): BoundedChannel {
    if (!Number.isSafeInteger(capacity) || capacity < 1 || capacity > MAX_ITEMS) {
      throw new RangeError(
        `Channel capacity must be an integer in [1, ${MAX_ITEMS}]; got ${capacity}.`,
      );
    }

    const sab  = new SharedArrayBuffer(computeChannelBytes(capacity));
    const ctrl = new Int32Array(sab, 0, CTRL_ARRAY_LEN);

    Atomics.store(ctrl, CTRL_CAPACITY, capacity);
    Atomics.store(ctrl, CTRL_LOCK,     LOCK_UNLOCKED);
    Atomics.store(ctrl, CTRL_VERSION,  CHANNEL_VERSION);
    // Magic last: a buffer without it has not finished initializing.
    Atomics.store(ctrl, CTRL_MAGIC,    CHANNEL_MAGIC);

    return new BoundedChannel(sab, capacity, options);
  }

  /**
   * Open an endpoint on a buffer initialized by create(), typically in the
   * Worker that received the SAB.
   *
   * Validation order: size → magic → version → capacity → geometry.
   *
   * @throws ChannelFault on any mismatch. No partial state is possible.
   */
  static attach(sab: SharedArrayBuffer, options: ChannelOptions = {}): BoundedChannel {
    if (sab.byteLength < HEADER_SIZE) {
      throw new ChannelFault(
        `SharedArrayBuffer too small: ${sab.byteLength} bytes; ` +
        `need at least ${HEADER_SIZE} for the channel header.`,
      );
    }

    const ctrl  = new Int32Array(sab, 0, CTRL_ARRAY_LEN);
    const magic = Atomics.load(ctrl, CTRL_MAGIC);
    if (magic !== CHANNEL_MAGIC) {
      throw new ChannelFault(
        `Not a channel buffer: magic 0x${(magic >>> 0).toString(16).padStart(8, '0')}, ` +
        `expected 0x${CHANNEL_MAGIC.toString(16)}.`,
      );
    }

    const version = Atomics.load(ctrl, CTRL_VERSION);
    if (version !== CHANNEL_VERSION) {
      throw new ChannelFault(
        `Channel version mismatch: buffer is v${version}, this build reads v${CHANNEL_VERSION}.`,
      );
    }

    const capacity = Atomics.load(ctrl, CTRL_CAPACITY);
    if (capacity < 1) {
      throw new ChannelFault(`Corrupt channel header: capacity ${capacity}.`);
    }

    const expected = computeChannelBytes(capacity);
    if (sab.byteLength < expected) {
      throw new ChannelFault(
        `SharedArrayBuffer too small for a ${capacity}-slot channel: ` +
        `need ${expected} bytes, got ${sab.byteLength}.`,
      );
    }

    return new BoundedChannel(sab, capacity, options);
  }

  // ── Lock-free state queries ────────────────────────────────────────────────

  /** Elements currently queued. */
  get length(): number {
    return Atomics.load(this.ctrl, CTRL_LENGTH);
  }

  /** Highest length observed since create(). Never exceeds capacity. */
  get peakLength(): number {
    return Atomics.load(this.ctrl, CTRL_PEAK);
  }

  get insertedCount(): number {
    return Atomics.load(this.ctrl, CTRL_INSERTED);
  }

  get removedCount(): number {
    return Atomics.load(this.ctrl, CTRL_REMOVED);
  }

  get sentinelCount(): number {
    return Atomics.load(this.ctrl, CTRL_SENTINELS);
  }

  stats(): ChannelStats {
    return {
      capacity:   this.capacity,
      peakLength: this.peakLength,
      inserted:   this.insertedCount,
      removed:    this.removedCount,
      sentinels:  this.sentinelCount,
    };
  }

  // ── insert ─────────────────────────────────────────────────────────────────

  /**
   * Append `element`, parking the calling thread while the channel is full.
   *
   * @throws ChannelFault if end-of-stream was already inserted, or when the
   *                      endpoint's faultOnInsert call number is reached.
   * @throws RangeError   if an item's index is not an integer in [0, MAX_ITEMS].
   */
  insert(element: ChannelElement): void {
    this.insertCalls++;
    if (this.insertCalls === this.options.faultOnInsert) {
      throw new ChannelFault(`Injected fault on insert #${this.insertCalls}.`);
    }

    if (element.kind === 'item' &&
        (!Number.isInteger(element.index) || element.index < 0 || element.index > MAX_ITEMS)) {
      throw new RangeError(
        `Item index must be an integer in [0, ${MAX_ITEMS}]; got ${element.index}.`,
      );
    }

    this.lock();
    try {
      if (Atomics.load(this.ctrl, CTRL_SENTINELS) > 0) {
        throw new ChannelFault('Cannot insert after end-of-stream.');
      }

      while (Atomics.load(this.ctrl, CTRL_LENGTH) === this.capacity) {
        this.waitOn(CTRL_NOT_FULL);
      }

      const tail   = Atomics.load(this.ctrl, CTRL_TAIL);
      const offset = slotOffset(tail);

      if (element.kind === 'item') {
        this.data.setUint32( offset + SLOT_OFFSET_TAG,   TAG_ITEM,      /* le */ true);
        this.data.setUint32( offset + SLOT_OFFSET_INDEX, element.index,          true);
        this.data.setFloat64(offset + SLOT_OFFSET_VALUE, element.value,          true);
        Atomics.add(this.ctrl, CTRL_INSERTED, 1);
      } else {
        this.data.setUint32(offset + SLOT_OFFSET_TAG, TAG_END, true);
        Atomics.add(this.ctrl, CTRL_SENTINELS, 1);
      }

      Atomics.store(this.ctrl, CTRL_TAIL, (tail + 1) % this.capacity);
      const length = Atomics.add(this.ctrl, CTRL_LENGTH, 1) + 1;
      if (length > Atomics.load(this.ctrl, CTRL_PEAK)) {
        Atomics.store(this.ctrl, CTRL_PEAK, length);
      }

      this.signal(CTRL_NOT_EMPTY);
    } finally {
      this.unlock();
    }
  }

  // ── remove ─────────────────────────────────────────────────────────────────

  /**
   * Remove and return the oldest element, parking the calling thread while
   * the channel is empty.
   *
   * @throws ChannelFault on an unknown slot tag, or when the endpoint's
   *                      faultOnRemove call number is reached.
   */
  remove(): ChannelElement {
    this.removeCalls++;
    if (this.removeCalls === this.options.faultOnRemove) {
      throw new ChannelFault(`Injected fault on remove #${this.removeCalls}.`);
    }

    this.lock();
    try {
      while (Atomics.load(this.ctrl, CTRL_LENGTH) === 0) {
        this.waitOn(CTRL_NOT_EMPTY);
      }

      const head   = Atomics.load(this.ctrl, CTRL_HEAD);
      const offset = slotOffset(head);
      const tag    = this.data.getUint32(offset + SLOT_OFFSET_TAG, true);

      let element: ChannelElement;
      if (tag === TAG_ITEM) {
        element = item(
          this.data.getUint32( offset + SLOT_OFFSET_INDEX, true),
          this.data.getFloat64(offset + SLOT_OFFSET_VALUE, true),
        );
        Atomics.add(this.ctrl, CTRL_REMOVED, 1);
      } else if (tag === TAG_END) {
        element = END_OF_STREAM;
      } else {
        throw new ChannelFault(`Unknown tag ${tag} in slot ${head}.`);
      }

      Atomics.store(this.ctrl, CTRL_HEAD, (head + 1) % this.capacity);
      Atomics.sub(this.ctrl, CTRL_LENGTH, 1);

      this.signal(CTRL_NOT_FULL);
      return element;
    } finally {
      this.unlock();
    }
  }

  // ── Private: mutex ─────────────────────────────────────────────────────────

  private lock(): void {
    let c = Atomics.compareExchange(this.ctrl, CTRL_LOCK, LOCK_UNLOCKED, LOCK_LOCKED);
    if (c === LOCK_UNLOCKED) return;

    // Slow path: mark the lock contended so the holder knows to notify.
    if (c !== LOCK_CONTENDED) {
      c = Atomics.exchange(this.ctrl, CTRL_LOCK, LOCK_CONTENDED);
    }
    while (c !== LOCK_UNLOCKED) {
      Atomics.wait(this.ctrl, CTRL_LOCK, LOCK_CONTENDED);
      c = Atomics.exchange(this.ctrl, CTRL_LOCK, LOCK_CONTENDED);
    }
  }

  private unlock(): void {
    if (Atomics.sub(this.ctrl, CTRL_LOCK, 1) !== LOCK_LOCKED) {
      Atomics.store(this.ctrl, CTRL_LOCK, LOCK_UNLOCKED);
      Atomics.notify(this.ctrl, CTRL_LOCK, 1);
    }
  }

  // ── Private: conditions ────────────────────────────────────────────────────

  /** Must be called with the lock held; returns with the lock held. */
  private waitOn(cond: number): void {
    const seq = Atomics.load(this.ctrl, cond);
    this.unlock();
    Atomics.wait(this.ctrl, cond, seq);
    this.lock();
  }

  private signal(cond: number): void {
    Atomics.add(this.ctrl, cond, 1);
    Atomics.notify(this.ctrl, cond, 1);
  }
}
