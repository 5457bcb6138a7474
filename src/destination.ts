/**
 * handoff — DestinationBuffer
 *
 * N optional numbers in a SharedArrayBuffer. The consumer thread is the only
 * writer; the orchestrator reads it back after both threads have finished.
 *
 * Layout:
 *   [0 .. 8N)      values   f64 × N
 *   [8N .. 9N)     filled   u8  × N   (0 = empty, 1 = written)
 *
 * A slot's filled flag is published with Atomics.store after its value is
 * written, and read with Atomics.load, so a reader that sees the flag also
 * sees the value.
 */

import { ChannelFault } from './channel';

export class DestinationBuffer {
  readonly sab:  SharedArrayBuffer;
  readonly size: number;

  private readonly values: Float64Array;
  private readonly filled: Uint8Array;

  private constructor(sab: SharedArrayBuffer, size: number) {
    this.sab    = sab;
    this.size   = size;
    this.values = new Float64Array(sab, 0, size);
    this.filled = new Uint8Array(sab, size * 8, size);
  }

  /** Allocate `size` empty slots. */
  static create(size: number): DestinationBuffer {
    if (!Number.isSafeInteger(size) || size < 0) {
      throw new RangeError(`Destination size must be a non-negative integer; got ${size}.`);
    }
    return new DestinationBuffer(new SharedArrayBuffer(size * 9), size);
  }

  /** Open a buffer allocated by create(), typically inside the consumer thread. */
  static attach(sab: SharedArrayBuffer): DestinationBuffer {
    if (sab.byteLength % 9 !== 0) {
      throw new ChannelFault(
        `Destination buffer length ${sab.byteLength} is not a multiple of 9 bytes per slot.`,
      );
    }
    return new DestinationBuffer(sab, sab.byteLength / 9);
  }

  /**
   * Write `value` into slot `index`.
   *
   * @throws ChannelFault if index is outside [0, size) or the slot was
   *                      already written.
   */
  write(index: number, value: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new ChannelFault(`Destination index ${index} is outside [0, ${this.size}).`);
    }
    if (Atomics.load(this.filled, index) !== 0) {
      throw new ChannelFault(`Destination slot ${index} was already written.`);
    }
    this.values[index] = value;
    Atomics.store(this.filled, index, 1);
  }

  /** Value at `index`, or undefined while the slot is empty. */
  read(index: number): number | undefined {
    if (index < 0 || index >= this.size) return undefined;
    return Atomics.load(this.filled, index) === 0 ? undefined : this.values[index];
  }

  /** Number of slots written so far. */
  get filledCount(): number {
    let count = 0;
    for (let i = 0; i < this.size; i++) {
      if (Atomics.load(this.filled, i) !== 0) count++;
    }
    return count;
  }

  toArray(): Array<number | undefined> {
    const out: Array<number | undefined> = [];
    for (let i = 0; i < this.size; i++) out.push(this.read(i));
    return out;
  }
}
