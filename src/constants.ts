/**
 * handoff — channel layout constants
 *
 * These constants define the binary contract of the channel buffer shared
 * between the producer and consumer threads. Any change to word indices or
 * slot layout is a BREAKING CHANGE requiring a bump of CHANNEL_VERSION.
 *
 *   ── Control words (Int32Array; all access through Atomics) ─────────────
 *   [0]   CTRL_MAGIC       = CHANNEL_MAGIC ('HNDF')
 *   [1]   CTRL_VERSION     = CHANNEL_VERSION
 *   [2]   CTRL_CAPACITY    slots in the ring (C ≥ 1)
 *   [3]   CTRL_LOCK        mutex word (UNLOCKED / LOCKED / CONTENDED)
 *   [4]   CTRL_LENGTH      elements currently queued, 0 ≤ length ≤ C
 *   [5]   CTRL_HEAD        next slot to remove
 *   [6]   CTRL_TAIL        next slot to insert
 *   [7]   CTRL_NOT_FULL    condition sequence; bumped after every remove
 *   [8]   CTRL_NOT_EMPTY   condition sequence; bumped after every insert
 *   [9]   CTRL_PEAK        highest length ever observed
 *   [10]  CTRL_INSERTED    items inserted (sentinel excluded)
 *   [11]  CTRL_REMOVED     items removed (sentinel excluded)
 *   [12]  CTRL_SENTINELS   end-of-stream markers inserted
 *   [13..15] reserved
 *
 *   ── Slot region (DataView; byte HEADER_SIZE onward) ─────────────────────
 *   slot s at HEADER_SIZE + s × SLOT_SIZE:
 *     [0..3]   tag    u32  = TAG_ITEM | TAG_END
 *     [4..7]   index  u32  (TAG_ITEM only)
 *     [8..15]  value  f64  (TAG_ITEM only)
 */

// ─── Magic & Version ──────────────────────────────────────────────────────────

/** 'HNDF' as a little-endian u32. Checked first when attaching to a buffer. */
export const CHANNEL_MAGIC:   number = 0x46444e48;

export const CHANNEL_VERSION: number = 1;

// ─── Header Layout ────────────────────────────────────────────────────────────

export const HEADER_SIZE = 64; // bytes

/** Int32Array length that covers the whole header. */
export const CTRL_ARRAY_LEN = HEADER_SIZE / 4; // 16

export const CTRL_MAGIC      = 0;
export const CTRL_VERSION    = 1;
export const CTRL_CAPACITY   = 2;
export const CTRL_LOCK       = 3;
export const CTRL_LENGTH     = 4;
export const CTRL_HEAD       = 5;
export const CTRL_TAIL       = 6;
export const CTRL_NOT_FULL   = 7;
export const CTRL_NOT_EMPTY  = 8;
export const CTRL_PEAK       = 9;
export const CTRL_INSERTED   = 10;
export const CTRL_REMOVED    = 11;
export const CTRL_SENTINELS  = 12;

// ─── Lock States ──────────────────────────────────────────────────────────────

export const LOCK_UNLOCKED  = 0;
export const LOCK_LOCKED    = 1; // held, nobody waiting
export const LOCK_CONTENDED = 2; // held, at least one thread may be parked

// ─── Slot Layout ──────────────────────────────────────────────────────────────

export const SLOT_SIZE         = 16; // bytes; keeps the f64 8-byte aligned
export const SLOT_OFFSET_TAG   = 0;  // u32
export const SLOT_OFFSET_INDEX = 4;  // u32
export const SLOT_OFFSET_VALUE = 8;  // f64

export const TAG_ITEM = 1;
export const TAG_END  = 2;

/**
 * Largest source length a run accepts. Indices travel as u32 but the counters
 * live in Int32 control words, so the ceiling is the signed maximum.
 */
export const MAX_ITEMS = 0x7fffffff;

// ─── Geometry Helpers ─────────────────────────────────────────────────────────

/** Byte offset of slot `slot` inside the channel buffer. */
export function slotOffset(slot: number): number {
  return HEADER_SIZE + slot * SLOT_SIZE;
}

/** Total SharedArrayBuffer size for a channel of `capacity` slots. */
export function computeChannelBytes(capacity: number): number {
  return HEADER_SIZE + capacity * SLOT_SIZE;
}
