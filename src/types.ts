/**
 * handoff — type definitions
 *
 * The channel buffer is the truth while a run is in flight; these types are
 * the lens the producer, consumer and orchestrator read it through.
 */

// ─── Channel elements ─────────────────────────────────────────────────────────

/** One source element tagged with its position in the source. */
export interface Item {
  readonly kind:  'item';
  readonly index: number;
  readonly value: number;
}

/**
 * End-of-stream marker. Travels under its own slot tag, so it can never be
 * mistaken for an item at index 0 or an item whose value is 0.
 */
export interface EndOfStream {
  readonly kind: 'end';
}

export type ChannelElement = Item | EndOfStream;

export const END_OF_STREAM: EndOfStream = Object.freeze({ kind: 'end' });

export function item(index: number, value: number): Item {
  return { kind: 'item', index, value };
}

// ─── Source ───────────────────────────────────────────────────────────────────

/**
 * How a generated source picks its values.
 *
 * mixed:    coin flip per element between an integer in [1, 100] and a real
 *           in [0, 100).
 * integers: integers in [1, 100].
 * reals:    reals in [0, 100).
 */
export type SourcePolicy = 'mixed' | 'integers' | 'reals';

// ─── Execution unit reports ───────────────────────────────────────────────────

export type UnitName  = 'producer' | 'consumer';
/**
 * done/faulted are reported by the unit itself. hung is assigned by the
 * orchestrator to a unit still parked when the hang watchdog fired.
 */
export type UnitState = 'done' | 'faulted' | 'hung';

export interface ProducerReport {
  readonly state:        UnitState;
  readonly itemsSent:    number;
  readonly sentinelSent: boolean;
  /** Message of the fault that ended the producer, when state is 'faulted'. */
  readonly error?:       string;
}

export interface ConsumerReport {
  readonly state:             UnitState;
  readonly itemsReceived:     number;
  readonly sentinelsReceived: number;
  readonly error?:            string;
}

// ─── Channel statistics ───────────────────────────────────────────────────────

export interface ChannelStats {
  readonly capacity:   number;
  readonly peakLength: number;
  readonly inserted:   number;
  readonly removed:    number;
  readonly sentinels:  number;
}
