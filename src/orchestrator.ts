/**
 * handoff — orchestrator
 *
 * Sizes the channel, allocates source and destination, starts the producer
 * and consumer threads, joins both, then validates the destination.
 *
 * The join is a full join: validation runs only after both threads have
 * exited. A unit that faults is not replaced and does not wake its peer, so
 * a producer fault leaves the consumer parked forever. Without
 * `hangTimeoutMs` the run then never returns. With it, the watchdog
 * terminates both threads and marks the units still running as hung; the
 * failure names the faulted unit when there is one.
 */

import { performance } from 'perf_hooks';
import { BoundedChannel, type ChannelOptions } from './channel';
import { DestinationBuffer } from './destination';
import { joinUnit, resolveConsumer, resolveProducer } from './join';
import { silentLogger, type PipelineLogger } from './logger';
import type { UnitTask } from './messages';
import { buildSource } from './source';
import { spawnUnit } from './spawn';
import type {
  ChannelStats,
  ConsumerReport,
  ProducerReport,
  SourcePolicy,
  UnitName,
} from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

/** Destination differs from source after both units completed. */
export class ValidationFailure extends Error {
  /** Indices where destination[i] !== source[i]. */
  readonly mismatches: readonly number[];

  constructor(mismatches: readonly number[]) {
    const shown = mismatches.slice(0, 10).join(', ');
    const more  = mismatches.length > 10 ? `, … (${mismatches.length} total)` : '';
    super(`Data mismatch between source and destination at index ${shown}${more}.`);
    this.name       = 'ValidationFailure';
    this.mismatches = mismatches;
  }
}

/** A producer or consumer ended in the faulted state. */
export class UnitFaultError extends Error {
  readonly unit: UnitName;

  constructor(unit: UnitName, message: string) {
    super(`${unit} faulted: ${message}`);
    this.name = 'UnitFaultError';
    this.unit = unit;
  }
}

/** The hang watchdog fired before both units reached a terminal state. */
export class HungPipelineError extends Error {
  constructor(timeoutMs: number, parked: readonly UnitName[]) {
    super(`Pipeline did not finish within ${timeoutMs} ms; still parked: ${parked.join(', ')}.`);
    this.name = 'HungPipelineError';
  }
}

// ─── Options & report ─────────────────────────────────────────────────────────

export interface FaultPlan {
  /** 1-based insert() call on which the producer's endpoint faults. */
  readonly producerInsert?: number;
  /** 1-based remove() call on which the consumer's endpoint faults. */
  readonly consumerRemove?: number;
}

export interface RunOptions {
  /** Source length when `source` is not given. Default 10. */
  readonly size?:          number;
  /** Explicit source values. Takes precedence over size/policy. */
  readonly source?:        readonly number[];
  readonly policy?:        SourcePolicy;
  /** Value draw for generated sources, in [0, 1). Default Math.random. */
  readonly random?:        () => number;
  readonly logger?:        PipelineLogger;
  /** Per-item debug records from both units. */
  readonly trace?:         boolean;
  /** Report the run as hung after this many ms. Default: wait forever. */
  readonly hangTimeoutMs?: number;
  readonly faults?:        FaultPlan;
}

export interface RunReport {
  readonly passed:      boolean;
  readonly size:        number;
  readonly capacity:    number;
  readonly elapsedMs:   number;
  readonly source:      readonly number[];
  readonly destination: ReadonlyArray<number | undefined>;
  readonly mismatches:  readonly number[];
  readonly producer:    ProducerReport;
  readonly consumer:    ConsumerReport;
  readonly channel:     ChannelStats;
  readonly hung:        boolean;
  readonly failure?:    ValidationFailure | UnitFaultError | HungPipelineError;
}

export const DEFAULT_SIZE = 10;

// ─── Capacity & validation ────────────────────────────────────────────────────

/** Half the source length, never below one slot. */
export function channelCapacity(size: number): number {
  return Math.max(1, Math.floor(size / 2));
}

/** Indices where `destination` does not hold the source value. */
export function findMismatches(
  source:      readonly number[],
  destination: ReadonlyArray<number | undefined>,
): number[] {
  const mismatches: number[] = [];
  const length = Math.max(source.length, destination.length);
  for (let i = 0; i < length; i++) {
    const value = destination[i];
    if (value === undefined || !Object.is(value, source[i])) mismatches.push(i);
  }
  return mismatches;
}

// ─── runPipeline ──────────────────────────────────────────────────────────────

export async function runPipeline(options: RunOptions = {}): Promise<RunReport> {
  const logger = options.logger ?? silentLogger;
  const trace  = options.trace ?? false;
  const source = options.source !== undefined
    ? Object.freeze([...options.source])
    : buildSource(options.size ?? DEFAULT_SIZE, options.policy, options.random);

  const size        = source.length;
  const capacity    = channelCapacity(size);
  const destination = DestinationBuffer.create(size);
  const channel     = BoundedChannel.create(capacity);

  const producerOptions: ChannelOptions = { faultOnInsert: options.faults?.producerInsert };
  const consumerOptions: ChannelOptions = { faultOnRemove: options.faults?.consumerRemove };

  const producerTask: UnitTask = {
    role:           'producer',
    channel:        channel.sab,
    source:         [...source],
    trace,
    channelOptions: producerOptions,
  };
  const consumerTask: UnitTask = {
    role:           'consumer',
    channel:        channel.sab,
    destination:    destination.sab,
    trace,
    channelOptions: consumerOptions,
  };

  logger.info('Starting pipeline', { size, capacity });
  const start = performance.now();

  const producerThread = spawnUnit(producerTask);
  const consumerThread = spawnUnit(consumerTask);

  const producerJoin = joinUnit<ProducerReport>(producerThread, 'producer', logger,
    msg => (msg.type === 'producer-report' ? msg.report : undefined));
  const consumerJoin = joinUnit<ConsumerReport>(consumerThread, 'consumer', logger,
    msg => (msg.type === 'consumer-report' ? msg.report : undefined));
  const both = Promise.all([producerJoin.done, consumerJoin.done]);

  let producerParked = false;
  let consumerParked = false;
  if (options.hangTimeoutMs !== undefined && await watchForHang(both, options.hangTimeoutMs)) {
    producerParked = !producerJoin.hasExited();
    consumerParked = !consumerJoin.hasExited();
    // terminate() also wakes a thread parked in Atomics.wait.
    await Promise.all([producerThread.terminate(), consumerThread.terminate()]);
  }
  const hung = producerParked || consumerParked;
  const [producerJoined, consumerJoined] = await both;

  const elapsedMs = performance.now() - start;

  // ── Reports ────────────────────────────────────────────────────────────────

  const stats    = channel.stats();
  const producer = resolveProducer(producerJoined, stats, producerParked);
  const consumer = resolveConsumer(consumerJoined, stats, consumerParked);

  const values     = destination.toArray();
  const mismatches = findMismatches(source, values);

  // Faulted outranks hung: a fault is what leaves the peer parked.
  let failure: RunReport['failure'];
  if (producer.state === 'faulted') {
    failure = new UnitFaultError('producer', producer.error ?? 'unknown fault');
  } else if (consumer.state === 'faulted') {
    failure = new UnitFaultError('consumer', consumer.error ?? 'unknown fault');
  } else if (hung) {
    const parked: UnitName[] = [];
    if (producerParked) parked.push('producer');
    if (consumerParked) parked.push('consumer');
    failure = new HungPipelineError(options.hangTimeoutMs ?? 0, parked);
  } else if (mismatches.length > 0) {
    failure = new ValidationFailure(mismatches);
  }
  if (failure) logger.error(failure.message);

  const passed = failure === undefined;
  if (passed) {
    logger.info(`All data transferred successfully in ${(elapsedMs / 1000).toFixed(4)}s`, {
      size,
      peakLength: stats.peakLength,
    });
  }

  return {
    passed,
    size,
    capacity,
    elapsedMs,
    source,
    destination: values,
    mismatches,
    producer,
    consumer,
    channel: stats,
    hung,
    failure,
  };
}

/** Throw the failure recorded in `report`, if any. */
export function assertTransferred(report: RunReport): void {
  if (report.failure) throw report.failure;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

/** Resolve true if `join` has not settled within `timeoutMs`. */
async function watchForHang(join: Promise<unknown>, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const watchdog = new Promise<boolean>(resolve => {
    timer = setTimeout(() => resolve(true), timeoutMs);
  });
  try {
    return await Promise.race([join.then(() => false), watchdog]);
  } finally {
    clearTimeout(timer);
  }
}
