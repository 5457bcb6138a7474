/**
 * handoff — unit thread join
 *
 * Collects what a unit thread leaves behind: the report it posted, the error
 * that killed it, or neither. Log records are replayed into the caller's
 * logger tagged with the unit name as they arrive.
 */

import type { Worker } from 'worker_threads';
import { logAt, type PipelineLogger } from './logger';
import { unitMessageSchema, type UnitMessage } from './messages';
import type { ChannelStats, ConsumerReport, ProducerReport, UnitName, UnitState } from './types';

export interface Joined<R> {
  readonly report?:  R;
  /** Message of the uncaught error that killed the thread. */
  readonly crash?:   string;
  readonly exitCode: number;
}

export interface UnitJoin<R> {
  /** Settles once the thread has exited. */
  readonly done: Promise<Joined<R>>;
  /** False while the thread is still running. */
  hasExited(): boolean;
}

export function joinUnit<R>(
  worker:  Worker,
  unit:    UnitName,
  logger:  PipelineLogger,
  pick:    (msg: UnitMessage) => R | undefined,
): UnitJoin<R> {
  let exited = false;

  const done = new Promise<Joined<R>>(resolve => {
    let report: R | undefined;
    let crash:  string | undefined;

    worker.on('message', (raw: unknown) => {
      const parsed = unitMessageSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn('Dropped malformed message from unit', { unit });
        return;
      }
      const msg = parsed.data;
      if (msg.type === 'log') {
        logAt(logger, msg.level, msg.message, { unit, ...msg.fields });
        return;
      }
      report = pick(msg);
    });

    worker.on('error', err => {
      crash = err.message;
      logger.error(`Unit thread crashed: ${err.message}`, { unit });
    });

    worker.once('exit', exitCode => {
      exited = true;
      resolve({ report, crash, exitCode });
    });
  });

  return { done, hasExited: () => exited };
}

// ─── Report resolution ────────────────────────────────────────────────────────

interface Outcome {
  readonly state:  UnitState;
  readonly error?: string;
}

/**
 * State of a unit that posted no report. `parked` means the thread was still
 * running when the hang watchdog fired.
 */
function outcomeOf(joined: Joined<unknown>, parked: boolean): Outcome {
  if (joined.crash !== undefined) return { state: 'faulted', error: joined.crash };
  if (parked)                     return { state: 'hung' };
  return {
    state: 'faulted',
    error: `thread exited with code ${joined.exitCode} before reporting`,
  };
}

export function resolveProducer(
  joined: Joined<ProducerReport>,
  stats:  ChannelStats,
  parked: boolean,
): ProducerReport {
  if (joined.report) return joined.report;
  return {
    ...outcomeOf(joined, parked),
    itemsSent:    stats.inserted,
    sentinelSent: stats.sentinels > 0,
  };
}

export function resolveConsumer(
  joined: Joined<ConsumerReport>,
  stats:  ChannelStats,
  parked: boolean,
): ConsumerReport {
  if (joined.report) return joined.report;
  return {
    ...outcomeOf(joined, parked),
    itemsReceived:     stats.removed,
    sentinelsReceived: 0,
  };
}
