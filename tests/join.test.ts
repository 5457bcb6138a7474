/**
 * handoff — unit thread join
 *
 * Threads that end without posting a report: one killed by an uncaught error
 * while attaching, one terminated while parked. Both are real worker threads
 * started through spawnUnit().
 */

import { describe, it, expect } from 'vitest';
import {
  BoundedChannel,
  DestinationBuffer,
  computeChannelBytes,
  silentLogger,
} from '../src/index';
import type { ChannelStats, ConsumerReport, LogFields, PipelineLogger, ProducerReport } from '../src/index';
import { joinUnit, resolveConsumer, resolveProducer, type Joined } from '../src/join';
import type { UnitMessage } from '../src/messages';
import { spawnUnit } from '../src/spawn';

// ─── Shared helpers ────────────────────────────────────────────────────────────

const pickConsumer = (msg: UnitMessage): ConsumerReport | undefined =>
  msg.type === 'consumer-report' ? msg.report : undefined;

const NO_TRAFFIC: ChannelStats = { capacity: 1, peakLength: 0, inserted: 0, removed: 0, sentinels: 0 };

const sleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

// ─── joinUnit ─────────────────────────────────────────────────────────────────

describe('joinUnit', () => {
  it('records the error that kills a unit thread and reports it as faulted', async () => {
    const lines: Array<[string, LogFields | undefined]> = [];
    const push = (message: string, fields?: LogFields) => { lines.push([message, fields]); };
    const logger: PipelineLogger = { debug: push, info: push, warn: push, error: push };

    // Zero-filled: the right size for one slot, but no magic word.
    const corrupt = new SharedArrayBuffer(computeChannelBytes(1));
    const worker  = spawnUnit({
      role:           'consumer',
      channel:        corrupt,
      destination:    DestinationBuffer.create(1).sab,
      trace:          false,
      channelOptions: {},
    });

    const joined = await joinUnit(worker, 'consumer', logger, pickConsumer).done;

    const crash = 'Not a channel buffer: magic 0x00000000, expected 0x46444e48.';
    expect(joined.report).toBeUndefined();
    expect(joined.crash).toBe(crash);
    expect(joined.exitCode).toBe(1);
    expect(lines).toContainEqual([`Unit thread crashed: ${crash}`, { unit: 'consumer' }]);

    expect(resolveConsumer(joined, NO_TRAFFIC, false)).toEqual({
      state:             'faulted',
      itemsReceived:     0,
      sentinelsReceived: 0,
      error:             crash,
    });
  });

  it('tells a parked thread from one that has exited', async () => {
    const channel = BoundedChannel.create(1);
    const worker  = spawnUnit({
      role:           'consumer',
      channel:        channel.sab,
      destination:    DestinationBuffer.create(1).sab,
      trace:          false,
      channelOptions: {},
    });
    const join = joinUnit(worker, 'consumer', silentLogger, pickConsumer);

    // Nothing is ever inserted, so the consumer stays in remove().
    await sleep(200);
    expect(join.hasExited()).toBe(false);

    await worker.terminate();
    const joined = await join.done;
    expect(join.hasExited()).toBe(true);
    expect(joined).toEqual({ report: undefined, crash: undefined, exitCode: 1 });

    expect(resolveConsumer(joined, channel.stats(), true).state).toBe('hung');
    expect(resolveConsumer(joined, channel.stats(), false)).toEqual({
      state:             'faulted',
      itemsReceived:     0,
      sentinelsReceived: 0,
      error:             'thread exited with code 1 before reporting',
    });
  });
});

// ─── Report resolution ────────────────────────────────────────────────────────

describe('resolveProducer', () => {
  it('keeps a posted report as it is', () => {
    const report: ProducerReport = { state: 'done', itemsSent: 2, sentinelSent: true };
    expect(resolveProducer({ report, exitCode: 0 }, NO_TRAFFIC, true)).toBe(report);
  });

  it('reports a crash as faulted even when the watchdog has fired', () => {
    const joined: Joined<ProducerReport> = { crash: 'boom', exitCode: 1 };
    const stats: ChannelStats = { ...NO_TRAFFIC, inserted: 3 };

    expect(resolveProducer(joined, stats, true)).toEqual({
      state:        'faulted',
      itemsSent:    3,
      sentinelSent: false,
      error:        'boom',
    });
  });

  it('fills a parked producer in from the channel counters', () => {
    const stats: ChannelStats = { ...NO_TRAFFIC, inserted: 1, peakLength: 1 };
    expect(resolveProducer({ exitCode: 1 }, stats, true)).toEqual({
      state:        'hung',
      itemsSent:    1,
      sentinelSent: false,
    });
  });
});
