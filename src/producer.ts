/**
 * handoff — producer
 *
 * Idle → Producing(i = 0..N-1) → Finalizing → Done
 *
 * Finalizing always runs, so an empty source still sends exactly one
 * end-of-stream marker. A fault ends the producer without sending one; the
 * consumer is left parked in remove().
 */

import type { BoundedChannel } from './channel';
import type { PipelineLogger } from './logger';
import { END_OF_STREAM, item, type ProducerReport } from './types';

export interface UnitOptions {
  readonly logger: PipelineLogger;
  /** Emit one debug record per element. */
  readonly trace?: boolean;
}

export function produce(
  source:  readonly number[],
  channel: BoundedChannel,
  { logger, trace = false }: UnitOptions,
): ProducerReport {
  let itemsSent = 0;

  try {
    for (let i = 0; i < source.length; i++) {
      const value = source[i];
      channel.insert(item(i, value)); // parks while the channel is full
      itemsSent++;
      if (trace) {
        logger.debug('produced', { index: i, value, length: channel.length });
      }
    }

    channel.insert(END_OF_STREAM);
    logger.info('Producer finished producing all items.', { items: itemsSent });
    return { state: 'done', itemsSent, sentinelSent: true };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(`Producer error: ${message}`, { items: itemsSent });
    return { state: 'faulted', itemsSent, sentinelSent: false, error: message };
  }
}
