/**
 * handoff — consumer
 *
 * Idle → Waiting → { ItemReceived → Write → Waiting } | { SentinelReceived → Done }
 *
 * Done is terminal: remove() is never called after end-of-stream. A fault
 * ends the consumer and may leave the destination partially written.
 */

import type { BoundedChannel } from './channel';
import type { DestinationBuffer } from './destination';
import type { UnitOptions } from './producer';
import type { ConsumerReport } from './types';

export function consume(
  channel:     BoundedChannel,
  destination: DestinationBuffer,
  { logger, trace = false }: UnitOptions,
): ConsumerReport {
  let itemsReceived = 0;

  try {
    while (true) {
      const element = channel.remove(); // parks while the channel is empty
      if (element.kind === 'end') break;

      destination.write(element.index, element.value);
      itemsReceived++;
      if (trace) {
        logger.debug('consumed', { index: element.index, value: element.value, length: channel.length });
      }
    }

    logger.info('Consumer finished consuming all items.', { items: itemsReceived });
    return { state: 'done', itemsReceived, sentinelsReceived: 1 };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(`Consumer error: ${message}`, { items: itemsReceived });
    return { state: 'faulted', itemsReceived, sentinelsReceived: 0, error: message };
  }
}
