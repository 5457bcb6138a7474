/**
 * handoff — execution unit entry point
 *
 * Loaded once per thread by spawnUnit(). Reads its task from workerData, runs
 * the producer or consumer to a terminal state, posts the report, and lets
 * the thread exit. Log records travel to the orchestrator as messages, since
 * a logger function cannot cross the thread boundary.
 */

import { parentPort, workerData, type MessagePort } from 'worker_threads';
import { BoundedChannel } from './channel';
import { consume } from './consumer';
import { DestinationBuffer } from './destination';
import type { LogFields, LogLevel, PipelineLogger } from './logger';
import { unitTaskSchema, type UnitMessage } from './messages';
import { produce } from './producer';

function portLogger(port: MessagePort): PipelineLogger {
  const post = (level: LogLevel, message: string, fields?: LogFields): void => {
    const msg: UnitMessage = { type: 'log', level, message, fields: fields && { ...fields } };
    port.postMessage(msg);
  };
  return {
    debug: (message, fields) => post('debug', message, fields),
    info:  (message, fields) => post('info',  message, fields),
    warn:  (message, fields) => post('warn',  message, fields),
    error: (message, fields) => post('error', message, fields),
  };
}

function run(port: MessagePort): void {
  const task   = unitTaskSchema.parse(workerData);
  const logger = portLogger(port);

  if (task.role === 'producer') {
    const channel = BoundedChannel.attach(task.channel, task.channelOptions);
    const report  = produce(task.source, channel, { logger, trace: task.trace });
    const msg: UnitMessage = { type: 'producer-report', report };
    port.postMessage(msg);
  } else {
    const channel     = BoundedChannel.attach(task.channel, task.channelOptions);
    const destination = DestinationBuffer.attach(task.destination);
    const report      = consume(channel, destination, { logger, trace: task.trace });
    const msg: UnitMessage = { type: 'consumer-report', report };
    port.postMessage(msg);
  }
}

const port = parentPort;
if (!port) {
  throw new Error('unit-worker must be started with worker_threads.Worker.');
}
run(port);
