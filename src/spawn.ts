/**
 * handoff — thread spawning
 *
 * Each execution unit gets its own worker_threads thread. From a build
 * (dist/*.js) the unit entry is loaded directly. From the TypeScript sources
 * (tests, `tsx src/cli.ts`) the thread first registers the tsx CommonJS hook
 * so it can load unit-worker.ts itself.
 */

import * as path from 'path';
import { Worker } from 'worker_threads';
import type { UnitTask } from './messages';

function unitEntryPath(): string {
  return path.join(__dirname, `unit-worker${path.extname(__filename)}`);
}

export function spawnUnit(task: UnitTask): Worker {
  const entry = unitEntryPath();

  if (path.extname(entry) !== '.ts') {
    return new Worker(entry, { workerData: task });
  }

  const hook = require.resolve('tsx/cjs');
  const bootstrap =
    `require(${JSON.stringify(hook)});\n` +
    `require(${JSON.stringify(entry)});\n`;
  return new Worker(bootstrap, { eval: true, workerData: task });
}
