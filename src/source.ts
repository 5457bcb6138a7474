/**
 * handoff — source generation
 *
 * Builds the immutable source sequence for a run. `random` must return values
 * in [0, 1), like Math.random; tests pass a deterministic one.
 */

import { MAX_ITEMS } from './constants';
import type { SourcePolicy } from './types';

export const SOURCE_POLICIES = ['mixed', 'integers', 'reals'] as const satisfies readonly SourcePolicy[];

/** Integer in [1, 100]. */
function randomInteger(random: () => number): number {
  return Math.floor(random() * 100) + 1;
}

/** Real in [0, 100). */
function randomReal(random: () => number): number {
  return random() * 100;
}

export function buildSource(
  size:   number,
  policy: SourcePolicy   = 'mixed',
  random: () => number   = Math.random,
): readonly number[] {
  if (!Number.isSafeInteger(size) || size < 0 || size > MAX_ITEMS) {
    throw new RangeError(`Source size must be an integer in [0, ${MAX_ITEMS}]; got ${size}.`);
  }

  const values: number[] = [];
  for (let i = 0; i < size; i++) {
    switch (policy) {
      case 'integers':
        values.push(randomInteger(random));
        break;
      case 'reals':
        values.push(randomReal(random));
        break;
      case 'mixed':
        // Coin flip first, then the value draw.
        values.push(random() < 0.5 ? randomInteger(random) : randomReal(random));
        break;
    }
  }
  return Object.freeze(values);
}
