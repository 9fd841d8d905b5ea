import type { Strategy } from './types';

/** Hot: values broadcast with no listener attached are gone. */
export function noBuffering(): Strategy {
  return { kind: 'none' };
}

/**
 * Warm: keeps the latest `capacity` values and replays them to each new listener.
 * `boundedReplay(0)` retains nothing; `boundedReplay(Infinity)` retains everything.
 */
export function boundedReplay(capacity: number): Strategy {
  if (Number.isNaN(capacity) || capacity < 0 || (Number.isFinite(capacity) && !Number.isInteger(capacity))) {
    throw new RangeError(`boundedReplay capacity must be a non-negative integer or Infinity, got ${capacity}`);
  }
  return { kind: 'bounded', capacity };
}

/** Cold: replays every value ever broadcast. */
export function unboundedReplay(): Strategy {
  return { kind: 'unbounded' };
}

export function describeStrategy(strategy: Strategy): string {
  switch (strategy.kind) {
    case 'none':
      return 'hot';
    case 'bounded':
      return `warm(${strategy.capacity})`;
    case 'unbounded':
      return 'cold';
  }
}
