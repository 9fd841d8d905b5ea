import { ATTACH_UPSTREAM } from './internal/tags';
import { Channel, createChannel, type Operator } from './channel';
import { noBuffering } from './strategy';
import type { Handler, Strategy } from './types';

// Builds the derived pair and subscribes it to `source` once. Values the source
// replays at this point pass through `wire` like live ones, so the derived
// history is what applying the operator from the start would have produced.
function derive<T, U>(
  source: Channel<T>,
  name: string,
  wire: (emit: (value: U) => void) => Handler<T>,
  strategy: Strategy = source.strategy
): Channel<U> {
  const [emitter, channel] = createChannel<U>(strategy, { label: `${source.label}.${name}` });
  const subscription = source.listen(wire((value) => emitter.broadcast(value)));
  channel[ATTACH_UPSTREAM](subscription);
  return channel;
}

export function map<T, U>(fn: (value: T) => U): Operator<T, U> {
  return (source) => derive<T, U>(source, 'map', (emit) => (value) => emit(fn(value)));
}

export function filter<T, S extends T>(predicate: (value: T) => value is S): Operator<T, S>;
export function filter<T>(predicate: (value: T) => boolean): Operator<T, T>;
export function filter<T>(predicate: (value: T) => boolean): Operator<T, T> {
  return (source) =>
    derive<T, T>(source, 'filter', (emit) => (value) => {
      if (predicate(value)) emit(value);
    });
}

/** Drops a value equal to the last one forwarded. */
export function skipRepeats<T>(isEqual: (previous: T, current: T) => boolean = Object.is): Operator<T, T> {
  return (source) => {
    let last: { value: T } | undefined;
    return derive<T, T>(source, 'skipRepeats', (emit) => (value) => {
      if (last && isEqual(last.value, value)) return;
      last = { value };
      emit(value);
    });
  };
}

/**
 * Forwards each value the first time this operator sees it. With `key`, two
 * values count as the same when their keys are (SameValueZero, as in a `Set`).
 */
export function uniqueValues<T>(key: (value: T) => unknown = (value) => value): Operator<T, T> {
  return (source) => {
    const seen = new Set<unknown>();
    return derive<T, T>(source, 'uniqueValues', (emit) => (value) => {
      const k = key(value);
      if (seen.has(k)) return;
      seen.add(k);
      emit(value);
    });
  };
}

/** Pairs each value with the one before it; `undefined` for the very first. */
export function withPrevious<T>(): Operator<T, [previous: T | undefined, current: T]> {
  return (source) => {
    let previous: { value: T } | undefined;
    return derive<T, [T | undefined, T]>(source, 'withPrevious', (emit) => (value) => {
      const pair: [T | undefined, T] = [previous?.value, value];
      previous = { value };
      emit(pair);
    });
  };
}

export function skip<T>(count: number): Operator<T, T> {
  return (source) => {
    let skipped = 0;
    return derive<T, T>(source, 'skip', (emit) => (value) => {
      if (skipped < count) {
        skipped++;
        return;
      }
      emit(value);
    });
  };
}

/** Forwards the first `count` values. The upstream subscription stays attached afterwards. */
export function take<T>(count: number): Operator<T, T> {
  return (source) => {
    let taken = 0;
    return derive<T, T>(source, 'take', (emit) => (value) => {
      if (taken >= count) return;
      taken++;
      emit(value);
    });
  };
}

/** Drops `null` and `undefined`. */
export function skipNil<T>(): Operator<T, NonNullable<T>> {
  return (source) =>
    derive<T, NonNullable<T>>(source, 'skipNil', (emit) => (value) => {
      if (value !== null && value !== undefined) emit(value);
    });
}

/**
 * Forwards live values only: the derived channel never buffers, and whatever
 * the source replays when the operator attaches is dropped.
 */
export function hotOnly<T>(): Operator<T, T> {
  return (source) => {
    let attached = false;
    const channel = derive<T, T>(
      source,
      'hotOnly',
      (emit) => (value) => {
        if (attached) emit(value);
      },
      noBuffering()
    );
    attached = true;
    return channel;
  };
}
