import { describe, it, expect, vi } from 'vitest';
import {
  boundedReplay,
  configure,
  createChannel,
  hibiki,
  HandlerError,
  noBuffering,
  unboundedReplay,
} from '../src';
import type { Channel } from '../src';

function record<V>(channel: Channel<V>): V[] {
  const seen: V[] = [];
  channel.listen((value) => seen.push(value));
  return seen;
}

describe('Channel', () => {
  describe('Listeners', () => {
    it('should deliver a broadcast to one listener', () => {
      const [emitter, channel] = createChannel<number>();
      const seen = record(channel);

      emitter.broadcast(1);
      expect(seen).toEqual([1]);
    });

    it('should deliver every broadcast to each of several listeners once', () => {
      const [emitter, channel] = createChannel<number>();
      let called = 0;
      for (let i = 0; i < 5; i++) {
        channel.listen(() => {
          called++;
        });
      }

      emitter.broadcast(1);
      expect(called).toBe(5);

      emitter.broadcast(1);
      expect(called).toBe(10);
    });

    it('should not replay to a listener attached late to a hot channel', () => {
      const [emitter, channel] = createChannel<number>(noBuffering());
      emitter.broadcast(1);
      emitter.broadcast(2);

      const seen = record(channel);
      expect(seen).toEqual([]);

      emitter.broadcast(3);
      expect(seen).toEqual([3]);
    });

    it('should count listeners', () => {
      const [, channel] = createChannel<number>();
      const a = channel.listen(() => {});
      channel.listen(() => {});
      expect(channel.listenerCount).toBe(2);

      a.dispose();
      expect(channel.listenerCount).toBe(1);
    });

    it('should count every broadcast from interleaved async producers', async () => {
      const [emitter, channel] = createChannel<number>();
      let called = 0;
      channel.listen(() => {
        called++;
      });
      channel.listen(() => {
        called++;
      });

      const producers = [1, 2, 3, 4].map(async (value) => {
        for (let i = 0; i < 5; i++) {
          await Promise.resolve();
          emitter.broadcast(value);
        }
      });
      await Promise.all(producers);

      expect(called).toBe(40);
    });
  });

  describe('Replay', () => {
    it.each([
      { values: [1, 2], upTo: 0, expected: [] },
      { values: [1, 2], upTo: 1, expected: [2] },
      { values: [1, 2], upTo: 2, expected: [1, 2] },
      { values: [1, 2], upTo: 3, expected: [1, 2] },
      { values: [1, 2, 3, 4, 5], upTo: 3, expected: [3, 4, 5] },
    ])('should replay the last $upTo of $values', ({ values, upTo, expected }) => {
      const [emitter, channel] = createChannel<number>(boundedReplay(upTo));
      values.forEach((v) => emitter.broadcast(v));

      expect(record(channel)).toEqual(expected);
    });

    it('should drop values past the bound and keep replaying the newest', () => {
      const [emitter, channel] = createChannel<number>(boundedReplay(2));
      [1, 2, 3, 4].forEach((v) => emitter.broadcast(v));

      const first = record(channel);
      expect(first).toEqual([3, 4]);

      emitter.broadcast(5);
      expect(first).toEqual([3, 4, 5]);

      const second = record(channel);
      expect(second).toEqual([4, 5]);
    });

    it('should replay everything on a cold channel', () => {
      const [emitter, channel] = createChannel<number>(unboundedReplay());
      [1, 2, 3, 4, 5].forEach((v) => emitter.broadcast(v));

      expect(record(channel)).toEqual([1, 2, 3, 4, 5]);
    });

    it('should treat an infinite bound as cold', () => {
      const [emitter, channel] = createChannel<number>(boundedReplay(Infinity));
      [1, 2, 3].forEach((v) => emitter.broadcast(v));

      expect(record(channel)).toEqual([1, 2, 3]);
      expect(channel.replaySize).toBe(3);
    });

    it('should replay the full history to each cold listener and then share live values', () => {
      const [emitter, channel] = hibiki.cold<number>();
      [1, 2, 3].forEach((v) => emitter.broadcast(v));

      const first = record(channel);
      const second = record(channel);
      expect(first).toEqual([1, 2, 3]);
      expect(second).toEqual([1, 2, 3]);

      emitter.broadcast(4);
      expect(first).toEqual([1, 2, 3, 4]);
      expect(second).toEqual([1, 2, 3, 4]);
    });

    it('should replay only to the listener being attached', () => {
      const [emitter, channel] = hibiki.cold<number>();
      emitter.broadcast(1);
      const early = record(channel);

      record(channel);
      expect(early).toEqual([1]);
    });

    it('should report how much a new listener would be replayed', () => {
      const [warmEmitter, warm] = hibiki.warm<number>(2);
      const [hotEmitter, hot] = hibiki.hot<number>();
      [1, 2, 3, 4].forEach((v) => {
        warmEmitter.broadcast(v);
        hotEmitter.broadcast(v);
      });

      expect(warm.replaySize).toBe(2);
      expect(hot.replaySize).toBe(0);
    });

    it('should hand over broadcasts made during replay after the replay finishes', () => {
      const [emitter, channel] = hibiki.cold<number>();
      emitter.broadcast(1);
      emitter.broadcast(2);
      const other = record(channel);

      const seen: number[] = [];
      channel.listen((value) => {
        seen.push(value);
        if (value === 1) emitter.broadcast(10);
      });

      expect(seen).toEqual([1, 2, 10]);
      expect(other).toEqual([1, 2, 10]);
      expect(record(channel)).toEqual([1, 2, 10]);
    });
  });

  describe('Reentrancy', () => {
    it('should pick up listeners added by a handler from the next broadcast on', () => {
      const [emitter, channel] = createChannel<number>();
      let outerCalled = 0;
      let innerCalled = 0;

      channel.listen(() => {
        outerCalled++;
        channel.listen(() => {
          innerCalled++;
        });
      });

      emitter.broadcast(1);
      expect(outerCalled).toBe(1);
      expect(innerCalled).toBe(0);

      emitter.broadcast(2);
      expect(outerCalled).toBe(2);
      expect(innerCalled).toBe(1);

      emitter.broadcast(3);
      expect(outerCalled).toBe(3);
      expect(innerCalled).toBe(3);
    });

    it('should register listeners on another channel from inside a handler', () => {
      const [outerEmitter, outer] = createChannel<number>();
      const [innerEmitter, inner] = createChannel<number>();
      let outerCalled = 0;
      let innerCalled = 0;

      outer.listen(() => {
        outerCalled++;
        inner.listen(() => {
          innerCalled++;
        });
      });

      outerEmitter.broadcast(1);
      expect(outerCalled).toBe(1);
      expect(innerCalled).toBe(0);

      innerEmitter.broadcast(10);
      expect(innerCalled).toBe(1);

      outerEmitter.broadcast(2);
      expect(outerCalled).toBe(2);

      innerEmitter.broadcast(20);
      expect(innerCalled).toBe(3);
    });

    it('should run a broadcast made inside a handler inline', () => {
      const [emitter, channel] = createChannel<number>();
      const b: number[] = [];
      let seenInsideA: number[] = [];

      channel.listen((value) => {
        if (value !== 1) return;
        emitter.broadcast(2);
        seenInsideA = [...b];
      });
      channel.listen((value) => b.push(value));

      emitter.broadcast(1);
      expect(seenInsideA).toContain(2);
      expect([...b].sort()).toEqual([1, 2]);
    });

    it('should let a handler dispose its own subscription', () => {
      const [emitter, channel] = createChannel<number>();
      const seen: number[] = [];
      const subscription = channel.listen((value) => {
        seen.push(value);
        subscription.dispose();
      });

      emitter.broadcast(1);
      emitter.broadcast(2);
      expect(seen).toEqual([1]);
      expect(channel.listenerCount).toBe(0);
    });

    it('should skip a listener disposed earlier in the same delivery', () => {
      const [emitter, channel] = createChannel<number>();
      const late: number[] = [];
      let lateSubscription: { dispose(): void } | undefined;

      channel.listen(() => lateSubscription?.dispose());
      lateSubscription = channel.listen((value) => late.push(value));

      emitter.broadcast(1);
      expect(late).toEqual([]);
    });
  });

  describe('Subscriptions', () => {
    it('should stop delivery after dispose', () => {
      const [emitter, channel] = createChannel<number>();
      let called = 0;
      const subscription = channel.listen(() => {
        called++;
      });

      subscription.dispose();
      emitter.broadcast(1);
      expect(called).toBe(0);
      expect(subscription.isActive).toBe(false);
    });

    it('should treat a second dispose as a no-op', () => {
      const [emitter, channel] = createChannel<number>();
      const first = channel.listen(() => {});
      const second = record(channel);

      first.dispose();
      first.dispose();
      first.unsubscribe();
      first[Symbol.dispose]();

      expect(channel.listenerCount).toBe(1);
      emitter.broadcast(1);
      expect(second).toEqual([1]);
    });

    it('should only remove its own listener when a slot is reused', () => {
      const [emitter, channel] = createChannel<number>();
      let value = 0;

      const first = channel.listen(() => {
        value = 1;
      });
      first.dispose();
      emitter.broadcast(1);
      expect(value).toBe(0);

      const second = channel.listen(() => {
        value = 2;
      });
      first.dispose();
      emitter.broadcast(1);
      expect(value).toBe(2);
      expect(second.isActive).toBe(true);
    });
  });

  describe('Listener failures', () => {
    it('should keep delivering when a listener throws and pass the failure to onError', () => {
      const failures: HandlerError[] = [];
      const [emitter, channel] = createChannel<number>(noBuffering(), {
        label: 'prices',
        onError: (error) => failures.push(error),
      });
      const boom = new Error('boom');
      channel.listen(() => {
        throw boom;
      });
      const seen = record(channel);

      emitter.broadcast(1);

      expect(seen).toEqual([1]);
      expect(failures).toHaveLength(1);
      expect(failures[0]).toBeInstanceOf(HandlerError);
      expect(failures[0].code).toBe('LISTENER_FAILED');
      expect(failures[0].label).toBe('prices');
      expect(failures[0].phase).toBe('live');
      expect(failures[0].cause).toBe(boom);
    });

    it('should tag failures during replay', () => {
      const failures: HandlerError[] = [];
      const [emitter, channel] = createChannel<number>(unboundedReplay(), {
        onError: (error) => failures.push(error),
      });
      emitter.broadcast(1);

      channel.listen(() => {
        throw new Error('boom');
      });

      expect(failures.map((f) => f.phase)).toEqual(['replay']);
    });

    it('should log a listener failure when no onError is given', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const [emitter, channel] = createChannel<number>(noBuffering(), { label: 'audit' });
      const boom = new Error('boom');
      channel.listen(() => {
        throw boom;
      });

      emitter.broadcast(1);

      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy).toHaveBeenCalledWith('[hibiki] listener on audit threw during live delivery', boom);
    });

    it('should log when onError itself throws', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const secondary = new Error('handler broke');
      const [emitter, channel] = createChannel<number>(noBuffering(), {
        label: 'audit',
        onError: () => {
          throw secondary;
        },
      });
      channel.listen(() => {
        throw new Error('boom');
      });

      expect(() => emitter.broadcast(1)).not.toThrow();
      expect(spy).toHaveBeenCalledWith('[hibiki] onError handler of audit threw', secondary);
    });

    it('should stay quiet when configured silent', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      configure({ silent: true });
      const [emitter, channel] = createChannel<number>();
      channel.listen(() => {
        throw new Error('boom');
      });

      emitter.broadcast(1);
      expect(spy).not.toHaveBeenCalled();
    });
  });

  describe('Inspection', () => {
    it('should describe itself', () => {
      const [, channel] = createChannel<number>(boundedReplay(2), { label: 'prices' });
      channel.listen(() => {});

      expect(channel.toString()).toBe('Channel(prices, warm(2), 1 listeners)');
    });

    it('should expose its strategy', () => {
      const [, channel] = hibiki.warm<string>(3);
      expect(channel.strategy).toEqual({ kind: 'bounded', capacity: 3 });
    });
  });
});
